const pad = (value: number, width: number = 2): string => value.toString().padStart(width, '0');

/**
 * Render a local wall-clock time as `YYYY-MM-DD HH:MM:SS.ffffff`.
 * The fractional part has six digits and is left off entirely when zero.
 * Spaces and colons are kept in the output.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const millis = date.getMilliseconds();
  const fraction = millis === 0 ? '' : `.${pad(millis, 3)}000`;

  return `${day} ${time}${fraction}`;
}

export function buildObjectKey(keyPrefix: string, date: Date): string {
  return `${keyPrefix}spotify_raw_${formatTimestamp(date)}.json`;
}
