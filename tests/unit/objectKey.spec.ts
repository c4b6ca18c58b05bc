import { describe, expect, it } from 'vitest';
import { buildObjectKey, formatTimestamp } from '../../src/utils/objectKey';

describe('formatTimestamp', () => {
  it('renders local time with six fractional digits', () => {
    expect(formatTimestamp(new Date(2024, 4, 1, 9, 5, 3, 42))).toBe('2024-05-01 09:05:03.042000');
  });

  it('leaves off the fraction when it is zero', () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 59, 0))).toBe('2024-12-31 23:59:59');
  });
});

describe('buildObjectKey', () => {
  it('puts the timestamp between the prefix and the .json suffix', () => {
    const key = buildObjectKey('raw_data/to_processed/', new Date(2024, 4, 1, 9, 5, 3, 42));

    expect(key).toBe('raw_data/to_processed/spotify_raw_2024-05-01 09:05:03.042000.json');
  });

  it('gives different keys for different times', () => {
    const first = buildObjectKey('raw_data/to_processed/', new Date(2024, 4, 1, 9, 5, 3, 42));
    const second = buildObjectKey('raw_data/to_processed/', new Date(2024, 4, 1, 9, 5, 3, 43));

    expect(first).not.toBe(second);
  });
});
