import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { SPOTIFY_API_BASE, SPOTIFY_TOKEN_URL } from '../config';
import type { SpotifyCredentials } from '../config';
import type { JsonValue, PlaylistTracksPage, SpotifyTokenResponse } from '../models/spotifyTypes';

const readItems = (page: PlaylistTracksPage): JsonValue[] =>
  Array.isArray(page.items) ? page.items : [];

const readNext = (page: PlaylistTracksPage): string | null =>
  typeof page.next === 'string' ? page.next : null;

export class SpotifyService {
  private tokenUrl: string = SPOTIFY_TOKEN_URL;
  private apiBase: string = SPOTIFY_API_BASE;

  constructor(
    private credentials: SpotifyCredentials,
    private http: AxiosInstance = axios.create()
  ) {}

  /**
   * Exchange the app's own id and secret for an access token
   * (client-credentials grant, no user context and no refresh token).
   */
  async getClientCredentialsToken(): Promise<SpotifyTokenResponse> {
    try {
      const { clientId, clientSecret } = this.credentials;
      const params = new URLSearchParams();
      params.append('grant_type', 'client_credentials');

      const response = await this.http.post<SpotifyTokenResponse>(this.tokenUrl, params, {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Authorization': `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`
        }
      });

      if (!response.data?.access_token) {
        throw new Error('Spotify token response missing access_token');
      }

      console.log('Spotify authentication successful');
      return response.data;
    } catch (error) {
      console.error('Error getting client credentials token:', error);
      throw error;
    }
  }

  /**
   * Get the first page of a playlist's tracks. No cursor is sent, so a
   * playlist longer than one page is silently truncated.
   * @param accessToken Valid access token
   * @param playlistId Spotify playlist id
   */
  async getPlaylistTracks(accessToken: string, playlistId: string): Promise<PlaylistTracksPage> {
    try {
      const page = await this.getPage(
        accessToken,
        `${this.apiBase}/playlists/${encodeURIComponent(playlistId)}/tracks`
      );

      console.log(`Retrieved ${readItems(page).length} tracks for playlist ${playlistId}`);
      return page;
    } catch (error) {
      console.error(`Error fetching tracks for playlist ${playlistId}:`, error);
      throw error;
    }
  }

  /**
   * Get every track in a playlist by following `next` links.
   * @param accessToken Valid access token
   * @param playlistId Spotify playlist id
   * @returns All tracks consolidated into one page, in the same shape the API returns
   */
  async getAllPlaylistTracks(accessToken: string, playlistId: string): Promise<PlaylistTracksPage> {
    const firstPage = await this.getPlaylistTracks(accessToken, playlistId);
    let allItems = readItems(firstPage);
    let next = readNext(firstPage);

    try {
      while (next) {
        console.log(`Fetching next page of playlist ${playlistId}: ${next}`);
        const nextPage = await this.getPage(accessToken, next);

        allItems = [...allItems, ...readItems(nextPage)];
        next = readNext(nextPage);
      }
    } catch (error) {
      console.error(`Error fetching all tracks for playlist ${playlistId}:`, error);
      throw error;
    }

    return {
      ...firstPage,
      items: allItems,
      limit: allItems.length,
      next: null,
      offset: 0,
      previous: null
    };
  }

  private async getPage(accessToken: string, url: string): Promise<PlaylistTracksPage> {
    const response = await this.http.get<PlaylistTracksPage>(url, {
      headers: {
        'Authorization': `Bearer ${accessToken}`
      }
    });

    return response.data;
  }
}

export function createSpotifyService(
  credentials: SpotifyCredentials,
  http?: AxiosInstance
): SpotifyService {
  return new SpotifyService(credentials, http);
}
