/**
 * Google Calendar OAuth credential handling
 * Tokens are issued ahead of time; only refresh happens here.
 */

import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import type { GoogleProviderConfig } from '../../types/index.js';
import { AvailabilityError, ErrorCodes } from '../../utils/error.js';

/**
 * Read-only access is all availability needs
 */
export const GOOGLE_CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

/**
 * Create an OAuth2 client from configuration
 */
export function createOAuth2Client(config: GoogleProviderConfig): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2(
    config.clientId,
    config.clientSecret,
    config.redirectUri
  );

  if (config.credentials) {
    const credentials: Credentials = {
      access_token: config.credentials.accessToken || undefined,
      refresh_token: config.credentials.refreshToken || undefined,
      expiry_date: config.credentials.tokenExpiry
        ? new Date(config.credentials.tokenExpiry).getTime()
        : undefined,
      scope: GOOGLE_CALENDAR_SCOPES.join(' '),
    };
    oauth2Client.setCredentials(credentials);
  }

  return oauth2Client;
}

/**
 * Check if the access token is expired or expires within `bufferMs`
 */
export function isTokenExpired(oauth2Client: OAuth2Client, bufferMs: number = 60000): boolean {
  const credentials = oauth2Client.credentials;
  if (!credentials.expiry_date) {
    // No expiry info: treat as expired so a refresh token gets used
    return true;
  }
  return credentials.expiry_date <= Date.now() + bufferMs;
}

/**
 * Refresh the access token
 */
export async function refreshAccessToken(oauth2Client: OAuth2Client): Promise<Credentials> {
  try {
    const { credentials } = await oauth2Client.refreshAccessToken();
    oauth2Client.setCredentials(credentials);
    return credentials;
  } catch (error) {
    throw new AvailabilityError(
      'Failed to refresh access token. Please re-authenticate.',
      ErrorCodes.AUTH_EXPIRED,
      {
        provider: 'google',
        cause: error instanceof Error ? error : undefined,
      }
    );
  }
}

/**
 * Ensure we have a usable access token, refreshing when possible
 */
export async function ensureValidCredentials(oauth2Client: OAuth2Client): Promise<void> {
  const credentials = oauth2Client.credentials;

  if (!credentials.access_token && !credentials.refresh_token) {
    throw new AvailabilityError(
      'No access token available. Please authenticate.',
      ErrorCodes.AUTH_MISSING,
      { provider: 'google' }
    );
  }

  if (!credentials.access_token || isTokenExpired(oauth2Client)) {
    if (!credentials.refresh_token) {
      // An access token without expiry info may still be valid; let the API decide
      if (credentials.access_token && !credentials.expiry_date) return;
      throw new AvailabilityError(
        'Access token expired and no refresh token available. Please re-authenticate.',
        ErrorCodes.AUTH_EXPIRED,
        { provider: 'google' }
      );
    }
    await refreshAccessToken(oauth2Client);
  }
}
