/**
 * Google credentials: a service account JSON, or an OAuth refresh token
 */

import { google } from 'googleapis';
import { GoogleAuth, OAuth2Client } from 'google-auth-library';
import { ConfigError } from '../utils/errors';

export interface OAuthCredentials {
  client_id: string;
  client_secret: string;
  refresh_token: string;
}

export type GoogleCredentials =
  | { type: 'service_account'; json: string }
  | { type: 'oauth'; credentials: OAuthCredentials };

export type GoogleAuthClient = OAuth2Client | GoogleAuth;

interface ServiceAccountKey {
  client_email: string;
  private_key: string;
}

function parseServiceAccount(json: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigError('GOOGLE_SERVICE_ACCOUNT_JSON is not valid JSON', error);
  }
  if (
    typeof parsed !== 'object' || parsed === null ||
    !('client_email' in parsed) || typeof parsed.client_email !== 'string' ||
    !('private_key' in parsed) || typeof parsed.private_key !== 'string'
  ) {
    throw new ConfigError('GOOGLE_SERVICE_ACCOUNT_JSON needs client_email and private_key');
  }
  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

export function createGoogleAuth(credentials: GoogleCredentials, scopes: string[]): GoogleAuthClient {
  if (credentials.type === 'service_account') {
    return new GoogleAuth({ credentials: parseServiceAccount(credentials.json), scopes });
  }

  const auth = new google.auth.OAuth2(
    credentials.credentials.client_id,
    credentials.credentials.client_secret,
    'urn:ietf:wg:oauth:2.0:oob'
  );
  auth.setCredentials({ refresh_token: credentials.credentials.refresh_token });
  return auth;
}
