import crypto from 'crypto';
import { BackendError } from '../errors.js';

export interface ServiceAccountKey {
  client_email: string;
  private_key: string;
}

const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

function base64UrlEncode(input: Buffer): string {
  return input
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

/**
 * Parses a service account JSON blob. Keys pasted into env files often carry
 * raw newlines inside `private_key`, which JSON rejects; those are escaped
 * and parsing is retried once.
 */
export function parseServiceAccountJson(raw: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    if (!raw.includes('private_key')) {
      throw new BackendError('Service account JSON is not valid JSON', { cause: error });
    }
    const fixed = raw.replace(/"private_key"\s*:\s*"([\s\S]+?)"/, (_match, key: string) => {
      return `"private_key": "${key.replace(/\r?\n/g, '\\n')}"`;
    });
    try {
      parsed = JSON.parse(fixed);
    } catch (retryError) {
      throw new BackendError('Service account JSON is not valid JSON', { cause: retryError });
    }
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'client_email' in parsed &&
    'private_key' in parsed &&
    typeof parsed.client_email === 'string' &&
    typeof parsed.private_key === 'string'
  ) {
    return { client_email: parsed.client_email, private_key: parsed.private_key };
  }
  throw new BackendError('Service account key missing client_email/private_key');
}

export function buildJwtAssertion(key: ServiceAccountKey, nowSeconds: number): string {
  const header = base64UrlEncode(Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT' })));
  const payload = base64UrlEncode(
    Buffer.from(
      JSON.stringify({
        iss: key.client_email,
        scope: SHEETS_SCOPE,
        aud: TOKEN_URL,
        iat: nowSeconds,
        exp: nowSeconds + 3600
      })
    )
  );
  const signature = crypto
    .createSign('RSA-SHA256')
    .update(`${header}.${payload}`)
    .sign(key.private_key);
  return `${header}.${payload}.${base64UrlEncode(signature)}`;
}

/**
 * Caches the access token until shortly before it expires.
 */
export class ServiceAccountTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;

  constructor(
    private readonly key: ServiceAccountKey,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async getToken(): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    if (this.token && now < this.expiresAt - 60) {
      return this.token;
    }

    const body = new URLSearchParams({
      grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
      assertion: buildJwtAssertion(this.key, now)
    });

    const response = await this.fetchImpl(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body
    });
    if (!response.ok) {
      const text = await response.text();
      throw new BackendError(`Google OAuth error (${response.status}): ${text}`);
    }

    const json: unknown = await response.json();
    const accessToken =
      typeof json === 'object' && json !== null && 'access_token' in json ? String(json.access_token) : '';
    const expiresIn =
      typeof json === 'object' && json !== null && 'expires_in' in json ? Number(json.expires_in) : 3600;
    if (!accessToken) {
      throw new BackendError('Google OAuth response carried no access token');
    }

    this.token = accessToken;
    this.expiresAt = now + (Number.isFinite(expiresIn) ? expiresIn : 3600);
    return accessToken;
  }
}
