import { OAuth2Client, type Credentials } from 'google-auth-library';
import { AuthorizationError } from '../errors.js';
import { Credential, GOOGLE_TOKEN_URI } from './credential.js';

export type AuthorizationUrlRequest = {
  redirectUri: string;
  loginHint?: string;
};

export interface OAuthClient {
  readonly scopes: readonly string[];
  buildAuthorizationUrl(request: AuthorizationUrlRequest): string;
  exchangeCode(code: string, redirectUri: string): Promise<Credential>;
  refresh(credential: Credential): Promise<Credential>;
}

export type GoogleOAuthClientOptions = {
  clientId: string;
  clientSecret: string;
  scopes: readonly string[];
  createClient?: (redirectUri?: string) => OAuth2Client;
};

export class GoogleOAuthClient implements OAuthClient {
  readonly scopes: readonly string[];
  private readonly createClient: (redirectUri?: string) => OAuth2Client;

  constructor(private readonly options: GoogleOAuthClientOptions) {
    this.scopes = [...options.scopes];
    this.createClient =
      options.createClient ??
      (redirectUri =>
        new OAuth2Client({
          clientId: options.clientId,
          clientSecret: options.clientSecret,
          redirectUri
        }));
  }

  buildAuthorizationUrl(request: AuthorizationUrlRequest): string {
    const client = this.createClient(request.redirectUri);
    return client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [...this.scopes],
      redirect_uri: request.redirectUri,
      login_hint: request.loginHint
    });
  }

  async exchangeCode(code: string, redirectUri: string): Promise<Credential> {
    const client = this.createClient(redirectUri);
    try {
      const { tokens } = await client.getToken({ code, redirect_uri: redirectUri });
      return this.toCredential(tokens, null);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthorizationError(`Authorization code exchange failed: ${message}`, {
        cause: error
      });
    }
  }

  async refresh(credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw new AuthorizationError('Credential has no refresh token');
    }
    const client = this.createClient();
    client.setCredentials({ refresh_token: credential.refreshToken });
    await client.getAccessToken();
    return this.toCredential(client.credentials, credential);
  }

  private toCredential(tokens: Credentials, previous: Credential | null): Credential {
    const scopes =
      typeof tokens.scope === 'string' && tokens.scope.length > 0
        ? tokens.scope.split(/\s+/)
        : previous?.scopes ?? this.scopes;
    return new Credential({
      token: tokens.access_token ?? null,
      refreshToken: tokens.refresh_token ?? previous?.refreshToken ?? null,
      tokenUri: previous?.tokenUri ?? GOOGLE_TOKEN_URI,
      clientId: this.options.clientId,
      clientSecret: this.options.clientSecret,
      scopes,
      expiresAt: typeof tokens.expiry_date === 'number' ? tokens.expiry_date : null
    });
  }
}
