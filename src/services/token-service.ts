import { errors as joseErrors, jwtVerify, SignJWT, type JWTPayload } from 'jose';

import { AppError, ConfigurationError } from '../errors/app-error.js';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export type TokenUse = 'access' | 'refresh';

export interface TokenServiceConfig {
  secret: string | undefined;
  algorithm: JwtAlgorithm;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  issuer?: string;
}

export interface AccessClaims {
  isAdmin: boolean;
}

export interface VerifiedAccessToken extends AccessClaims {
  subject: string;
  expiresAt: Date;
}

export interface VerifiedRefreshToken {
  subject: string;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Looks up the claims a fresh access token should carry for `subject`, or
 * `null` when the subject may no longer hold tokens.
 */
export type AccessClaimsResolver = (subject: string) => Promise<AccessClaims | null>;

const MIN_SECRET_LENGTH = 32;

function invalidToken(tokenUse: TokenUse): AppError {
  return new AppError(
    401,
    tokenUse === 'access' ? 'AUTH_ACCESS_TOKEN_INVALID' : 'AUTH_REFRESH_TOKEN_INVALID',
    `Could not validate credentials (${tokenUse} token).`
  );
}

/**
 * Issues and verifies the portal's stateless bearer tokens.
 *
 * Refresh tokens are not tracked server-side, so one stays valid until it
 * expires: there is no revocation path.
 */
export class TokenService {
  private readonly key: Uint8Array;

  public constructor(private readonly config: TokenServiceConfig) {
    if (config.secret === undefined || config.secret.length === 0) {
      throw new ConfigurationError('JWT_SECRET is not configured.');
    }

    if (config.secret.length < MIN_SECRET_LENGTH) {
      throw new ConfigurationError(`JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters long.`);
    }

    this.key = new TextEncoder().encode(config.secret);
  }

  public async issueAccess(
    subject: string,
    claims: AccessClaims,
    ttlSeconds: number = this.config.accessTokenTtlSeconds
  ): Promise<string> {
    return this.sign(subject, 'access', { is_admin: claims.isAdmin }, ttlSeconds);
  }

  public async issueRefresh(subject: string, ttlSeconds: number = this.config.refreshTokenTtlSeconds): Promise<string> {
    return this.sign(subject, 'refresh', {}, ttlSeconds);
  }

  public async verifyAccess(token: string): Promise<VerifiedAccessToken> {
    const payload = await this.verify(token, 'access');

    return {
      subject: payload.subject,
      expiresAt: payload.expiresAt,
      isAdmin: payload.claims.is_admin === true
    };
  }

  public async verifyRefresh(token: string): Promise<VerifiedRefreshToken> {
    const payload = await this.verify(token, 'refresh');

    return {
      subject: payload.subject,
      expiresAt: payload.expiresAt
    };
  }

  public async refreshCycle(refreshToken: string, resolveClaims: AccessClaimsResolver): Promise<TokenPair> {
    const verified = await this.verifyRefresh(refreshToken);
    const claims = await resolveClaims(verified.subject);
    if (claims === null) {
      throw invalidToken('refresh');
    }

    return {
      accessToken: await this.issueAccess(verified.subject, claims),
      refreshToken: await this.issueRefresh(verified.subject)
    };
  }

  private async sign(
    subject: string,
    tokenUse: TokenUse,
    extraClaims: Record<string, unknown>,
    ttlSeconds: number
  ): Promise<string> {
    const now = Date.now() / 1_000;
    // exp rounds up: a token lives at least its full ttl.
    const builder = new SignJWT({ ...extraClaims, token_use: tokenUse })
      .setProtectedHeader({ alg: this.config.algorithm, typ: 'JWT' })
      .setSubject(subject)
      .setIssuedAt(Math.floor(now))
      .setExpirationTime(Math.ceil(now) + ttlSeconds);

    if (this.config.issuer !== undefined) {
      builder.setIssuer(this.config.issuer);
    }

    return builder.sign(this.key);
  }

  private async verify(
    token: string,
    tokenUse: TokenUse
  ): Promise<{ subject: string; expiresAt: Date; claims: JWTPayload }> {
    let payload: JWTPayload;

    try {
      const result = await jwtVerify(token, this.key, {
        algorithms: [this.config.algorithm],
        issuer: this.config.issuer,
        requiredClaims: ['exp']
      });
      payload = result.payload;
    } catch (error) {
      if (error instanceof joseErrors.JOSEError || error instanceof TypeError) {
        throw invalidToken(tokenUse);
      }

      throw error;
    }

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw invalidToken(tokenUse);
    }

    if (payload.token_use !== tokenUse || typeof payload.exp !== 'number') {
      throw invalidToken(tokenUse);
    }

    if (payload.exp * 1_000 <= Date.now()) {
      throw invalidToken(tokenUse);
    }

    return {
      subject: payload.sub,
      expiresAt: new Date(payload.exp * 1_000),
      claims: payload
    };
  }
}
