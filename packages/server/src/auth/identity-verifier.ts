import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { TaskApiError } from '../errors';

export const TOKEN_ALGORITHM = 'HS256';
export const DEFAULT_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

/** Caller identity extracted from a verified bearer token */
export interface Identity {
  userId: string;
  email?: string;
  name?: string;
  issuedAt: Date | null;
  expiresAt: Date;
}

const tokenClaimsSchema = z.object({
  sub: z.string().trim().min(1),
  exp: z.number(),
  iat: z.number().optional(),
  email: z.string().optional(),
  name: z.string().optional(),
});

export interface IdentityVerifierOptions {
  secret: string;
  /** Clock used for expiry checks; defaults to the system clock */
  now?: () => Date;
}

/**
 * Verifies HS256 bearer tokens against the shared secret. Verification is
 * synchronous and never reaches the network.
 */
export class IdentityVerifier {
  private readonly secret: string;
  private readonly now: () => Date;

  constructor(options: IdentityVerifierOptions) {
    if (!options.secret) {
      throw new Error('IdentityVerifier requires a secret');
    }
    this.secret = options.secret;
    this.now = options.now ?? (() => new Date());
  }

  verify(token: string): Identity {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [TOKEN_ALGORITHM],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch (err) {
      // TokenExpiredError extends JsonWebTokenError, so test it first.
      if (err instanceof jwt.TokenExpiredError) {
        throw new TaskApiError('CREDENTIAL_EXPIRED');
      }
      if (err instanceof jwt.JsonWebTokenError) {
        throw new TaskApiError('CREDENTIAL_INVALID');
      }
      throw err;
    }

    const claims = tokenClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new TaskApiError('CREDENTIAL_INVALID');
    }

    const { sub, exp, iat, email, name } = claims.data;
    return {
      userId: sub,
      email,
      name,
      issuedAt: iat === undefined ? null : new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }
}

export interface AccessTokenClaims {
  userId: string;
  email?: string;
  name?: string;
}

export interface SignAccessTokenOptions {
  ttlSeconds?: number;
  now?: Date;
}

/** Mints a token the verifier accepts; issued on sign-in. */
export function signAccessToken(
  secret: string,
  claims: AccessTokenClaims,
  options: SignAccessTokenOptions = {}
): string {
  const issuedAt = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const ttl = options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
  const payload: JwtPayload = {
    sub: claims.userId,
    iat: issuedAt,
    exp: issuedAt + ttl,
  };
  if (claims.email) {
    payload.email = claims.email;
  }
  if (claims.name) {
    payload.name = claims.name;
  }
  return jwt.sign(payload, secret, { algorithm: TOKEN_ALGORITHM });
}

/**
 * Extracts the token from an `Authorization: Bearer <token>` header. The
 * scheme is case-insensitive; anything else yields null.
 */
export function parseBearerHeader(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = header.trim().match(/^Bearer\s+(\S+)$/i);
  return match?.[1] ?? null;
}
