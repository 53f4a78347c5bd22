import { randomUUID } from 'crypto';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { TokenError } from './errors.js';

const ALGORITHM = 'HS256';
const REFRESH_TYPE = 'refresh';

export const MIN_SECRET_LENGTH = 32;

export interface AccessClaims {
  subjectId: string;
  email: string;
  issuedAt: number;
  expiresAt: number;
}

export interface RefreshClaims {
  subjectId: string;
  tokenId: string;
  issuedAt: number;
  expiresAt: number;
}

export interface TokenCodecOptions {
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

/**
 * Signs and verifies HS256 JWTs. Access tokens carry `sub`, `email`, `iat`
 * and `exp`; refresh tokens carry `sub`, `iat`, `exp`, `jti` and
 * `type: "refresh"`. Timestamps in claims are Unix seconds.
 */
export class TokenCodec {
  private readonly secret: string;

  constructor(private readonly options: TokenCodecOptions) {
    if (options.secret.length < MIN_SECRET_LENGTH) {
      throw new Error(`Signing secret must be at least ${MIN_SECRET_LENGTH} characters long`);
    }
    this.secret = options.secret;
  }

  get accessTokenTtlSeconds(): number {
    return this.options.accessTokenTtlSeconds;
  }

  get refreshTokenTtlSeconds(): number {
    return this.options.refreshTokenTtlSeconds;
  }

  issueAccess(subjectId: string, email: string): string {
    return jwt.sign({ sub: subjectId, email }, this.secret, {
      algorithm: ALGORITHM,
      expiresIn: this.options.accessTokenTtlSeconds,
    });
  }

  issueRefresh(subjectId: string): string {
    return jwt.sign({ sub: subjectId, type: REFRESH_TYPE }, this.secret, {
      algorithm: ALGORITHM,
      expiresIn: this.options.refreshTokenTtlSeconds,
      jwtid: randomUUID(),
    });
  }

  verifyAccess(token: string): AccessClaims {
    const payload = this.decode(token);

    // A refresh token is never accepted where an access token is expected
    if (payload.type !== undefined) {
      throw new TokenError('wrong_type', 'Unexpected token type');
    }

    const { sub, email, iat, exp } = payload;
    if (typeof sub !== 'string' || typeof email !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new TokenError('malformed', 'Token claims are missing or invalid');
    }

    return { subjectId: sub, email, issuedAt: iat, expiresAt: exp };
  }

  verifyRefresh(token: string): RefreshClaims {
    const payload = this.decode(token);

    if (payload.type !== REFRESH_TYPE) {
      throw new TokenError('wrong_type', 'Not a refresh token');
    }

    const { sub, jti, iat, exp } = payload;
    if (typeof sub !== 'string' || typeof jti !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new TokenError('malformed', 'Token claims are missing or invalid');
    }

    return { subjectId: sub, tokenId: jti, issuedAt: iat, expiresAt: exp };
  }

  private decode(token: string): JwtPayload {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: [ALGORITHM] });
    } catch (error) {
      throw toTokenError(error);
    }

    if (typeof payload === 'string') {
      throw new TokenError('malformed', 'Token payload is not a claims object');
    }
    return payload;
  }
}

function toTokenError(error: unknown): TokenError {
  if (error instanceof jwt.TokenExpiredError) {
    return new TokenError('expired', 'Token has expired');
  }
  if (error instanceof jwt.JsonWebTokenError) {
    switch (error.message) {
      case 'invalid algorithm':
      case 'jwt signature is required':
        return new TokenError('unsupported_algorithm', 'Unexpected signing algorithm');
      case 'invalid signature':
        return new TokenError('invalid_signature', 'Invalid token signature');
      default:
        return new TokenError('malformed', 'Malformed token');
    }
  }
  // NotBeforeError and anything unexpected
  return new TokenError('malformed', 'Malformed token');
}
