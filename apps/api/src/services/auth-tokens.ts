import * as jose from 'jose';
import { nanoid } from 'nanoid';

export type TokenType = 'access' | 'refresh';

export interface VerifiedToken {
  userId: string;
  type: TokenType;
  // Only refresh tokens carry a jti
  jti: string | null;
  expiresAt: Date;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

interface TokenServiceOptions {
  secret: string;
  accessTtl: string;
  refreshTtl: string;
}

/**
 * HS256 access/refresh tokens.
 *
 * Access payload: `{ sub, type: 'access' }`.
 * Refresh payload: `{ sub, type: 'refresh', jti }`; the jti is what logout revokes.
 */
export class TokenService {
  private readonly secret: Uint8Array;

  constructor(private readonly options: TokenServiceOptions) {
    this.secret = new TextEncoder().encode(options.secret);
  }

  async issuePair(userId: string): Promise<TokenPair> {
    return {
      access: await this.sign(userId, 'access'),
      refresh: await this.sign(userId, 'refresh'),
    };
  }

  sign(userId: string, type: TokenType): Promise<string> {
    const jwt = new jose.SignJWT({ type })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject(userId)
      .setIssuedAt()
      .setExpirationTime(type === 'access' ? this.options.accessTtl : this.options.refreshTtl);

    if (type === 'refresh') {
      jwt.setJti(nanoid());
    }

    return jwt.sign(this.secret);
  }

  async verify(token: string, expected: TokenType): Promise<VerifiedToken | null> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, { algorithms: ['HS256'] }));
    } catch (error) {
      if (error instanceof jose.errors.JOSEError) return null;
      throw error;
    }

    if (payload.type !== expected || !payload.sub || payload.exp === undefined) {
      return null;
    }
    if (expected === 'refresh' && !payload.jti) {
      return null;
    }

    return {
      userId: payload.sub,
      type: expected,
      jti: payload.jti ?? null,
      expiresAt: new Date(payload.exp * 1000),
    };
  }
}
