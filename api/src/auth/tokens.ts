import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { createHash } from 'crypto';

export interface IssuedToken {
  token: string;
  tokenHash: string;
  expiresAt: Date;
}

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Signs access tokens and checks their signature and expiry. Revocation is
 * handled by the token store: a token is only accepted while its hash is
 * stored there.
 */
export class TokenIssuer {
  constructor(
    private readonly secret: string,
    private readonly ttlHours: number
  ) {}

  issue(userId: string, now: Date = new Date()): IssuedToken {
    const token = jwt.sign({ sub: userId, type: 'access' }, this.secret, {
      algorithm: 'HS256',
      expiresIn: `${this.ttlHours}h`,
      jwtid: uuidv4(),
    });
    return {
      token,
      tokenHash: hashToken(token),
      expiresAt: new Date(now.getTime() + this.ttlHours * 60 * 60 * 1000),
    };
  }

  /** User id carried by a valid access token, or null. */
  verify(token: string): string | null {
    try {
      const decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
      if (typeof decoded === 'string' || decoded.type !== 'access' || typeof decoded.sub !== 'string') {
        return null;
      }
      return decoded.sub;
    } catch {
      return null;
    }
  }
}

/** Token from `Authorization: Token <t>` or `Authorization: Bearer <t>`. */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^(?:Token|Bearer)\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : null;
}
