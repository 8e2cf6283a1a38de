// =============================================================================
// PUBLISHING DESK — Access Tokens
//
// HS256 bearer tokens. The identity a request runs under is read from the
// verified claims only; nothing here consults the user table, so what was
// signed is what is enforced.
// =============================================================================

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AccessTokenClaims, AuthenticatedUser } from '../types/auth';
import { UnauthenticatedError } from '../types/errors';

const ALGORITHM = 'HS256' as const;

const claimsSchema: z.ZodType<AccessTokenClaims> = z.object({
  sub: z.string().regex(/^\d+$/),
  jti: z.string().min(1),
  role: z.number().int().positive(),
  role_name: z.string(),
  iat: z.number(),
  exp: z.number(),
});

export interface IssuedToken {
  token: string;
  tokenId: string;
  expiresIn: number;
}

export function issueAccessToken(
  identity: { userId: number; roleId: number; roleName: string },
  jwtConfig: { secret: string; expirySeconds: number },
): IssuedToken {
  const tokenId = uuidv4();
  const token = jwt.sign(
    { role: identity.roleId, role_name: identity.roleName },
    jwtConfig.secret,
    {
      algorithm: ALGORITHM,
      expiresIn: jwtConfig.expirySeconds,
      subject: String(identity.userId),
      jwtid: tokenId,
    },
  );
  return { token, tokenId, expiresIn: jwtConfig.expirySeconds };
}

/**
 * Verify signature, expiry and claim shape. Any failure is
 * UnauthenticatedError; there is no partial result.
 */
export function verifyAccessToken(token: string, secret: string): AuthenticatedUser {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: [ALGORITHM] });
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      throw new UnauthenticatedError('Token expired');
    }
    throw new UnauthenticatedError('Invalid token');
  }

  const claims = claimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new UnauthenticatedError('Invalid token claims');
  }

  return {
    id: parseInt(claims.data.sub, 10),
    roleId: claims.data.role,
    roleName: claims.data.role_name,
    tokenId: claims.data.jti,
  };
}

/** Extract the token from an `Authorization: Bearer <token>` header. */
export function bearerToken(header: string | undefined): string {
  if (!header?.startsWith('Bearer ')) {
    throw new UnauthenticatedError('Authentication required');
  }
  const token = header.slice(7).trim();
  if (token.split('.').length !== 3) {
    throw new UnauthenticatedError('Malformed token');
  }
  return token;
}
