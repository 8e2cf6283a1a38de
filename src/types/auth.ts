// =============================================================================
// PUBLISHING DESK — Authentication Types
// =============================================================================

/** JWT payload stored in the access token */
export interface AccessTokenClaims {
  /** User ID (decimal string) */
  sub: string;
  /** JWT ID — unique token identifier, maps to sessions.token_id */
  jti: string;
  /** Role ID at issuance */
  role: number;
  /** Role name at issuance, for audit attribution */
  role_name: string;
  /** Issued at (epoch seconds) */
  iat: number;
  /** Expires at (epoch seconds) */
  exp: number;
}

/** Identity resolved from a verified token */
export interface AuthenticatedUser {
  id: number;
  roleId: number;
  roleName: string;
  tokenId: string;
}
