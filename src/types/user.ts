// =============================================================================
// PUBLISHING DESK — User Types
// =============================================================================

export interface UserRecord {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  fullName: string;
  roleId: number;
  roleName: string;
  isActive: boolean;
  createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  fullName: string;
  roleId: number;
}

/** Editable account fields; the role is fixed at creation */
export interface UserUpdate {
  fullName: string;
  email: string;
  isActive: boolean;
}

export interface UserListFilter {
  roleId?: number;
  isActive?: boolean;
  search?: string;
  limit: number;
  offset: number;
}

export interface SessionRecord {
  id: string;
  userId: number;
  tokenId: string;
  createdAt: Date;
  terminatedAt: Date | null;
}

export interface NewSession {
  id: string;
  userId: number;
  tokenId: string;
  ipAddress: string | null;
  userAgent: string | null;
}

/** Public projection — never carries the password hash */
export function toUserView(user: UserRecord) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    full_name: user.fullName,
    role_id: user.roleId,
    role_name: user.roleName,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
  };
}
