// =============================================================================
// PUBLISHING DESK — Roles & Permissions
//
// Roles are reference data seeded out of band (db/schema.sql). Permissions
// are granted to roles through the role_permissions relation; the names
// below are the ones the service checks.
// =============================================================================

export const PERMISSIONS = [
  'content.create',
  'content.read_all',
  'content.approve',
  'content.publish',
  'category.create',
  'category.update',
  'category.delete',
  'submit_coop',
  'verify_coop',
  'approve_coop',
  'users.read',
  'users.create',
  'users.update',
  'users.delete',
  'audit.read',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export interface Role {
  id: number;
  name: string;
}

/** One row of the role_permissions relation, resolved to names */
export interface RolePermissionGrant {
  roleId: number;
  permission: string;
}
