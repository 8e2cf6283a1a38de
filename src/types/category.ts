// =============================================================================
// PUBLISHING DESK — Category Types
// =============================================================================

export interface CategoryRecord {
  id: number;
  name: string;
  description: string | null;
  icon: string | null;
  color: string | null;
  createdBy: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CategoryFields {
  name: string;
  description: string | null;
  icon: string | null;
  color: string | null;
}

export function toCategoryView(category: CategoryRecord) {
  return {
    id: category.id,
    name: category.name,
    description: category.description,
    icon: category.icon,
    color: category.color,
    created_by: category.createdBy,
    created_at: category.createdAt.toISOString(),
    updated_at: category.updatedAt.toISOString(),
  };
}
