// =============================================================================
// PUBLISHING DESK — Content Types
// =============================================================================

export const CONTENT_STATUSES = ['draft', 'pending', 'approved', 'rejected', 'published'] as const;
export type ContentStatus = (typeof CONTENT_STATUSES)[number];

export const CONTENT_ACTIONS = ['submit', 'approve', 'reject', 'publish'] as const;
export type ContentAction = (typeof CONTENT_ACTIONS)[number];

/** Actions recorded in the approval history */
export type ApprovalDecision = 'approve' | 'reject';

export interface ContentRecord {
  id: number;
  authorId: number;
  categoryId: number;
  title: string;
  body: string;
  excerpt: string | null;
  status: ContentStatus;
  createdAt: Date;
  updatedAt: Date;
  publishedAt: Date | null;
}

export interface ContentFields {
  categoryId: number;
  title: string;
  body: string;
  excerpt: string | null;
}

export interface NewContent extends ContentFields {
  authorId: number;
}

/**
 * One approval-stage action. Append-only; approverRole is the role name
 * at the time of the action, not a live join.
 */
export interface ContentApprovalRecord {
  id: number;
  contentId: number;
  approverId: number;
  approverName: string;
  approverRole: string;
  action: ApprovalDecision;
  notes: string | null;
  createdAt: Date;
}

export interface NewContentApproval {
  contentId: number;
  approverId: number;
  approverRole: string;
  action: ApprovalDecision;
  notes: string | null;
}

export function toContentView(content: ContentRecord) {
  return {
    id: content.id,
    author_id: content.authorId,
    category_id: content.categoryId,
    title: content.title,
    body: content.body,
    excerpt: content.excerpt,
    status: content.status,
    created_at: content.createdAt.toISOString(),
    updated_at: content.updatedAt.toISOString(),
    published_at: content.publishedAt ? content.publishedAt.toISOString() : null,
  };
}

export function toApprovalView(record: ContentApprovalRecord) {
  return {
    id: record.id,
    content_id: record.contentId,
    approver_id: record.approverId,
    approver_name: record.approverName,
    approver_role: record.approverRole,
    action: record.action,
    notes: record.notes,
    created_at: record.createdAt.toISOString(),
  };
}
