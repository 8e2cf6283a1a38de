// =============================================================================
// PUBLISHING DESK — Cooperation Request Types
// =============================================================================

export const COOPERATION_STATUSES = ['submitted', 'verified', 'approved'] as const;
export type CooperationStatus = (typeof COOPERATION_STATUSES)[number];

export type CooperationAction = 'verify' | 'approve';

export interface CooperationDetails {
  institutionName: string;
  contactName: string;
  email: string;
  phone: string | null;
  purpose: string;
  eventDate: string | null;
  documentName: string;
  documentMime: string;
  documentSize: number;
  /** sha-256 of the attachment bytes; storage itself is external */
  documentRef: string;
}

export interface CooperationRecord extends CooperationDetails {
  id: number;
  requesterId: number;
  status: CooperationStatus;
  verifiedBy: number | null;
  verifiedAt: Date | null;
  approvedBy: number | null;
  approvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewCooperation extends CooperationDetails {
  requesterId: number;
}

export function toCooperationView(coop: CooperationRecord) {
  return {
    id: coop.id,
    requester_id: coop.requesterId,
    institution_name: coop.institutionName,
    contact_name: coop.contactName,
    email: coop.email,
    phone: coop.phone,
    purpose: coop.purpose,
    event_date: coop.eventDate,
    document_name: coop.documentName,
    document_mime: coop.documentMime,
    document_size: coop.documentSize,
    document_ref: coop.documentRef,
    status: coop.status,
    verified_by: coop.verifiedBy,
    verified_at: coop.verifiedAt ? coop.verifiedAt.toISOString() : null,
    approved_by: coop.approvedBy,
    approved_at: coop.approvedAt ? coop.approvedAt.toISOString() : null,
    created_at: coop.createdAt.toISOString(),
  };
}
