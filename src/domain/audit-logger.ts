import type { Knex } from 'knex';
import { insertedId, type Database } from '../db/connection.js';
import { oneOf, toIso, type WorkflowAuditLogRow } from '../db/rows.js';
import type { AuditAction, AuditLogEntry, AuditTrailFilter, DocumentWorkflowStatus } from './types.js';

const AUDIT_ACTIONS: readonly AuditAction[] = [
  'SUBMITTED_FOR_APPROVAL',
  'APPROVED',
  'STEP_APPROVED',
  'REJECTED',
  'WITHDRAWN',
  'REASSIGNED'
];
const DOCUMENT_STATUSES: readonly DocumentWorkflowStatus[] = ['DRAFT', 'PENDING_APPROVAL', 'APPROVED', 'REJECTED'];

export type AuditInput = Omit<AuditLogEntry, 'id'>;

function toEntry(row: WorkflowAuditLogRow): AuditLogEntry {
  return {
    id: Number(row.id),
    documentNumber: row.document_number,
    companyCode: row.company_code,
    action: oneOf(AUDIT_ACTIONS, row.action, 'audit action'),
    performedBy: row.performed_by,
    oldStatus: row.old_status === null ? null : oneOf(DOCUMENT_STATUSES, row.old_status, 'old_status'),
    newStatus: row.new_status === null ? null : oneOf(DOCUMENT_STATUSES, row.new_status, 'new_status'),
    comments: row.comments,
    timestamp: toIso(row.timestamp)
  };
}

/** Append-only trail of workflow transitions, keyed by document identity. */
export class AuditLogger {
  constructor(private readonly database: Database) {}

  async record(entry: AuditInput, trx: Knex.Transaction): Promise<number> {
    const inserted: Array<{ id: number } | number> = await trx('workflow_audit_log').insert(
      {
        document_number: entry.documentNumber,
        company_code: entry.companyCode,
        action: entry.action,
        performed_by: entry.performedBy,
        old_status: entry.oldStatus,
        new_status: entry.newStatus,
        comments: entry.comments,
        timestamp: entry.timestamp
      },
      ['id']
    );
    return insertedId(inserted);
  }

  /** Newest first. `since` bounds the timestamp from below when given. */
  async query(
    filter: Omit<AuditTrailFilter, 'daysBack'> & { since?: string },
    db: Knex = this.database.knex
  ): Promise<AuditLogEntry[]> {
    let query = db('workflow_audit_log');
    if (filter.documentNumber) query = query.where('document_number', filter.documentNumber);
    if (filter.companyCode) query = query.where('company_code', filter.companyCode);
    if (filter.performedBy) query = query.where('performed_by', filter.performedBy);
    if (filter.since) query = query.where('timestamp', '>=', filter.since);

    const rows: WorkflowAuditLogRow[] = await query.orderBy([
      { column: 'timestamp', order: 'desc' },
      { column: 'id', order: 'desc' }
    ]);
    return rows.map(toEntry);
  }
}
