import type { Knex } from 'knex';
import type { Database } from '../db/connection.js';
import {
  oneOf,
  roundCents,
  toIsoOrNull,
  toNumber,
  type DbDecimal,
  type JournalEntryHeaderRow,
  type JournalEntryLineRow
} from '../db/rows.js';
import type { DocumentKey, DocumentWorkflowStatus, JournalDocument, JournalLine } from './types.js';

const DOCUMENT_STATUSES: readonly DocumentWorkflowStatus[] = ['DRAFT', 'PENDING_APPROVAL', 'APPROVED', 'REJECTED'];

// max(debit, credit) per line, portable across pg and sqlite
const LINE_MAGNITUDE = 'CASE WHEN debit_amount >= credit_amount THEN debit_amount ELSE credit_amount END';

function toDocument(row: JournalEntryHeaderRow): JournalDocument {
  return {
    documentNumber: row.document_number,
    companyCode: row.company_code,
    reference: row.reference,
    postingDate: row.posting_date,
    currencyCode: row.currency_code,
    createdBy: row.created_by,
    workflowStatus: oneOf(DOCUMENT_STATUSES, row.workflow_status, 'workflow_status'),
    submittedAt: toIsoOrNull(row.submitted_for_approval_at),
    submittedBy: row.submitted_by
  };
}

function keyOf(key: DocumentKey): { document_number: string; company_code: string } {
  return { document_number: key.documentNumber, company_code: key.companyCode };
}

export function documentLabel(key: DocumentKey): string {
  return `${key.documentNumber}/${key.companyCode}`;
}

/**
 * The engine's view of a journal entry. The header row and its lines belong to the
 * ledger; only the workflow columns are written here.
 */
export class JournalDocumentGateway {
  constructor(private readonly database: Database) {}

  async findDocument(
    key: DocumentKey,
    options: { lock?: boolean } = {},
    db: Knex = this.database.knex
  ): Promise<JournalDocument | null> {
    let query = db('journal_entry_headers').where(keyOf(key));
    if (options.lock && this.database.rowLocks) {
      query = query.forUpdate();
    }
    const row: JournalEntryHeaderRow | undefined = await query.first();
    return row ? toDocument(row) : null;
  }

  async listLines(key: DocumentKey, db: Knex = this.database.knex): Promise<JournalLine[]> {
    const rows: JournalEntryLineRow[] = await db('journal_entry_lines').where(keyOf(key)).orderBy('line_item', 'asc');
    return rows.map((row) => ({
      lineItem: Number(row.line_item),
      glAccount: row.gl_account,
      debitAmount: toNumber(row.debit_amount),
      creditAmount: toNumber(row.credit_amount)
    }));
  }

  /** Totals keyed by `documentNumber/companyCode`; documents without lines are absent. */
  async totalsFor(keys: readonly DocumentKey[], db: Knex = this.database.knex): Promise<Map<string, number>> {
    const totals = new Map<string, number>();
    if (keys.length === 0) return totals;

    const documentNumbers = [...new Set(keys.map((key) => key.documentNumber))];
    const wanted = new Set(keys.map(documentLabel));
    const rows: Array<{ document_number: string; company_code: string; total: DbDecimal | null }> = await db(
      'journal_entry_lines'
    )
      .select('document_number', 'company_code')
      .select(db.raw(`SUM(${LINE_MAGNITUDE}) AS total`))
      .whereIn('document_number', documentNumbers)
      .groupBy('document_number', 'company_code');

    for (const row of rows) {
      const label = documentLabel({ documentNumber: row.document_number, companyCode: row.company_code });
      if (wanted.has(label)) {
        totals.set(label, roundCents(row.total === null ? 0 : toNumber(row.total)));
      }
    }
    return totals;
  }

  async markSubmitted(key: DocumentKey, submittedBy: string, at: string, db: Knex): Promise<void> {
    await db('journal_entry_headers').where(keyOf(key)).update({
      workflow_status: 'PENDING_APPROVAL',
      submitted_for_approval_at: at,
      submitted_by: submittedBy,
      rejected_at: null,
      rejected_by: null,
      rejection_reason: null
    });
  }

  async markApproved(key: DocumentKey, approvedBy: string, at: string, db: Knex): Promise<void> {
    await db('journal_entry_headers').where(keyOf(key)).update({
      workflow_status: 'APPROVED',
      approved_at: at,
      approved_by: approvedBy
    });
  }

  async markRejected(key: DocumentKey, rejectedBy: string, reason: string, at: string, db: Knex): Promise<void> {
    await db('journal_entry_headers').where(keyOf(key)).update({
      workflow_status: 'REJECTED',
      rejected_at: at,
      rejected_by: rejectedBy,
      rejection_reason: reason
    });
  }

  async revertToDraft(key: DocumentKey, db: Knex): Promise<void> {
    await db('journal_entry_headers').where(keyOf(key)).update({
      workflow_status: 'DRAFT',
      submitted_for_approval_at: null,
      submitted_by: null
    });
  }
}
