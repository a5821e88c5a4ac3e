import { StorageError } from '../domain/errors.js';

// Drivers disagree on column types: pg hands back Date and numeric strings,
// better-sqlite3 hands back ISO strings, numbers and 0/1 booleans.
export type DbTimestamp = string | Date;
export type DbDecimal = string | number;
export type DbBoolean = boolean | number | string;

export interface UserRow {
  username: string;
  first_name: string;
  last_name: string;
  email: string | null;
  is_active: DbBoolean;
}

export interface JournalEntryHeaderRow {
  document_number: string;
  company_code: string;
  reference: string | null;
  posting_date: string | null;
  currency_code: string | null;
  created_by: string;
  workflow_status: string;
  submitted_for_approval_at: DbTimestamp | null;
  submitted_by: string | null;
  approved_at: DbTimestamp | null;
  approved_by: string | null;
  rejected_at: DbTimestamp | null;
  rejected_by: string | null;
  rejection_reason: string | null;
}

export interface JournalEntryLineRow {
  document_number: string;
  company_code: string;
  line_item: number;
  gl_account: string | null;
  debit_amount: DbDecimal;
  credit_amount: DbDecimal;
}

export interface ApprovalLevelRow {
  id: number;
  company_code: string;
  level_name: string;
  level_order: number;
  threshold_low: DbDecimal;
  threshold_high: DbDecimal | null;
  time_limit: number;
  approval_mode: string;
  is_active: DbBoolean;
}

export interface ApproverRow {
  id: number;
  user_id: string;
  approval_level_id: number;
  company_code: string | null;
  is_active: DbBoolean;
  delegated_to: string | null;
  delegation_start_date: string | null;
  delegation_end_date: string | null;
}

export interface WorkflowInstanceRow {
  id: number;
  document_number: string;
  company_code: string;
  status: string;
  priority: string;
  approval_level: number;
  created_by: string;
  assigned_to: string | null;
  created_at: DbTimestamp;
  submitted_at: DbTimestamp;
  completed_at: DbTimestamp | null;
  approved_at: DbTimestamp | null;
  approved_by: string | null;
}

export interface ApprovalStepRow {
  id: number;
  workflow_instance_id: number;
  approval_level_id: number;
  assigned_to: string;
  delegated_from: string | null;
  action: string;
  action_by: string | null;
  action_at: DbTimestamp | null;
  comments: string | null;
  created_at: DbTimestamp;
}

export interface WorkflowAuditLogRow {
  id: number;
  document_number: string;
  company_code: string;
  action: string;
  performed_by: string;
  old_status: string | null;
  new_status: string | null;
  comments: string | null;
  timestamp: DbTimestamp;
}

export interface ApprovalNotificationRow {
  id: number;
  workflow_instance_id: number;
  recipient: string;
  notification_type: string;
  subject: string;
  message: string;
  created_at: DbTimestamp;
  is_read: DbBoolean;
}

export function toIso(value: DbTimestamp): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toIsoOrNull(value: DbTimestamp | null): string | null {
  return value === null ? null : toIso(value);
}

export function toNumber(value: DbDecimal): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new StorageError(`unreadable numeric column value: ${String(value)}`);
  }
  return parsed;
}

export function toBool(value: DbBoolean): boolean {
  return value === true || value === 1 || value === '1' || value === 'true' || value === 't';
}

/** Narrows a text column to one of its allowed values. */
export function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new StorageError(`unexpected ${column} value: ${value}`);
  }
  return match;
}

export function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}
