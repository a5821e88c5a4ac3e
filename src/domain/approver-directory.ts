import type { Knex } from 'knex';
import type { Database } from '../db/connection.js';
import { toBool, type ApproverRow, type UserRow } from '../db/rows.js';
import { NotFoundError, ValidationError } from './errors.js';
import type { Approver, Delegation } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface DelegationInput {
  userId: string;
  approvalLevelId: number;
  companyCode: string | null;
  delegateTo: string;
  startDate: string | null;
  endDate: string | null;
}

export type AssignmentKey = Pick<DelegationInput, 'userId' | 'approvalLevelId' | 'companyCode'>;

/** Calendar date (UTC) used for delegation windows. */
export function calendarDate(at: Date): string {
  return at.toISOString().slice(0, 10);
}

export function isDelegationActive(row: ApproverRow, today: string): boolean {
  if (!row.delegated_to) return false;
  if (row.delegation_start_date !== null && row.delegation_start_date > today) return false;
  if (row.delegation_end_date !== null && row.delegation_end_date < today) return false;
  return true;
}

/**
 * Whether `actor` may decide a step: it is assigned to them, or to someone whose
 * assignment for that level and company is currently delegated to them.
 */
export function canActOnStep(
  actor: string,
  step: { assignedTo: string; approvalLevelId: number },
  companyCode: string,
  delegations: readonly Delegation[]
): boolean {
  if (step.assignedTo === actor) return true;
  return delegations.some(
    (delegation) =>
      delegation.userId === step.assignedTo &&
      delegation.approvalLevelId === step.approvalLevelId &&
      (delegation.companyCode === null || delegation.companyCode === companyCode)
  );
}

function fullNameOf(user: UserRow): string {
  const name = `${user.first_name} ${user.last_name}`.trim();
  return name || user.username;
}

function toDelegation(row: ApproverRow): Delegation {
  return {
    userId: row.user_id,
    approvalLevelId: Number(row.approval_level_id),
    companyCode: row.company_code,
    delegatedTo: row.delegated_to ?? '',
    startDate: row.delegation_start_date,
    endDate: row.delegation_end_date
  };
}

function assertDate(value: string | null, field: string): void {
  if (value !== null && !ISO_DATE.test(value)) {
    throw new ValidationError(`${field} must be a YYYY-MM-DD date`);
  }
}

export class ApproverDirectory {
  constructor(private readonly database: Database) {}

  /**
   * Approvers eligible for a level in a company, ordered by username. A delegation
   * active on `today` puts the delegate in place of the configured approver.
   * `excludedUser` (the submitter) is never returned.
   */
  async getAvailableApprovers(
    levelId: number,
    companyCode: string,
    excludedUser: string | null,
    today: string,
    db: Knex = this.database.knex
  ): Promise<Approver[]> {
    const assignments: ApproverRow[] = await db('approvers')
      .where({ approval_level_id: levelId, is_active: true })
      .andWhere((builder) => {
        builder.where('company_code', companyCode).orWhereNull('company_code');
      })
      .orderBy('user_id', 'asc');

    const candidates = assignments.map((row) =>
      isDelegationActive(row, today) && row.delegated_to
        ? { username: row.delegated_to, delegatedFrom: row.user_id }
        : { username: row.user_id, delegatedFrom: null }
    );
    if (candidates.length === 0) return [];

    const users = await this.activeUsers(
      candidates.map((candidate) => candidate.username),
      db
    );

    const byUsername = new Map<string, Approver>();
    for (const candidate of candidates) {
      if (candidate.username === excludedUser) continue;
      const user = users.get(candidate.username);
      if (!user) continue;
      const existing = byUsername.get(candidate.username);
      // a direct assignment wins over standing in for someone else
      if (existing && (existing.delegatedFrom === null || candidate.delegatedFrom !== null)) continue;
      byUsername.set(candidate.username, {
        username: user.username,
        fullName: fullNameOf(user),
        email: user.email,
        delegatedFrom: candidate.delegatedFrom
      });
    }

    return [...byUsername.values()].sort((a, b) => a.username.localeCompare(b.username));
  }

  /** Assignments delegated to `username` and active on `today`. */
  async getDelegationsFor(username: string, today: string, db: Knex = this.database.knex): Promise<Delegation[]> {
    const rows: ApproverRow[] = await db('approvers').where({ delegated_to: username, is_active: true });
    return rows.filter((row) => isDelegationActive(row, today)).map(toDelegation);
  }

  /** Users whose assignments are delegated to `username` on `today`. */
  async getDelegatorsFor(username: string, today: string, db: Knex = this.database.knex): Promise<string[]> {
    const delegations = await this.getDelegationsFor(username, today, db);
    return [...new Set(delegations.map((delegation) => delegation.userId))].sort();
  }

  async setDelegation(input: DelegationInput, db: Knex = this.database.knex): Promise<Delegation> {
    const delegateTo = input.delegateTo.trim();
    if (!delegateTo) {
      throw new ValidationError('delegate is required');
    }
    if (delegateTo === input.userId) {
      throw new ValidationError('an approver cannot delegate to themselves');
    }
    assertDate(input.startDate, 'startDate');
    assertDate(input.endDate, 'endDate');
    if (input.startDate !== null && input.endDate !== null && input.endDate < input.startDate) {
      throw new ValidationError('endDate must not be before startDate');
    }

    if (!(await this.isActiveUser(delegateTo, db))) {
      throw new ValidationError(`delegate is not an active user: ${delegateTo}`);
    }

    const assignment = await this.requireAssignment(input, db);
    await db('approvers').where({ id: assignment.id }).update({
      delegated_to: delegateTo,
      delegation_start_date: input.startDate,
      delegation_end_date: input.endDate
    });

    return toDelegation({
      ...assignment,
      delegated_to: delegateTo,
      delegation_start_date: input.startDate,
      delegation_end_date: input.endDate
    });
  }

  async clearDelegation(key: AssignmentKey, db: Knex = this.database.knex): Promise<void> {
    const assignment = await this.requireAssignment(key, db);
    await db('approvers').where({ id: assignment.id }).update({
      delegated_to: null,
      delegation_start_date: null,
      delegation_end_date: null
    });
  }

  async isActiveUser(username: string, db: Knex = this.database.knex): Promise<boolean> {
    const users = await this.activeUsers([username], db);
    return users.has(username);
  }

  private async requireAssignment(key: AssignmentKey, db: Knex): Promise<ApproverRow> {
    let query = db('approvers').where({ user_id: key.userId, approval_level_id: key.approvalLevelId });
    query = key.companyCode === null ? query.whereNull('company_code') : query.where('company_code', key.companyCode);
    const row: ApproverRow | undefined = await query.first();
    if (!row) {
      throw new NotFoundError(
        `no approver assignment for ${key.userId} at level ${key.approvalLevelId} (${key.companyCode ?? 'all companies'})`
      );
    }
    return row;
  }

  private async activeUsers(usernames: readonly string[], db: Knex): Promise<Map<string, UserRow>> {
    const rows: UserRow[] = await db('users').whereIn('username', [...new Set(usernames)]);
    return new Map(rows.filter((row) => toBool(row.is_active)).map((row) => [row.username, row]));
  }
}
