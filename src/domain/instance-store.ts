import type { Knex } from 'knex';
import { insertedId, isUniqueViolation, type Database } from '../db/connection.js';
import {
  oneOf,
  toIso,
  toIsoOrNull,
  type ApprovalStepRow,
  type DbTimestamp,
  type WorkflowInstanceRow
} from '../db/rows.js';
import { documentLabel } from './documents.js';
import { StateConflictError } from './errors.js';
import type {
  ApprovalStep,
  Approver,
  DocumentKey,
  StepAction,
  WorkflowInstance,
  WorkflowPriority,
  WorkflowStatus
} from './types.js';

export const WORKFLOW_STATUSES: readonly WorkflowStatus[] = ['PENDING', 'APPROVED', 'REJECTED', 'WITHDRAWN'];
export const WORKFLOW_PRIORITIES: readonly WorkflowPriority[] = ['NORMAL', 'HIGH', 'URGENT'];
const STEP_ACTIONS: readonly StepAction[] = ['PENDING', 'APPROVED', 'REJECTED', 'WITHDRAWN', 'CANCELLED', 'SKIPPED'];

export type TerminalStatus = Exclude<WorkflowStatus, 'PENDING'>;
export type ClosingAction = Extract<StepAction, 'WITHDRAWN' | 'CANCELLED' | 'SKIPPED'>;

export function toInstance(row: WorkflowInstanceRow): WorkflowInstance {
  return {
    id: Number(row.id),
    documentNumber: row.document_number,
    companyCode: row.company_code,
    status: oneOf(WORKFLOW_STATUSES, row.status, 'status'),
    priority: oneOf(WORKFLOW_PRIORITIES, row.priority, 'priority'),
    approvalLevelId: Number(row.approval_level),
    createdBy: row.created_by,
    assignedTo: row.assigned_to,
    createdAt: toIso(row.created_at),
    submittedAt: toIso(row.submitted_at),
    completedAt: toIsoOrNull(row.completed_at),
    approvedAt: toIsoOrNull(row.approved_at),
    approvedBy: row.approved_by
  };
}

export function toStep(row: ApprovalStepRow): ApprovalStep {
  return {
    id: Number(row.id),
    workflowInstanceId: Number(row.workflow_instance_id),
    approvalLevelId: Number(row.approval_level_id),
    assignedTo: row.assigned_to,
    delegatedFrom: row.delegated_from,
    action: oneOf(STEP_ACTIONS, row.action, 'action'),
    actionBy: row.action_by,
    actionAt: toIsoOrNull(row.action_at),
    comments: row.comments,
    createdAt: toIso(row.created_at)
  };
}

export interface NewInstance extends DocumentKey {
  approvalLevelId: number;
  priority: WorkflowPriority;
  createdBy: string;
  at: string;
}

export interface PendingStepRow {
  step_id: number;
  assigned_to: string;
  delegated_from: string | null;
  approval_level_id: number;
  workflow_id: number;
  document_number: string;
  company_code: string;
  priority: string;
  created_by: string;
  document_created_by: string | null;
  submitted_at: DbTimestamp;
  level_name: string;
  time_limit: number;
  reference: string | null;
  posting_date: string | null;
  currency_code: string | null;
}

export interface InstanceListRow extends WorkflowInstanceRow {
  level_name: string | null;
  time_limit: number | null;
}

/**
 * Persistence for workflow instances and their approval steps. Writes take the
 * caller's transaction; at most one PENDING instance per document is guaranteed by
 * the partial unique index `uq_workflow_instances_pending`.
 */
export class WorkflowInstanceStore {
  constructor(private readonly database: Database) {}

  async createInstance(
    input: NewInstance,
    approvers: readonly Approver[],
    trx: Knex.Transaction
  ): Promise<{ instance: WorkflowInstance; steps: ApprovalStep[] }> {
    let instanceId: number;
    try {
      const inserted: Array<{ id: number } | number> = await trx('workflow_instances').insert(
        {
          document_number: input.documentNumber,
          company_code: input.companyCode,
          status: 'PENDING',
          priority: input.priority,
          approval_level: input.approvalLevelId,
          created_by: input.createdBy,
          assigned_to: approvers[0]?.username ?? null,
          created_at: input.at,
          submitted_at: input.at
        },
        ['id']
      );
      instanceId = insertedId(inserted);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`a pending workflow already exists for ${documentLabel(input)}`);
      }
      throw error;
    }

    for (const approver of approvers) {
      await trx('approval_steps').insert({
        workflow_instance_id: instanceId,
        approval_level_id: input.approvalLevelId,
        assigned_to: approver.username,
        delegated_from: approver.delegatedFrom,
        action: 'PENDING',
        created_at: input.at
      });
    }

    const instance = await this.findInstance(instanceId, {}, trx);
    if (!instance) {
      throw new Error(`workflow ${instanceId} vanished after insert`);
    }
    return { instance, steps: await this.listSteps(instanceId, trx) };
  }

  async findInstance(
    id: number,
    options: { lock?: boolean } = {},
    db: Knex = this.database.knex
  ): Promise<WorkflowInstance | null> {
    let query = db('workflow_instances').where({ id });
    if (options.lock && this.database.rowLocks) {
      query = query.forUpdate();
    }
    const row: WorkflowInstanceRow | undefined = await query.first();
    return row ? toInstance(row) : null;
  }

  async findPendingByDocument(
    key: DocumentKey,
    options: { lock?: boolean } = {},
    db: Knex = this.database.knex
  ): Promise<WorkflowInstance | null> {
    let query = db('workflow_instances').where({
      document_number: key.documentNumber,
      company_code: key.companyCode,
      status: 'PENDING'
    });
    if (options.lock && this.database.rowLocks) {
      query = query.forUpdate();
    }
    const row: WorkflowInstanceRow | undefined = await query.first();
    return row ? toInstance(row) : null;
  }

  /** Most recent instance for the document in any status. */
  async findLatestByDocument(key: DocumentKey, db: Knex = this.database.knex): Promise<WorkflowInstance | null> {
    const row: WorkflowInstanceRow | undefined = await db('workflow_instances')
      .where({ document_number: key.documentNumber, company_code: key.companyCode })
      .orderBy('id', 'desc')
      .first();
    return row ? toInstance(row) : null;
  }

  async listSteps(instanceId: number, db: Knex = this.database.knex): Promise<ApprovalStep[]> {
    const rows: ApprovalStepRow[] = await db('approval_steps')
      .where({ workflow_instance_id: instanceId })
      .orderBy('id', 'asc');
    return rows.map(toStep);
  }

  /** Records a decision on a PENDING step. A step that is no longer PENDING is a conflict. */
  async actionStep(
    stepId: number,
    decision: { action: 'APPROVED' | 'REJECTED'; actionBy: string; comments: string | null; at: string },
    trx: Knex.Transaction
  ): Promise<void> {
    const updated = await trx('approval_steps').where({ id: stepId, action: 'PENDING' }).update({
      action: decision.action,
      action_by: decision.actionBy,
      action_at: decision.at,
      comments: decision.comments
    });
    if (updated === 0) {
      throw new StateConflictError(`approval step ${stepId} has already been actioned`);
    }
  }

  /** Closes every PENDING step of the instance and returns how many were closed. */
  async closePendingSteps(
    instanceId: number,
    action: ClosingAction,
    closedBy: string,
    at: string,
    trx: Knex.Transaction
  ): Promise<number> {
    const closed = await trx('approval_steps').where({ workflow_instance_id: instanceId, action: 'PENDING' }).update({
      action,
      action_by: closedBy,
      action_at: at
    });
    return closed;
  }

  async completeInstance(
    instanceId: number,
    outcome: { status: TerminalStatus; at: string; approvedBy?: string },
    trx: Knex.Transaction
  ): Promise<void> {
    await trx('workflow_instances')
      .where({ id: instanceId, status: 'PENDING' })
      .update({
        status: outcome.status,
        completed_at: outcome.at,
        ...(outcome.status === 'APPROVED' ? { approved_at: outcome.at, approved_by: outcome.approvedBy ?? null } : {})
      });
  }

  /** Moves `fromUser`'s PENDING steps to `toUser`; returns the number moved. */
  async reassignSteps(instanceId: number, fromUser: string, toUser: string, trx: Knex.Transaction): Promise<number> {
    const moved = await trx('approval_steps')
      .where({ workflow_instance_id: instanceId, assigned_to: fromUser, action: 'PENDING' })
      .update({ assigned_to: toUser, delegated_from: null });
    if (moved > 0) {
      await trx('workflow_instances')
        .where({ id: instanceId, assigned_to: fromUser })
        .update({ assigned_to: toUser });
    }
    return moved;
  }

  /** PENDING steps on PENDING instances assigned to any of `assignees`, oldest submission first. */
  async listPendingSteps(assignees: readonly string[], db: Knex = this.database.knex): Promise<PendingStepRow[]> {
    if (assignees.length === 0) return [];
    const rows: PendingStepRow[] = await db('approval_steps as s')
      .join('workflow_instances as w', 'w.id', 's.workflow_instance_id')
      .join('approval_levels as l', 'l.id', 'w.approval_level')
      .leftJoin('journal_entry_headers as h', (join) => {
        join.on('h.document_number', '=', 'w.document_number').andOn('h.company_code', '=', 'w.company_code');
      })
      .where('s.action', 'PENDING')
      .andWhere('w.status', 'PENDING')
      .whereIn('s.assigned_to', [...assignees])
      .select(
        's.id as step_id',
        's.assigned_to',
        's.delegated_from',
        's.approval_level_id',
        'w.id as workflow_id',
        'w.document_number',
        'w.company_code',
        'w.priority',
        'w.created_by',
        'w.submitted_at',
        'l.level_name',
        'l.time_limit',
        'h.created_by as document_created_by',
        'h.reference',
        'h.posting_date',
        'h.currency_code'
      )
      .orderBy([
        { column: 'w.submitted_at', order: 'asc' },
        { column: 's.id', order: 'asc' }
      ]);
    return rows;
  }

  /** Instances created at or after `since`, newest first, with their level. */
  async listInstances(
    filter: { status?: WorkflowStatus; since?: string },
    db: Knex = this.database.knex
  ): Promise<InstanceListRow[]> {
    let query = db('workflow_instances as w')
      .leftJoin('approval_levels as l', 'l.id', 'w.approval_level')
      .select('w.*', 'l.level_name', 'l.time_limit');
    if (filter.status) {
      query = query.where('w.status', filter.status);
    }
    if (filter.since) {
      query = query.where('w.created_at', '>=', filter.since);
    }
    const rows: InstanceListRow[] = await query.orderBy([
      { column: 'w.created_at', order: 'desc' },
      { column: 'w.id', order: 'desc' }
    ]);
    return rows;
  }

  async countByLevel(db: Knex = this.database.knex): Promise<Array<{ level: string; count: number }>> {
    const rows: Array<{ level_name: string | null; count: string | number }> = await db('workflow_instances as w')
      .leftJoin('approval_levels as l', 'l.id', 'w.approval_level')
      .select('l.level_name')
      .count({ count: 'w.id' })
      .groupBy('l.level_name');
    return rows
      .map((row) => ({ level: row.level_name ?? 'Unknown', count: Number(row.count) }))
      .sort((a, b) => b.count - a.count || a.level.localeCompare(b.level));
  }

  async topApprovers(since: string, limit: number, db: Knex = this.database.knex): Promise<Array<{ approver: string; count: number }>> {
    const rows: Array<{ action_by: string; count: string | number }> = await db('approval_steps')
      .where('action', 'APPROVED')
      .andWhere('action_at', '>=', since)
      .whereNotNull('action_by')
      .select('action_by')
      .count({ count: 'id' })
      .groupBy('action_by');
    return rows
      .map((row) => ({ approver: row.action_by, count: Number(row.count) }))
      .sort((a, b) => b.count - a.count || a.approver.localeCompare(b.approver))
      .slice(0, limit);
  }
}
