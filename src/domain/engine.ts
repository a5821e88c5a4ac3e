import type { Knex } from 'knex';
import type { Database } from '../db/connection.js';
import { oneOf, toIso } from '../db/rows.js';
import { createLogger, describeError, type LogFields, type Logger } from '../logger.js';
import {
  ApproverDirectory,
  calendarDate,
  canActOnStep,
  type AssignmentKey,
  type DelegationInput
} from './approver-directory.js';
import { AuditLogger } from './audit-logger.js';
import { documentLabel, JournalDocumentGateway } from './documents.js';
import { AuthorizationError, isRecoverable, NotFoundError, StateConflictError, StorageError, ValidationError } from './errors.js';
import { toInstance, WORKFLOW_PRIORITIES, WorkflowInstanceStore, type InstanceListRow } from './instance-store.js';
import { ApprovalLevelResolver } from './level-resolver.js';
import { KnexNotificationDispatcher, type NotificationDispatcher } from './notifications.js';
import type {
  ApprovalStep,
  Approver,
  AuditLogEntry,
  AuditTrailFilter,
  Delegation,
  DocumentKey,
  Notification,
  NotificationInput,
  PendingApproval,
  SubmitOptions,
  WorkflowDetail,
  WorkflowInstance,
  WorkflowResult,
  WorkflowStatistics,
  WorkflowStatus,
  WorkflowSummary
} from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const DEFAULT_DAYS_BACK = 30;
const TOP_APPROVER_WINDOW_DAYS = 30;
const TOP_APPROVER_LIMIT = 5;
const GENERIC_FAILURE = 'The operation could not be completed. Please try again later.';

export interface WorkflowEngineOptions {
  now?: () => Date;
  logger?: Logger;
  notifications?: NotificationDispatcher;
}

type Success = Extract<WorkflowResult, { success: true }>;

interface Transition {
  result: Success;
  notifications: NotificationInput[];
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function assertDaysBack(daysBack: number): void {
  if (!Number.isInteger(daysBack) || daysBack <= 0) {
    throw new ValidationError('daysBack must be a positive integer');
  }
}

function requireActor(actor: string, role: string): string {
  const trimmed = actor.trim();
  if (!trimmed) {
    throw new ValidationError(`${role} is required`);
  }
  return trimmed;
}

/**
 * Orchestrates journal-entry approval. Every transition runs in one transaction with
 * the workflow row locked and writes exactly one audit entry; notifications are
 * enqueued after commit.
 */
export class WorkflowEngine {
  private readonly documents: JournalDocumentGateway;
  private readonly resolver: ApprovalLevelResolver;
  private readonly directory: ApproverDirectory;
  private readonly store: WorkflowInstanceStore;
  private readonly audit: AuditLogger;
  private readonly inbox: KnexNotificationDispatcher;
  private readonly notifications: NotificationDispatcher;
  private readonly logger: Logger;

  constructor(
    private readonly database: Database,
    private readonly options: WorkflowEngineOptions = {}
  ) {
    this.documents = new JournalDocumentGateway(database);
    this.resolver = new ApprovalLevelResolver(database, this.documents);
    this.directory = new ApproverDirectory(database);
    this.store = new WorkflowInstanceStore(database);
    this.audit = new AuditLogger(database);
    this.inbox = new KnexNotificationDispatcher(database);
    this.notifications = options.notifications ?? this.inbox;
    this.logger = options.logger ?? createLogger();
  }

  async submitForApproval(key: DocumentKey, submittedBy: string, options: SubmitOptions = {}): Promise<WorkflowResult> {
    return this.execute('submitForApproval', { ...key, userId: submittedBy }, async (trx) => {
      const submitter = requireActor(submittedBy, 'submitter');
      const at = this.nowIso();

      const document = await this.documents.findDocument(key, { lock: true }, trx);
      if (!document) {
        throw new ValidationError(`document not found: ${documentLabel(key)}`);
      }
      if (document.workflowStatus !== 'DRAFT') {
        throw new StateConflictError(
          `document ${documentLabel(key)} is ${document.workflowStatus}; only DRAFT documents can be submitted`
        );
      }
      if (await this.store.findPendingByDocument(key, {}, trx)) {
        throw new StateConflictError(`a pending workflow already exists for ${documentLabel(key)}`);
      }

      const { amount, level } = await this.resolver.resolveLevel(key, trx);
      if (amount <= 0) {
        throw new ValidationError(`document ${documentLabel(key)} has a zero total amount`);
      }
      if (!level) {
        throw new ValidationError(
          `amount ${amount.toFixed(2)} is below the lowest approval threshold for company ${key.companyCode}`
        );
      }

      const approvers = (
        await this.directory.getAvailableApprovers(level.id, key.companyCode, submitter, this.today(), trx)
      ).filter((approver) => approver.username !== document.createdBy);
      if (approvers.length === 0) {
        throw new ValidationError(`no eligible approvers configured for ${level.levelName}`);
      }

      const { instance } = await this.store.createInstance(
        {
          ...key,
          approvalLevelId: level.id,
          priority: options.priority ?? 'NORMAL',
          createdBy: submitter,
          at
        },
        approvers,
        trx
      );
      await this.documents.markSubmitted(key, submitter, at, trx);
      await this.audit.record(
        {
          ...key,
          action: 'SUBMITTED_FOR_APPROVAL',
          performedBy: submitter,
          oldStatus: 'DRAFT',
          newStatus: 'PENDING_APPROVAL',
          comments: options.comments ?? null,
          timestamp: at
        },
        trx
      );

      return {
        result: {
          success: true,
          message: `Successfully submitted for approval to ${approvers.length} approver(s)`,
          workflowId: instance.id,
          status: instance.status
        },
        notifications: approvers.map((approver) => ({
          recipient: approver.username,
          notificationType: 'APPROVAL_REQUEST',
          subject: `Journal Entry ${key.documentNumber} requires your approval`,
          message:
            `${submitter} submitted journal entry ${key.documentNumber} (company ${key.companyCode}) ` +
            `for ${level.levelName} approval. Amount: ${amount.toFixed(2)}`,
          workflowInstanceId: instance.id
        }))
      };
    });
  }

  async approveDocumentById(workflowId: number, approvedBy: string, comments?: string | null): Promise<WorkflowResult> {
    return this.execute('approveDocumentById', { workflowId, userId: approvedBy }, (trx) =>
      this.approveInstance(trx, workflowId, approvedBy, comments ?? null)
    );
  }

  /** Approves the document's PENDING workflow on behalf of `approvedBy`. */
  async approveDocument(key: DocumentKey, approvedBy: string, comments?: string | null): Promise<WorkflowResult> {
    return this.execute('approveDocument', { ...key, userId: approvedBy }, async (trx) => {
      const pending = await this.store.findPendingByDocument(key, {}, trx);
      if (!pending) {
        throw new NotFoundError(`no pending workflow for ${documentLabel(key)}`);
      }
      return this.approveInstance(trx, pending.id, approvedBy, comments ?? null);
    });
  }

  async rejectDocument(workflowId: number, rejectedBy: string, reason: string): Promise<WorkflowResult> {
    return this.execute('rejectDocument', { workflowId, userId: rejectedBy }, async (trx) => {
      const approver = requireActor(rejectedBy, 'approver');
      const trimmedReason = reason.trim();
      if (!trimmedReason) {
        throw new ValidationError('a rejection reason is required');
      }
      const at = this.nowIso();

      const instance = await this.lockInstance(trx, workflowId);
      const step = await this.claimStep(trx, instance, approver);

      await this.store.actionStep(step.id, { action: 'REJECTED', actionBy: approver, comments: trimmedReason, at }, trx);
      await this.store.closePendingSteps(instance.id, 'CANCELLED', approver, at, trx);
      await this.store.completeInstance(instance.id, { status: 'REJECTED', at }, trx);
      await this.documents.markRejected(instance, approver, trimmedReason, at, trx);
      await this.audit.record(
        {
          documentNumber: instance.documentNumber,
          companyCode: instance.companyCode,
          action: 'REJECTED',
          performedBy: approver,
          oldStatus: 'PENDING_APPROVAL',
          newStatus: 'REJECTED',
          comments: trimmedReason,
          timestamp: at
        },
        trx
      );

      return {
        result: {
          success: true,
          message: `Document ${instance.documentNumber} rejected`,
          workflowId: instance.id,
          status: 'REJECTED'
        },
        notifications: [
          {
            recipient: instance.createdBy,
            notificationType: 'REJECTED',
            subject: `Journal Entry ${instance.documentNumber} rejected`,
            message: `${approver} rejected journal entry ${instance.documentNumber}: ${trimmedReason}`,
            workflowInstanceId: instance.id
          }
        ]
      };
    });
  }

  async withdrawSubmission(key: DocumentKey, withdrawnBy: string, reason?: string | null): Promise<WorkflowResult> {
    return this.execute('withdrawSubmission', { ...key, userId: withdrawnBy }, async (trx) => {
      const submitter = requireActor(withdrawnBy, 'submitter');
      const at = this.nowIso();

      const instance = await this.store.findPendingByDocument(key, { lock: true }, trx);
      if (!instance) {
        const latest = await this.store.findLatestByDocument(key, trx);
        if (latest) {
          throw new StateConflictError(`workflow ${latest.id} is ${latest.status}`);
        }
        throw new NotFoundError(`no workflow for ${documentLabel(key)}`);
      }
      if (instance.createdBy !== submitter) {
        throw new AuthorizationError('only the original submitter can withdraw a submission');
      }

      const waiting = (await this.store.listSteps(instance.id, trx))
        .filter((step) => step.action === 'PENDING')
        .map((step) => step.assignedTo);

      await this.store.closePendingSteps(instance.id, 'WITHDRAWN', submitter, at, trx);
      await this.store.completeInstance(instance.id, { status: 'WITHDRAWN', at }, trx);
      await this.documents.revertToDraft(key, trx);
      await this.audit.record(
        {
          ...key,
          action: 'WITHDRAWN',
          performedBy: submitter,
          oldStatus: 'PENDING_APPROVAL',
          newStatus: 'DRAFT',
          comments: reason?.trim() || null,
          timestamp: at
        },
        trx
      );

      return {
        result: {
          success: true,
          message: `Submission for ${key.documentNumber} withdrawn`,
          workflowId: instance.id,
          status: 'WITHDRAWN'
        },
        notifications: [...new Set(waiting)].map((recipient) => ({
          recipient,
          notificationType: 'WITHDRAWN',
          subject: `Journal Entry ${key.documentNumber} withdrawn`,
          message: `${submitter} withdrew journal entry ${key.documentNumber} from approval`,
          workflowInstanceId: instance.id
        }))
      };
    });
  }

  /** Moves `fromUser`'s open steps on a PENDING workflow to `toUser`. */
  async reassignApprover(
    workflowId: number,
    fromUser: string,
    toUser: string,
    performedBy: string,
    comments?: string | null
  ): Promise<WorkflowResult> {
    return this.execute('reassignApprover', { workflowId, userId: performedBy, fromUser, toUser }, async (trx) => {
      const actor = requireActor(performedBy, 'performer');
      const from = requireActor(fromUser, 'current approver');
      const to = requireActor(toUser, 'new approver');
      if (from === to) {
        throw new ValidationError('the new approver must differ from the current one');
      }
      const at = this.nowIso();

      const instance = await this.lockInstance(trx, workflowId);
      if (instance.status !== 'PENDING') {
        throw new StateConflictError(`workflow ${workflowId} is ${instance.status}`);
      }
      const document = await this.documents.findDocument(instance, {}, trx);
      if (to === instance.createdBy || to === document?.createdBy) {
        throw new AuthorizationError(`${to} cannot approve their own journal entry`);
      }
      if (!(await this.directory.isActiveUser(to, trx))) {
        throw new ValidationError(`not an active user: ${to}`);
      }

      const steps = await this.store.listSteps(instance.id, trx);
      if (steps.some((step) => step.action === 'PENDING' && step.assignedTo === to)) {
        throw new StateConflictError(`${to} already holds a pending step on workflow ${workflowId}`);
      }
      const moved = await this.store.reassignSteps(instance.id, from, to, trx);
      if (moved === 0) {
        throw new ValidationError(`${from} has no pending steps on workflow ${workflowId}`);
      }

      const note = comments?.trim();
      await this.audit.record(
        {
          documentNumber: instance.documentNumber,
          companyCode: instance.companyCode,
          action: 'REASSIGNED',
          performedBy: actor,
          oldStatus: 'PENDING_APPROVAL',
          newStatus: 'PENDING_APPROVAL',
          comments: note ? `Reassigned from ${from} to ${to}: ${note}` : `Reassigned from ${from} to ${to}`,
          timestamp: at
        },
        trx
      );

      return {
        result: {
          success: true,
          message: `Reassigned ${moved} step(s) from ${from} to ${to}`,
          workflowId: instance.id,
          status: 'PENDING'
        },
        notifications: [
          {
            recipient: to,
            notificationType: 'REASSIGNED',
            subject: `Journal Entry ${instance.documentNumber} requires your approval`,
            message: `${actor} reassigned journal entry ${instance.documentNumber} from ${from} to you`,
            workflowInstanceId: instance.id
          }
        ]
      };
    });
  }

  async getPendingApprovals(username: string): Promise<PendingApproval[]> {
    return this.read('getPendingApprovals', { userId: username }, async () => {
      const delegations = await this.directory.getDelegationsFor(username, this.today());
      const assignees = [username, ...delegations.map((delegation) => delegation.userId)];
      const rows = (await this.store.listPendingSteps([...new Set(assignees)])).filter(
        (row) =>
          row.created_by !== username &&
          row.document_created_by !== username &&
          canActOnStep(
            username,
            { assignedTo: row.assigned_to, approvalLevelId: Number(row.approval_level_id) },
            row.company_code,
            delegations
          )
      );
      const totals = await this.documents.totalsFor(
        rows.map((row) => ({ documentNumber: row.document_number, companyCode: row.company_code }))
      );
      const now = this.now().getTime();

      return rows.map((row) => {
        const key = { documentNumber: row.document_number, companyCode: row.company_code };
        const submittedAt = toIso(row.submitted_at);
        const due = Date.parse(submittedAt) + Number(row.time_limit) * HOUR_MS;
        return {
          ...key,
          workflowId: Number(row.workflow_id),
          stepId: Number(row.step_id),
          assignedTo: row.assigned_to,
          delegatedFrom: row.delegated_from,
          reference: row.reference,
          postingDate: row.posting_date,
          currencyCode: row.currency_code,
          createdBy: row.created_by,
          priority: oneOf(WORKFLOW_PRIORITIES, row.priority, 'priority'),
          approvalLevel: row.level_name,
          totalAmount: totals.get(documentLabel(key)) ?? 0,
          submittedAt,
          dueAt: new Date(due).toISOString(),
          isOverdue: now > due
        };
      });
    });
  }

  async getAllWorkflows(statusFilter: WorkflowStatus | 'ALL' = 'ALL', daysBack = DEFAULT_DAYS_BACK): Promise<WorkflowSummary[]> {
    return this.read('getAllWorkflows', { statusFilter, daysBack }, async () => {
      assertDaysBack(daysBack);
      const now = this.now().getTime();
      const rows = await this.store.listInstances({
        status: statusFilter === 'ALL' ? undefined : statusFilter,
        since: new Date(now - daysBack * DAY_MS).toISOString()
      });
      const totals = await this.documents.totalsFor(
        rows.map((row) => ({ documentNumber: row.document_number, companyCode: row.company_code }))
      );
      return rows.map((row) => this.toSummary(row, totals, now));
    });
  }

  async getWorkflowStatistics(): Promise<WorkflowStatistics> {
    return this.read('getWorkflowStatistics', {}, async () => {
      const now = this.now().getTime();
      const rows = await this.store.listInstances({});
      const summaries = rows.map((row) => this.toSummary(row, new Map(), now));
      const countOf = (status: WorkflowStatus): number => summaries.filter((summary) => summary.status === status).length;

      const durations = summaries
        .filter((summary) => summary.status !== 'PENDING' && summary.completedAt !== null)
        .map((summary) => (Date.parse(summary.completedAt ?? summary.createdAt) - Date.parse(summary.createdAt)) / HOUR_MS);
      const avgCompletionHours =
        durations.length === 0 ? 0 : roundTo(durations.reduce((sum, hours) => sum + hours, 0) / durations.length, 2);

      return {
        totalWorkflows: summaries.length,
        pendingCount: countOf('PENDING'),
        approvedCount: countOf('APPROVED'),
        rejectedCount: countOf('REJECTED'),
        withdrawnCount: countOf('WITHDRAWN'),
        overdueCount: summaries.filter((summary) => summary.isOverdue).length,
        avgCompletionHours,
        levelBreakdown: await this.store.countByLevel(),
        topApprovers: await this.store.topApprovers(
          new Date(now - TOP_APPROVER_WINDOW_DAYS * DAY_MS).toISOString(),
          TOP_APPROVER_LIMIT
        )
      };
    });
  }

  /** Level id the document routes to, or null when no approval is required. */
  async calculateRequiredApprovalLevel(key: DocumentKey): Promise<number | null> {
    return this.read('calculateRequiredApprovalLevel', { ...key }, () => this.resolver.calculateRequiredApprovalLevel(key));
  }

  async getAvailableApprovers(levelId: number, companyCode: string, excludedUser: string | null): Promise<Approver[]> {
    return this.read('getAvailableApprovers', { levelId, companyCode }, async () => {
      await this.resolver.getLevel(levelId);
      return this.directory.getAvailableApprovers(levelId, companyCode, excludedUser, this.today());
    });
  }

  async getWorkflow(workflowId: number): Promise<WorkflowDetail> {
    return this.read('getWorkflow', { workflowId }, async () => {
      const instance = await this.store.findInstance(workflowId);
      if (!instance) {
        throw new NotFoundError(`workflow not found: ${workflowId}`);
      }
      return { instance, steps: await this.store.listSteps(workflowId) };
    });
  }

  async getAuditTrail(filter: AuditTrailFilter = {}): Promise<AuditLogEntry[]> {
    return this.read('getAuditTrail', { ...filter }, async () => {
      const { daysBack, ...rest } = filter;
      if (daysBack === undefined) {
        return this.audit.query(rest);
      }
      assertDaysBack(daysBack);
      return this.audit.query({ ...rest, since: new Date(this.now().getTime() - daysBack * DAY_MS).toISOString() });
    });
  }

  async getNotifications(username: string, options: { unreadOnly?: boolean } = {}): Promise<Notification[]> {
    return this.read('getNotifications', { userId: username }, () => this.inbox.listForRecipient(username, options));
  }

  async setDelegation(input: DelegationInput): Promise<Delegation> {
    return this.read('setDelegation', { userId: input.userId, delegateTo: input.delegateTo }, async () => {
      const delegation = await this.directory.setDelegation(input);
      this.logger.info('delegation set', {
        operation: 'setDelegation',
        userId: delegation.userId,
        levelId: delegation.approvalLevelId,
        delegateTo: delegation.delegatedTo
      });
      return delegation;
    });
  }

  async clearDelegation(key: AssignmentKey): Promise<void> {
    await this.read('clearDelegation', { userId: key.userId, levelId: key.approvalLevelId }, async () => {
      await this.directory.clearDelegation(key);
      this.logger.info('delegation cleared', {
        operation: 'clearDelegation',
        userId: key.userId,
        levelId: key.approvalLevelId
      });
    });
  }

  private async approveInstance(
    trx: Knex.Transaction,
    workflowId: number,
    approvedBy: string,
    comments: string | null
  ): Promise<Transition> {
    const approver = requireActor(approvedBy, 'approver');
    const at = this.nowIso();

    const instance = await this.lockInstance(trx, workflowId);
    const step = await this.claimStep(trx, instance, approver);
    await this.store.actionStep(step.id, { action: 'APPROVED', actionBy: approver, comments, at }, trx);

    const level = await this.resolver.getLevel(instance.approvalLevelId, trx);
    const outstanding = (await this.store.listSteps(instance.id, trx)).filter((other) => other.action === 'PENDING').length;

    if (level.approvalMode === 'ALL' && outstanding > 0) {
      await this.audit.record(
        {
          documentNumber: instance.documentNumber,
          companyCode: instance.companyCode,
          action: 'STEP_APPROVED',
          performedBy: approver,
          oldStatus: 'PENDING_APPROVAL',
          newStatus: 'PENDING_APPROVAL',
          comments,
          timestamp: at
        },
        trx
      );
      return {
        result: {
          success: true,
          message: `Approval recorded; ${outstanding} approval(s) outstanding`,
          workflowId: instance.id,
          status: 'PENDING'
        },
        notifications: []
      };
    }

    if (outstanding > 0) {
      await this.store.closePendingSteps(instance.id, 'SKIPPED', approver, at, trx);
    }
    await this.store.completeInstance(instance.id, { status: 'APPROVED', at, approvedBy: approver }, trx);
    await this.documents.markApproved(instance, approver, at, trx);
    await this.audit.record(
      {
        documentNumber: instance.documentNumber,
        companyCode: instance.companyCode,
        action: 'APPROVED',
        performedBy: approver,
        oldStatus: 'PENDING_APPROVAL',
        newStatus: 'APPROVED',
        comments,
        timestamp: at
      },
      trx
    );

    return {
      result: {
        success: true,
        message: `Document ${instance.documentNumber} approved`,
        workflowId: instance.id,
        status: 'APPROVED'
      },
      notifications: [
        {
          recipient: instance.createdBy,
          notificationType: 'APPROVED',
          subject: `Journal Entry ${instance.documentNumber} APPROVED`,
          message: `${approver} approved journal entry ${instance.documentNumber}`,
          workflowInstanceId: instance.id
        }
      ]
    };
  }

  private async lockInstance(trx: Knex.Transaction, workflowId: number): Promise<WorkflowInstance> {
    const instance = await this.store.findInstance(workflowId, { lock: true }, trx);
    if (!instance) {
      throw new NotFoundError(`workflow not found: ${workflowId}`);
    }
    return instance;
  }

  /**
   * The PENDING step `actor` may decide, preferring one assigned to them directly.
   * An actor decides at most one step per instance, and never on an entry they prepared.
   */
  private async claimStep(trx: Knex.Transaction, instance: WorkflowInstance, actor: string): Promise<ApprovalStep> {
    if (instance.status !== 'PENDING') {
      throw new StateConflictError(`workflow ${instance.id} is ${instance.status}`);
    }
    const document = await this.documents.findDocument(instance, {}, trx);
    if (actor === instance.createdBy || actor === document?.createdBy) {
      throw new AuthorizationError(`${actor} cannot approve their own journal entry`);
    }
    const steps = await this.store.listSteps(instance.id, trx);
    if (steps.some((step) => step.action !== 'PENDING' && step.actionBy === actor)) {
      throw new StateConflictError(`${actor} has already actioned workflow ${instance.id}`);
    }
    const delegations = await this.directory.getDelegationsFor(actor, this.today(), trx);
    const eligible = steps
      .filter((step) => canActOnStep(actor, step, instance.companyCode, delegations))
      .sort((a, b) => Number(b.assignedTo === actor) - Number(a.assignedTo === actor));
    if (eligible.length === 0) {
      throw new AuthorizationError(`${actor} is not an approver on workflow ${instance.id}`);
    }
    const open = eligible.find((step) => step.action === 'PENDING');
    if (!open) {
      throw new StateConflictError(`${actor} has already actioned workflow ${instance.id}`);
    }
    return open;
  }

  private toSummary(row: InstanceListRow, totals: Map<string, number>, now: number): WorkflowSummary {
    const instance = toInstance(row);
    const overdue =
      instance.status === 'PENDING' &&
      row.time_limit !== null &&
      now - Date.parse(instance.submittedAt) > Number(row.time_limit) * HOUR_MS;
    return {
      documentNumber: instance.documentNumber,
      companyCode: instance.companyCode,
      workflowId: instance.id,
      status: instance.status,
      priority: instance.priority,
      approvalLevel: row.level_name,
      createdBy: instance.createdBy,
      assignedTo: instance.assignedTo,
      createdAt: instance.createdAt,
      submittedAt: instance.submittedAt,
      completedAt: instance.completedAt,
      approvedAt: instance.approvedAt,
      approvedBy: instance.approvedBy,
      totalAmount: totals.get(documentLabel(instance)) ?? 0,
      isOverdue: overdue
    };
  }

  private async execute(
    operation: string,
    context: LogFields,
    work: (trx: Knex.Transaction) => Promise<Transition>
  ): Promise<WorkflowResult> {
    let transition: Transition;
    try {
      transition = await this.database.knex.transaction(work);
    } catch (error) {
      if (isRecoverable(error)) {
        this.logger.info(`${operation} refused`, { operation, ...context, error: { code: error.code, message: error.message } });
        return { success: false, code: error.code, message: error.message };
      }
      this.logger.error(`${operation} failed`, { operation, ...context, error: describeError(error) });
      return { success: false, code: 'STORAGE_ERROR', message: GENERIC_FAILURE };
    }

    this.logger.info(transition.result.message, {
      operation,
      ...context,
      workflowId: transition.result.workflowId,
      status: transition.result.status
    });
    await this.dispatch(operation, transition);
    return transition.result;
  }

  private async dispatch(operation: string, transition: Transition): Promise<void> {
    if (transition.notifications.length === 0) return;
    try {
      await this.notifications.enqueue(transition.notifications, this.nowIso());
    } catch (error) {
      this.logger.warn('notification enqueue failed', {
        operation,
        workflowId: transition.result.workflowId,
        recipients: transition.notifications.map((notification) => notification.recipient),
        error: describeError(error)
      });
    }
  }

  private async read<T>(operation: string, context: LogFields, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isRecoverable(error)) {
        throw error;
      }
      this.logger.error(`${operation} failed`, { operation, ...context, error: describeError(error) });
      throw new StorageError(GENERIC_FAILURE, { cause: error });
    }
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  private today(): string {
    return calendarDate(this.now());
  }
}
