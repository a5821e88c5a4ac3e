import express, { type NextFunction, type Request, type Response } from 'express';
import type { WorkflowEngine } from '../domain/engine.js';
import { AuthorizationError, DomainError, STATUS_BY_CODE, ValidationError } from '../domain/errors.js';
import type { WorkflowResult } from '../domain/types.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import {
  approversQuerySchema,
  auditQuerySchema,
  clearDelegationBodySchema,
  commentBodySchema,
  delegationBodySchema,
  documentParamsSchema,
  levelParamsSchema,
  notificationsQuerySchema,
  parseInput,
  reassignBodySchema,
  rejectBodySchema,
  submitBodySchema,
  usernameParamsSchema,
  workflowParamsSchema,
  workflowsQuerySchema
} from './schemas.js';

interface ActorContext {
  userId: string;
  roles: string[];
}

function actorFromRequest(req: Request): ActorContext {
  const userId = (req.header('x-user-id') || '').trim();
  if (!userId) {
    throw new ValidationError('x-user-id header is required');
  }
  const rolesRaw = (req.header('x-roles') || '').trim();
  const roles = rolesRaw
    ? rolesRaw
        .split(',')
        .map((role) => role.trim())
        .filter(Boolean)
    : [];
  return { userId, roles };
}

function isAdmin(actor: ActorContext): boolean {
  return actor.roles.includes('ADMIN');
}

function sendResult(res: Response, result: WorkflowResult): void {
  if (result.success) {
    res.status(200).json(result);
    return;
  }
  res.status(STATUS_BY_CODE[result.code]).json({ code: result.code, message: result.message });
}

export function createApp(engine: WorkflowEngine, options: { logger?: Logger } = {}): express.Express {
  const logger = options.logger ?? createLogger();
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get('/api/v1/companies/:companyCode/documents/:documentNumber/approval-level', async (req, res) => {
    actorFromRequest(req);
    const key = parseInput(documentParamsSchema, req.params);
    const approvalLevelId = await engine.calculateRequiredApprovalLevel(key);
    res.status(200).json({ ...key, approvalLevelId, approvalRequired: approvalLevelId !== null });
  });

  app.post('/api/v1/companies/:companyCode/documents/:documentNumber/submit', async (req, res) => {
    const actor = actorFromRequest(req);
    const key = parseInput(documentParamsSchema, req.params);
    const body = parseInput(submitBodySchema, req.body ?? {});
    sendResult(res, await engine.submitForApproval(key, actor.userId, body));
  });

  app.post('/api/v1/companies/:companyCode/documents/:documentNumber/withdraw', async (req, res) => {
    const actor = actorFromRequest(req);
    const key = parseInput(documentParamsSchema, req.params);
    const body = parseInput(commentBodySchema, req.body ?? {});
    sendResult(res, await engine.withdrawSubmission(key, actor.userId, body.comments));
  });

  app.post('/api/v1/companies/:companyCode/documents/:documentNumber/approve', async (req, res) => {
    const actor = actorFromRequest(req);
    const key = parseInput(documentParamsSchema, req.params);
    const body = parseInput(commentBodySchema, req.body ?? {});
    sendResult(res, await engine.approveDocument(key, actor.userId, body.comments));
  });

  app.get('/api/v1/approval-levels/:levelId/approvers', async (req, res) => {
    actorFromRequest(req);
    const { levelId } = parseInput(levelParamsSchema, req.params);
    const query = parseInput(approversQuerySchema, req.query);
    res.status(200).json(await engine.getAvailableApprovers(levelId, query.companyCode, query.excludeUser ?? null));
  });

  app.get('/api/v1/workflows', async (req, res) => {
    actorFromRequest(req);
    const query = parseInput(workflowsQuerySchema, req.query);
    res.status(200).json(await engine.getAllWorkflows(query.status, query.daysBack));
  });

  app.get('/api/v1/workflows/statistics', async (req, res) => {
    actorFromRequest(req);
    res.status(200).json(await engine.getWorkflowStatistics());
  });

  app.get('/api/v1/workflows/:workflowId', async (req, res) => {
    actorFromRequest(req);
    const { workflowId } = parseInput(workflowParamsSchema, req.params);
    res.status(200).json(await engine.getWorkflow(workflowId));
  });

  app.post('/api/v1/workflows/:workflowId/approve', async (req, res) => {
    const actor = actorFromRequest(req);
    const { workflowId } = parseInput(workflowParamsSchema, req.params);
    const body = parseInput(commentBodySchema, req.body ?? {});
    sendResult(res, await engine.approveDocumentById(workflowId, actor.userId, body.comments));
  });

  app.post('/api/v1/workflows/:workflowId/reject', async (req, res) => {
    const actor = actorFromRequest(req);
    const { workflowId } = parseInput(workflowParamsSchema, req.params);
    const body = parseInput(rejectBodySchema, req.body ?? {});
    sendResult(res, await engine.rejectDocument(workflowId, actor.userId, body.reason));
  });

  app.post('/api/v1/workflows/:workflowId/reassign', async (req, res) => {
    const actor = actorFromRequest(req);
    if (!isAdmin(actor)) {
      throw new AuthorizationError('ADMIN role is required to reassign approvers');
    }
    const { workflowId } = parseInput(workflowParamsSchema, req.params);
    const body = parseInput(reassignBodySchema, req.body ?? {});
    sendResult(res, await engine.reassignApprover(workflowId, body.fromUser, body.toUser, actor.userId, body.comments));
  });

  app.get('/api/v1/approvals/pending', async (req, res) => {
    const actor = actorFromRequest(req);
    res.status(200).json(await engine.getPendingApprovals(actor.userId));
  });

  app.put('/api/v1/approvers/:username/delegation', async (req, res) => {
    const actor = actorFromRequest(req);
    const { username } = parseInput(usernameParamsSchema, req.params);
    if (!isAdmin(actor) && actor.userId !== username) {
      throw new AuthorizationError('only the approver or an ADMIN can manage this delegation');
    }
    const body = parseInput(delegationBodySchema, req.body ?? {});
    res.status(200).json(await engine.setDelegation({ userId: username, ...body }));
  });

  app.delete('/api/v1/approvers/:username/delegation', async (req, res) => {
    const actor = actorFromRequest(req);
    const { username } = parseInput(usernameParamsSchema, req.params);
    if (!isAdmin(actor) && actor.userId !== username) {
      throw new AuthorizationError('only the approver or an ADMIN can manage this delegation');
    }
    const body = parseInput(clearDelegationBodySchema, req.body ?? {});
    await engine.clearDelegation({ userId: username, ...body });
    res.status(204).end();
  });

  app.get('/api/v1/audit-logs', async (req, res) => {
    actorFromRequest(req);
    const query = parseInput(auditQuerySchema, req.query);
    res.status(200).json(await engine.getAuditTrail(query));
  });

  app.get('/api/v1/notifications', async (req, res) => {
    const actor = actorFromRequest(req);
    const query = parseInput(notificationsQuerySchema, req.query);
    res.status(200).json(await engine.getNotifications(actor.userId, { unreadOnly: query.unreadOnly }));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof DomainError) {
      res.status(error.statusCode).json({
        code: error.code,
        message: error.message
      });
      return;
    }
    // body-parser rejects malformed JSON with a 4xx status
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number' && error.status < 500) {
      res.status(error.status).json({ code: 'BAD_REQUEST', message: 'malformed request body' });
      return;
    }
    logger.error('unhandled request error', { method: req.method, path: req.path, error: describeError(error) });
    res.status(500).json({ code: 'INTERNAL_ERROR', message: 'internal server error' });
  });

  return app;
}
