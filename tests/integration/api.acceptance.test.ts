import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../../src/api/app.js';
import { closeDatabase, type Database } from '../../src/db/connection.js';
import { WorkflowEngine } from '../../src/domain/engine.js';
import { createLogger } from '../../src/logger.js';
import { createTestDatabase, seedDocument, seedStandardCompany, singleLine, TestClock } from '../support/fixtures.js';

function headers(userId: string, roles: string[] = []): Record<string, string> {
  return {
    'x-user-id': userId,
    'x-roles': roles.join(',')
  };
}

const opened: Database[] = [];

async function setup(): Promise<{
  app: ReturnType<typeof createApp>;
  database: Database;
  clock: TestClock;
  levels: { level1: number; level2: number; level3: number };
}> {
  const database = await createTestDatabase();
  opened.push(database);
  const levels = await seedStandardCompany(database);
  const clock = new TestClock();
  const logger = createLogger({ level: 'silent' });
  const app = createApp(new WorkflowEngine(database, { now: clock.now, logger }), { logger });
  return { app, database, clock, levels };
}

afterEach(async () => {
  await Promise.all(opened.splice(0).map((database) => closeDatabase(database)));
});

describe('API acceptance', () => {
  it('WF-API-01: health check answers without an identity, every other route needs one', async () => {
    const { app } = await setup();

    const health = await request(app).get('/healthz');
    expect(health.status).toBe(200);
    expect(health.body).toEqual({ ok: true });

    const anonymous = await request(app).get('/api/v1/workflows');
    expect(anonymous.status).toBe(422);
    expect(anonymous.body).toEqual({ code: 'VALIDATION_ERROR', message: 'x-user-id header is required' });
  });

  it('WF-API-02: submit, inspect and approve a journal entry', async () => {
    const { app, database, levels } = await setup();
    await seedDocument(database, { documentNumber: 'JE-100', createdBy: 'alice', lines: singleLine(5000) });

    const level = await request(app)
      .get('/api/v1/companies/1000/documents/JE-100/approval-level')
      .set(headers('alice'));
    expect(level.status).toBe(200);
    expect(level.body).toEqual({
      documentNumber: 'JE-100',
      companyCode: '1000',
      approvalLevelId: levels.level1,
      approvalRequired: true
    });

    const submit = await request(app)
      .post('/api/v1/companies/1000/documents/JE-100/submit')
      .set(headers('alice'))
      .send({ comments: 'month-end accrual', priority: 'HIGH' });
    expect(submit.status).toBe(200);
    expect(submit.body).toEqual({
      success: true,
      message: 'Successfully submitted for approval to 1 approver(s)',
      workflowId: 1,
      status: 'PENDING'
    });

    const detail = await request(app).get('/api/v1/workflows/1').set(headers('bob'));
    expect(detail.status).toBe(200);
    expect(detail.body.instance).toMatchObject({ status: 'PENDING', priority: 'HIGH', assignedTo: 'bob' });

    const approve = await request(app).post('/api/v1/workflows/1/approve').set(headers('bob')).send({});
    expect(approve.status).toBe(200);
    expect(approve.body).toMatchObject({ success: true, status: 'APPROVED' });

    const missing = await request(app).get('/api/v1/workflows/99').set(headers('bob'));
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ code: 'NOT_FOUND', message: 'workflow not found: 99' });
  });

  it('WF-API-03: domain refusals map to their HTTP statuses', async () => {
    const { app, database } = await setup();
    await seedDocument(database, { documentNumber: 'JE-200', createdBy: 'alice', lines: singleLine(20000) });
    await request(app).post('/api/v1/companies/1000/documents/JE-200/submit').set(headers('alice')).send({});

    const duplicate = await request(app).post('/api/v1/companies/1000/documents/JE-200/submit').set(headers('alice'));
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.code).toBe('CONFLICT');

    const own = await request(app).post('/api/v1/workflows/1/approve').set(headers('alice')).send({});
    expect(own.status).toBe(403);
    expect(own.body).toEqual({ code: 'FORBIDDEN', message: 'alice cannot approve their own journal entry' });

    const blankReason = await request(app).post('/api/v1/workflows/1/reject').set(headers('carol')).send({ reason: '   ' });
    expect(blankReason.status).toBe(422);
    expect(blankReason.body).toEqual({ code: 'VALIDATION_ERROR', message: 'reason: a rejection reason is required' });

    const reject = await request(app)
      .post('/api/v1/workflows/1/reject')
      .set(headers('carol'))
      .send({ reason: 'wrong cost center' });
    expect(reject.status).toBe(200);
    expect(reject.body).toMatchObject({ success: true, status: 'REJECTED' });

    const afterClose = await request(app).post('/api/v1/workflows/1/approve').set(headers('dave')).send({});
    expect(afterClose.status).toBe(409);
    expect(afterClose.body).toEqual({ code: 'CONFLICT', message: 'workflow 1 is REJECTED' });
  });

  it('WF-API-04: only an ADMIN may reassign approvers', async () => {
    const { app, database } = await setup();
    await seedDocument(database, { documentNumber: 'JE-300', createdBy: 'alice', lines: singleLine(20000) });
    await request(app).post('/api/v1/companies/1000/documents/JE-300/submit').set(headers('alice')).send({});

    const notAdmin = await request(app)
      .post('/api/v1/workflows/1/reassign')
      .set(headers('carol'))
      .send({ fromUser: 'carol', toUser: 'grace' });
    expect(notAdmin.status).toBe(403);
    expect(notAdmin.body).toEqual({ code: 'FORBIDDEN', message: 'ADMIN role is required to reassign approvers' });

    const toSubmitter = await request(app)
      .post('/api/v1/workflows/1/reassign')
      .set(headers('admin', ['ADMIN']))
      .send({ fromUser: 'carol', toUser: 'alice' });
    expect(toSubmitter.status).toBe(403);

    const reassigned = await request(app)
      .post('/api/v1/workflows/1/reassign')
      .set(headers('admin', ['ADMIN']))
      .send({ fromUser: 'carol', toUser: 'grace', comments: 'carol on leave' });
    expect(reassigned.status).toBe(200);
    expect(reassigned.body.message).toBe('Reassigned 1 step(s) from carol to grace');

    const queue = await request(app).get('/api/v1/approvals/pending').set(headers('grace'));
    expect(queue.status).toBe(200);
    expect(queue.body.map((item: { documentNumber: string }) => item.documentNumber)).toEqual(['JE-300']);
  });

  it('WF-API-05: approvers manage their own delegation', async () => {
    const { app, database, levels } = await setup();
    await seedDocument(database, { documentNumber: 'JE-400', createdBy: 'alice', lines: singleLine(800) });
    const body = { approvalLevelId: levels.level1, companyCode: '1000', delegateTo: 'grace', startDate: '2025-03-01', endDate: '2025-03-31' };

    const forbidden = await request(app).put('/api/v1/approvers/bob/delegation').set(headers('carol')).send(body);
    expect(forbidden.status).toBe(403);
    expect(forbidden.body.message).toBe('only the approver or an ADMIN can manage this delegation');

    const set = await request(app).put('/api/v1/approvers/bob/delegation').set(headers('bob')).send(body);
    expect(set.status).toBe(200);
    expect(set.body).toMatchObject({ userId: 'bob', approvalLevelId: levels.level1, delegatedTo: 'grace' });

    const approvers = await request(app)
      .get(`/api/v1/approval-levels/${levels.level1}/approvers`)
      .query({ companyCode: '1000', excludeUser: 'alice' })
      .set(headers('alice'));
    expect(approvers.status).toBe(200);
    expect(approvers.body).toEqual([
      { username: 'grace', fullName: 'Grace Tester', email: 'grace@example.test', delegatedFrom: 'bob' }
    ]);

    const cleared = await request(app)
      .delete('/api/v1/approvers/bob/delegation')
      .set(headers('admin', ['ADMIN']))
      .send({ approvalLevelId: levels.level1, companyCode: '1000' });
    expect(cleared.status).toBe(204);

    const restored = await request(app)
      .get(`/api/v1/approval-levels/${levels.level1}/approvers`)
      .query({ companyCode: '1000' })
      .set(headers('alice'));
    expect(restored.body.map((approver: { username: string }) => approver.username)).toEqual(['bob']);
  });

  it('WF-API-06: listings, statistics, audit logs and notifications', async () => {
    const { app, database, clock } = await setup();
    await seedDocument(database, { documentNumber: 'JE-500', createdBy: 'alice', lines: singleLine(5000) });
    await request(app).post('/api/v1/companies/1000/documents/JE-500/submit').set(headers('alice')).send({});
    clock.advanceHours(2);
    await request(app).post('/api/v1/companies/1000/documents/JE-500/approve').set(headers('bob')).send({ comments: 'ok' });

    const workflows = await request(app).get('/api/v1/workflows').query({ status: 'APPROVED' }).set(headers('admin'));
    expect(workflows.status).toBe(200);
    expect(workflows.body).toHaveLength(1);
    expect(workflows.body[0]).toMatchObject({ documentNumber: 'JE-500', approvedBy: 'bob', totalAmount: 5000 });

    const badStatus = await request(app).get('/api/v1/workflows').query({ status: 'BOGUS' }).set(headers('admin'));
    expect(badStatus.status).toBe(422);
    expect(badStatus.body.code).toBe('VALIDATION_ERROR');

    const statistics = await request(app).get('/api/v1/workflows/statistics').set(headers('admin'));
    expect(statistics.status).toBe(200);
    expect(statistics.body).toMatchObject({ totalWorkflows: 1, approvedCount: 1, avgCompletionHours: 2 });

    const audit = await request(app).get('/api/v1/audit-logs').query({ documentNumber: 'JE-500' }).set(headers('admin'));
    expect(audit.status).toBe(200);
    expect(audit.body.map((entry: { action: string }) => entry.action)).toEqual(['APPROVED', 'SUBMITTED_FOR_APPROVAL']);

    const notifications = await request(app).get('/api/v1/notifications').query({ unreadOnly: 'true' }).set(headers('alice'));
    expect(notifications.status).toBe(200);
    expect(notifications.body.map((item: { subject: string }) => item.subject)).toEqual(['Journal Entry JE-500 APPROVED']);
  });

  it('WF-API-07: malformed JSON is a 400', async () => {
    const { app } = await setup();

    const res = await request(app)
      .post('/api/v1/companies/1000/documents/JE-1/submit')
      .set(headers('alice'))
      .set('Content-Type', 'application/json')
      .send('{"comments":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ code: 'BAD_REQUEST', message: 'malformed request body' });
  });
});
