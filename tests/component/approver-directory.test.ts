import { afterEach, describe, expect, it } from 'vitest';
import { closeDatabase, type Database } from '../../src/db/connection.js';
import { ApproverDirectory, canActOnStep } from '../../src/domain/approver-directory.js';
import { NotFoundError, ValidationError } from '../../src/domain/errors.js';
import { createTestDatabase, seedApprover, seedStandardCompany, seedUsers } from '../support/fixtures.js';

const today = '2025-03-10';

describe('ApproverDirectory', () => {
  let database: Database;

  afterEach(async () => {
    await closeDatabase(database);
  });

  async function setup(): Promise<{ directory: ApproverDirectory; levels: { level1: number; level2: number; level3: number } }> {
    database = await createTestDatabase();
    const levels = await seedStandardCompany(database);
    return { directory: new ApproverDirectory(database), levels };
  }

  it('lists active approvers for the level ordered by username', async () => {
    const { directory, levels } = await setup();

    await expect(directory.getAvailableApprovers(levels.level2, '1000', null, today)).resolves.toEqual([
      { username: 'carol', fullName: 'Carol Tester', email: 'carol@example.test', delegatedFrom: null },
      { username: 'dave', fullName: 'Dave Tester', email: 'dave@example.test', delegatedFrom: null }
    ]);
  });

  it('never returns the excluded submitter even when they hold the role', async () => {
    const { directory, levels } = await setup();
    await seedApprover(database, { userId: 'alice', levelId: levels.level1 });

    const approvers = await directory.getAvailableApprovers(levels.level1, '1000', 'alice', today);

    expect(approvers.map((approver) => approver.username)).toEqual(['bob']);
  });

  it('scopes assignments to the company while keeping company-wide ones', async () => {
    const { directory, levels } = await setup();
    await seedApprover(database, { userId: 'grace', levelId: levels.level1, companyCode: '2000' });
    await seedApprover(database, { userId: 'frank', levelId: levels.level1, companyCode: null });

    const approvers = await directory.getAvailableApprovers(levels.level1, '1000', null, today);

    expect(approvers.map((approver) => approver.username)).toEqual(['bob', 'frank']);
  });

  it('deduplicates a user assigned both for the company and for all companies', async () => {
    const { directory, levels } = await setup();
    await seedApprover(database, { userId: 'carol', levelId: levels.level2, companyCode: null });

    const approvers = await directory.getAvailableApprovers(levels.level2, '1000', null, today);

    expect(approvers.map((approver) => approver.username)).toEqual(['carol', 'dave']);
  });

  it('drops inactive assignments and inactive users', async () => {
    database = await createTestDatabase();
    await seedUsers(database, ['henry', { username: 'ivy', isActive: false }]);
    const { level1 } = await seedStandardCompany(database);
    await seedApprover(database, { userId: 'henry', levelId: level1, isActive: false });
    await seedApprover(database, { userId: 'ivy', levelId: level1 });
    const directory = new ApproverDirectory(database);

    const approvers = await directory.getAvailableApprovers(level1, '1000', null, today);

    expect(approvers.map((approver) => approver.username)).toEqual(['bob']);
  });

  it('puts an active delegate in place of the approver, not beside them', async () => {
    const { directory, levels } = await setup();
    await directory.setDelegation({
      userId: 'bob',
      approvalLevelId: levels.level1,
      companyCode: '1000',
      delegateTo: 'grace',
      startDate: '2025-03-01',
      endDate: '2025-03-31'
    });

    await expect(directory.getAvailableApprovers(levels.level1, '1000', null, today)).resolves.toEqual([
      { username: 'grace', fullName: 'Grace Tester', email: 'grace@example.test', delegatedFrom: 'bob' }
    ]);
    const afterWindow = await directory.getAvailableApprovers(levels.level1, '1000', null, '2025-04-01');
    expect(afterWindow.map((approver) => approver.username)).toEqual(['bob']);
  });

  it('excludes the submitter when they are the delegate', async () => {
    const { directory, levels } = await setup();
    await seedApprover(database, { userId: 'grace', levelId: levels.level2, delegatedTo: 'alice' });

    const approvers = await directory.getAvailableApprovers(levels.level2, '1000', 'alice', today);

    expect(approvers.map((approver) => approver.username)).toEqual(['carol', 'dave']);
  });

  it('reports delegators for the delegate while the window is open', async () => {
    const { directory, levels } = await setup();
    await directory.setDelegation({
      userId: 'carol',
      approvalLevelId: levels.level2,
      companyCode: '1000',
      delegateTo: 'grace',
      startDate: '2025-03-05',
      endDate: null
    });

    await expect(directory.getDelegatorsFor('grace', today)).resolves.toEqual(['carol']);
    await expect(directory.getDelegatorsFor('grace', '2025-03-04')).resolves.toEqual([]);

    await directory.clearDelegation({ userId: 'carol', approvalLevelId: levels.level2, companyCode: '1000' });
    await expect(directory.getDelegatorsFor('grace', today)).resolves.toEqual([]);
  });

  it('validates delegations', async () => {
    const { directory, levels } = await setup();
    const base = { userId: 'bob', approvalLevelId: levels.level1, companyCode: '1000', startDate: null, endDate: null };

    await expect(directory.setDelegation({ ...base, delegateTo: 'bob' })).rejects.toThrow(
      new ValidationError('an approver cannot delegate to themselves')
    );
    await expect(
      directory.setDelegation({ ...base, delegateTo: 'grace', startDate: '2025-03-10', endDate: '2025-03-01' })
    ).rejects.toThrow(new ValidationError('endDate must not be before startDate'));
    await expect(directory.setDelegation({ ...base, delegateTo: 'nobody' })).rejects.toThrow(
      new ValidationError('delegate is not an active user: nobody')
    );
    await expect(directory.setDelegation({ ...base, companyCode: null, delegateTo: 'grace' })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe('canActOnStep', () => {
  const delegation = {
    userId: 'bob',
    approvalLevelId: 1,
    companyCode: '1000',
    delegatedTo: 'grace',
    startDate: null,
    endDate: null
  };

  it('accepts the assignee and a delegate for the same level and company', () => {
    expect(canActOnStep('bob', { assignedTo: 'bob', approvalLevelId: 1 }, '1000', [])).toBe(true);
    expect(canActOnStep('grace', { assignedTo: 'bob', approvalLevelId: 1 }, '1000', [delegation])).toBe(true);
  });

  it('refuses a delegate for another level or company', () => {
    expect(canActOnStep('grace', { assignedTo: 'bob', approvalLevelId: 2 }, '1000', [delegation])).toBe(false);
    expect(canActOnStep('grace', { assignedTo: 'bob', approvalLevelId: 1 }, '2000', [delegation])).toBe(false);
  });
});
