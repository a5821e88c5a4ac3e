import { createDatabase, type Database } from '../../src/db/connection.js';
import { runMigrations } from '../../src/db/migrations.js';
import { createLogger, type LogEntry, type Logger } from '../../src/logger.js';
import type { ApprovalMode, DocumentKey, DocumentWorkflowStatus } from '../../src/domain/types.js';

export const COMPANY = '1000';

export async function createTestDatabase(): Promise<Database> {
  const database = createDatabase({ client: 'better-sqlite3', filename: ':memory:' });
  await runMigrations(database.knex);
  return database;
}

export class TestClock {
  private current: Date;

  constructor(iso = '2025-03-10T09:00:00.000Z') {
    this.current = new Date(iso);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }
}

export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: 'debug', sink: (entry) => entries.push(entry) });
  return { logger, entries };
}

export async function seedUsers(
  database: Database,
  users: Array<string | { username: string; firstName?: string; lastName?: string; isActive?: boolean }>
): Promise<void> {
  await database.knex('users').insert(
    users.map((user) => {
      const seed = typeof user === 'string' ? { username: user } : user;
      return {
        username: seed.username,
        first_name: seed.firstName ?? seed.username.charAt(0).toUpperCase() + seed.username.slice(1),
        last_name: seed.lastName ?? 'Tester',
        email: `${seed.username}@example.test`,
        is_active: seed.isActive ?? true
      };
    })
  );
}

export interface LevelSeed {
  companyCode?: string;
  levelName: string;
  levelOrder: number;
  low: number;
  high: number | null;
  timeLimitHours?: number;
  mode?: ApprovalMode;
  isActive?: boolean;
}

export async function seedLevel(database: Database, level: LevelSeed): Promise<number> {
  const rows: Array<{ id: number } | number> = await database.knex('approval_levels').insert(
    {
      company_code: level.companyCode ?? COMPANY,
      level_name: level.levelName,
      level_order: level.levelOrder,
      threshold_low: level.low,
      threshold_high: level.high,
      time_limit: level.timeLimitHours ?? 48,
      approval_mode: level.mode ?? 'ALL',
      is_active: level.isActive ?? true
    },
    ['id']
  );
  const first = rows[0];
  if (first === undefined) throw new Error('level insert returned nothing');
  return typeof first === 'number' ? first : first.id;
}

export async function seedApprover(
  database: Database,
  assignment: {
    userId: string;
    levelId: number;
    companyCode?: string | null;
    isActive?: boolean;
    delegatedTo?: string;
    startDate?: string;
    endDate?: string;
  }
): Promise<void> {
  await database.knex('approvers').insert({
    user_id: assignment.userId,
    approval_level_id: assignment.levelId,
    company_code: assignment.companyCode === undefined ? COMPANY : assignment.companyCode,
    is_active: assignment.isActive ?? true,
    delegated_to: assignment.delegatedTo ?? null,
    delegation_start_date: assignment.startDate ?? null,
    delegation_end_date: assignment.endDate ?? null
  });
}

export async function seedDocument(
  database: Database,
  document: {
    documentNumber: string;
    companyCode?: string;
    createdBy: string;
    lines: Array<{ debit: number; credit: number }>;
    status?: DocumentWorkflowStatus;
  }
): Promise<DocumentKey> {
  const key = { documentNumber: document.documentNumber, companyCode: document.companyCode ?? COMPANY };
  await database.knex('journal_entry_headers').insert({
    document_number: key.documentNumber,
    company_code: key.companyCode,
    reference: `REF-${key.documentNumber}`,
    posting_date: '2025-03-10',
    currency_code: 'USD',
    created_by: document.createdBy,
    workflow_status: document.status ?? 'DRAFT'
  });
  if (document.lines.length > 0) {
    await database.knex('journal_entry_lines').insert(
      document.lines.map((line, index) => ({
        document_number: key.documentNumber,
        company_code: key.companyCode,
        line_item: index + 1,
        gl_account: `${400000 + index}`,
        debit_amount: line.debit,
        credit_amount: line.credit
      }))
    );
  }
  return key;
}

/** A balanced two-line entry whose total (sum of line magnitudes) is `2 * amount`. */
export function balancedLines(amount: number): Array<{ debit: number; credit: number }> {
  return [
    { debit: amount, credit: 0 },
    { debit: 0, credit: amount }
  ];
}

/** A single line so the document total equals `amount`. */
export function singleLine(amount: number): Array<{ debit: number; credit: number }> {
  return [{ debit: amount, credit: 0 }];
}

/**
 * Company 1000 with three levels and a small staff:
 * Level 1 [0, 10000) 48h -> bob; Level 2 [10000, 100000) 72h -> carol, dave;
 * Level 3 [100000, open) 120h ANY -> erin, frank. alice prepares entries.
 */
export async function seedStandardCompany(database: Database): Promise<{ level1: number; level2: number; level3: number }> {
  await seedUsers(database, ['alice', 'bob', 'carol', 'dave', 'erin', 'frank', 'grace']);
  const level1 = await seedLevel(database, { levelName: 'Level 1', levelOrder: 1, low: 0, high: 10000, timeLimitHours: 48 });
  const level2 = await seedLevel(database, { levelName: 'Level 2', levelOrder: 2, low: 10000, high: 100000, timeLimitHours: 72 });
  const level3 = await seedLevel(database, {
    levelName: 'Level 3',
    levelOrder: 3,
    low: 100000,
    high: null,
    timeLimitHours: 120,
    mode: 'ANY'
  });
  await seedApprover(database, { userId: 'bob', levelId: level1 });
  await seedApprover(database, { userId: 'carol', levelId: level2 });
  await seedApprover(database, { userId: 'dave', levelId: level2 });
  await seedApprover(database, { userId: 'erin', levelId: level3 });
  await seedApprover(database, { userId: 'frank', levelId: level3 });
  return { level1, level2, level3 };
}
