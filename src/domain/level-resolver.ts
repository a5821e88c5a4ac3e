import type { Knex } from 'knex';
import type { Database } from '../db/connection.js';
import { oneOf, roundCents, toBool, toNumber, type ApprovalLevelRow } from '../db/rows.js';
import { documentLabel, type JournalDocumentGateway } from './documents.js';
import { NotFoundError, ValidationError } from './errors.js';
import type { ApprovalLevel, ApprovalMode, DocumentKey } from './types.js';

const APPROVAL_MODES: readonly ApprovalMode[] = ['ALL', 'ANY'];

export function toApprovalLevel(row: ApprovalLevelRow): ApprovalLevel {
  return {
    id: Number(row.id),
    companyCode: row.company_code,
    levelName: row.level_name,
    levelOrder: Number(row.level_order),
    thresholdLow: toNumber(row.threshold_low),
    thresholdHigh: row.threshold_high === null ? null : toNumber(row.threshold_high),
    timeLimitHours: Number(row.time_limit),
    approvalMode: oneOf(APPROVAL_MODES, row.approval_mode, 'approval_mode'),
    isActive: toBool(row.is_active)
  };
}

/**
 * Picks the level for an amount from levels sorted by ascending threshold_low.
 * A range containing the amount wins; otherwise the highest level starting at or
 * below it, so routing never drops to a lower level as the amount grows.
 */
export function selectLevel(levels: readonly ApprovalLevel[], amount: number): ApprovalLevel | null {
  const containing = levels.find(
    (level) => amount >= level.thresholdLow && (level.thresholdHigh === null || amount < level.thresholdHigh)
  );
  if (containing) return containing;

  let fallback: ApprovalLevel | null = null;
  for (const level of levels) {
    if (level.thresholdLow <= amount) fallback = level;
  }
  return fallback;
}

export class ApprovalLevelResolver {
  constructor(
    private readonly database: Database,
    private readonly documents: JournalDocumentGateway
  ) {}

  async listLevels(companyCode: string, db: Knex = this.database.knex): Promise<ApprovalLevel[]> {
    const rows: ApprovalLevelRow[] = await db('approval_levels')
      .where({ company_code: companyCode, is_active: true })
      .orderBy([
        { column: 'threshold_low', order: 'asc' },
        { column: 'level_order', order: 'asc' }
      ]);
    return rows.map(toApprovalLevel);
  }

  async getLevel(levelId: number, db: Knex = this.database.knex): Promise<ApprovalLevel> {
    const row: ApprovalLevelRow | undefined = await db('approval_levels').where({ id: levelId }).first();
    if (!row) {
      throw new NotFoundError(`approval level not found: ${levelId}`);
    }
    return toApprovalLevel(row);
  }

  /** Sum of max(debit, credit) over the document's lines, rounded to cents. */
  async getDocumentTotal(key: DocumentKey, db: Knex = this.database.knex): Promise<number> {
    const document = await this.documents.findDocument(key, {}, db);
    if (!document) {
      throw new ValidationError(`document not found: ${documentLabel(key)}`);
    }
    const lines = await this.documents.listLines(key, db);
    if (lines.length === 0) {
      throw new ValidationError(`document has no line items: ${documentLabel(key)}`);
    }
    return roundCents(lines.reduce((sum, line) => sum + Math.max(line.debitAmount, line.creditAmount), 0));
  }

  async resolveLevel(key: DocumentKey, db: Knex = this.database.knex): Promise<{ amount: number; level: ApprovalLevel | null }> {
    const amount = await this.getDocumentTotal(key, db);
    const levels = await this.listLevels(key.companyCode, db);
    return { amount, level: selectLevel(levels, amount) };
  }

  /** Level id for the document, or null when the amount needs no approval. */
  async calculateRequiredApprovalLevel(key: DocumentKey, db: Knex = this.database.knex): Promise<number | null> {
    const { level } = await this.resolveLevel(key, db);
    return level ? level.id : null;
  }
}
