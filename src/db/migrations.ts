import type { Knex } from 'knex';

interface Migration {
  version: number;
  name: string;
  up(db: Knex): Promise<void>;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_users_and_journal_entries',
    async up(db) {
      await db.schema.createTable('users', (t) => {
        t.string('username', 50).primary();
        t.string('first_name', 100).notNullable().defaultTo('');
        t.string('last_name', 100).notNullable().defaultTo('');
        t.string('email', 200);
        t.boolean('is_active').notNullable().defaultTo(true);
      });

      await db.schema.createTable('journal_entry_headers', (t) => {
        t.string('document_number', 20).notNullable();
        t.string('company_code', 5).notNullable();
        t.string('reference', 100);
        t.string('posting_date', 10);
        t.string('currency_code', 3);
        t.string('created_by', 50).notNullable();
        t.string('workflow_status', 20).notNullable().defaultTo('DRAFT');
        t.timestamp('submitted_for_approval_at', { useTz: true });
        t.string('submitted_by', 50);
        t.timestamp('approved_at', { useTz: true });
        t.string('approved_by', 50);
        t.timestamp('rejected_at', { useTz: true });
        t.string('rejected_by', 50);
        t.text('rejection_reason');
        t.primary(['document_number', 'company_code']);
      });

      await db.schema.createTable('journal_entry_lines', (t) => {
        t.string('document_number', 20).notNullable();
        t.string('company_code', 5).notNullable();
        t.integer('line_item').notNullable();
        t.string('gl_account', 20);
        t.decimal('debit_amount', 15, 2).notNullable().defaultTo(0);
        t.decimal('credit_amount', 15, 2).notNullable().defaultTo(0);
        t.primary(['document_number', 'company_code', 'line_item']);
      });
    }
  },
  {
    version: 2,
    name: 'create_approval_configuration',
    async up(db) {
      await db.schema.createTable('approval_levels', (t) => {
        t.increments('id');
        t.string('company_code', 5).notNullable();
        t.string('level_name', 50).notNullable();
        t.integer('level_order').notNullable();
        t.decimal('threshold_low', 15, 2).notNullable().defaultTo(0);
        t.decimal('threshold_high', 15, 2);
        t.integer('time_limit').notNullable().defaultTo(72);
        t.string('approval_mode', 3).notNullable().defaultTo('ALL');
        t.boolean('is_active').notNullable().defaultTo(true);
        t.unique(['company_code', 'level_order']);
      });

      await db.schema.createTable('approvers', (t) => {
        t.increments('id');
        t.string('user_id', 50).notNullable();
        t.integer('approval_level_id').notNullable().references('id').inTable('approval_levels');
        t.string('company_code', 5);
        t.boolean('is_active').notNullable().defaultTo(true);
        t.string('delegated_to', 50);
        t.string('delegation_start_date', 10);
        t.string('delegation_end_date', 10);
        t.unique(['user_id', 'approval_level_id', 'company_code']);
      });
    }
  },
  {
    version: 3,
    name: 'create_workflow_tables',
    async up(db) {
      await db.schema.createTable('workflow_instances', (t) => {
        t.increments('id');
        t.string('document_number', 20).notNullable();
        t.string('company_code', 5).notNullable();
        t.string('status', 20).notNullable().defaultTo('PENDING');
        t.string('priority', 10).notNullable().defaultTo('NORMAL');
        t.integer('approval_level').notNullable().references('id').inTable('approval_levels');
        t.string('created_by', 50).notNullable();
        t.string('assigned_to', 50);
        t.timestamp('created_at', { useTz: true }).notNullable();
        t.timestamp('submitted_at', { useTz: true }).notNullable();
        t.timestamp('completed_at', { useTz: true });
        t.timestamp('approved_at', { useTz: true });
        t.string('approved_by', 50);
        t.index(['status'], 'idx_workflow_instances_status');
      });
      await db.raw(`
        CREATE UNIQUE INDEX uq_workflow_instances_pending
        ON workflow_instances (document_number, company_code)
        WHERE status = 'PENDING'
      `);

      await db.schema.createTable('approval_steps', (t) => {
        t.increments('id');
        t.integer('workflow_instance_id').notNullable().references('id').inTable('workflow_instances');
        t.integer('approval_level_id').notNullable().references('id').inTable('approval_levels');
        t.string('assigned_to', 50).notNullable();
        t.string('delegated_from', 50);
        t.string('action', 20).notNullable().defaultTo('PENDING');
        t.string('action_by', 50);
        t.timestamp('action_at', { useTz: true });
        t.text('comments');
        t.timestamp('created_at', { useTz: true }).notNullable();
        t.index(['assigned_to', 'action'], 'idx_approval_steps_assigned');
        t.index(['workflow_instance_id'], 'idx_approval_steps_instance');
      });

      await db.schema.createTable('workflow_audit_log', (t) => {
        t.increments('id');
        t.string('document_number', 20).notNullable();
        t.string('company_code', 5).notNullable();
        t.string('action', 50).notNullable();
        t.string('performed_by', 50).notNullable();
        t.string('old_status', 20);
        t.string('new_status', 20);
        t.text('comments');
        t.timestamp('timestamp', { useTz: true }).notNullable();
        t.index(['document_number', 'company_code'], 'idx_workflow_audit_document');
      });

      await db.schema.createTable('approval_notifications', (t) => {
        t.increments('id');
        t.integer('workflow_instance_id').notNullable().references('id').inTable('workflow_instances');
        t.string('recipient', 50).notNullable();
        t.string('notification_type', 20).notNullable();
        t.string('subject', 200).notNullable();
        t.text('message').notNullable();
        t.timestamp('created_at', { useTz: true }).notNullable();
        t.boolean('is_read').notNullable().defaultTo(false);
        t.index(['recipient', 'is_read'], 'idx_notifications_recipient');
      });
    }
  }
];

export async function runMigrations(db: Knex): Promise<number[]> {
  if (!(await db.schema.hasTable('schema_migrations'))) {
    await db.schema.createTable('schema_migrations', (t) => {
      t.integer('version').primary();
      t.string('name', 100).notNullable();
      t.timestamp('applied_at', { useTz: true }).notNullable().defaultTo(db.fn.now());
    });
  }

  const rows: Array<{ version: number }> = await db('schema_migrations').select('version');
  const applied = new Set(rows.map((row) => Number(row.version)));
  const appliedNow: number[] = [];

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.version)) continue;
    await db.transaction(async (trx) => {
      await migration.up(trx);
      await trx('schema_migrations').insert({ version: migration.version, name: migration.name });
    });
    appliedNow.push(migration.version);
  }
  return appliedNow;
}
