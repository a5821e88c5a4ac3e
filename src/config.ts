import { z } from 'zod';

const configSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
    DATABASE_URL: z.string().trim().min(1).optional(),
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
    SQLITE_FILENAME: z.string().trim().min(1).default('data/gl-approvals.db'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
  })
  .superRefine((value, ctx) => {
    if (value.DATABASE_CLIENT === 'pg' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when DATABASE_CLIENT is pg'
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
