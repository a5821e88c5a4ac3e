import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';

const optionalText = z.string().trim().max(2000).nullish();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');

export const documentParamsSchema = z.object({
  companyCode: z.string().trim().min(1).max(5),
  documentNumber: z.string().trim().min(1).max(20)
});

export const workflowParamsSchema = z.object({
  workflowId: z.coerce.number().int().positive()
});

export const levelParamsSchema = z.object({
  levelId: z.coerce.number().int().positive()
});

export const usernameParamsSchema = z.object({
  username: z.string().trim().min(1).max(50)
});

export const submitBodySchema = z.object({
  comments: optionalText,
  priority: z.enum(['NORMAL', 'HIGH', 'URGENT']).optional()
});

export const commentBodySchema = z.object({
  comments: optionalText
});

export const rejectBodySchema = z.object({
  reason: z.string().trim().min(1, 'a rejection reason is required').max(2000)
});

export const reassignBodySchema = z.object({
  fromUser: z.string().trim().min(1).max(50),
  toUser: z.string().trim().min(1).max(50),
  comments: optionalText
});

export const delegationBodySchema = z.object({
  approvalLevelId: z.number().int().positive(),
  companyCode: z.string().trim().min(1).max(5).nullable().default(null),
  delegateTo: z.string().trim().min(1).max(50),
  startDate: isoDate.nullable().default(null),
  endDate: isoDate.nullable().default(null)
});

export const clearDelegationBodySchema = z.object({
  approvalLevelId: z.number().int().positive(),
  companyCode: z.string().trim().min(1).max(5).nullable().default(null)
});

export const approversQuerySchema = z.object({
  companyCode: z.string().trim().min(1).max(5),
  excludeUser: z.string().trim().min(1).optional()
});

export const workflowsQuerySchema = z.object({
  status: z.enum(['ALL', 'PENDING', 'APPROVED', 'REJECTED', 'WITHDRAWN']).default('ALL'),
  daysBack: z.coerce.number().int().positive().default(30)
});

export const auditQuerySchema = z.object({
  documentNumber: z.string().trim().min(1).optional(),
  companyCode: z.string().trim().min(1).optional(),
  performedBy: z.string().trim().min(1).optional(),
  daysBack: z.coerce.number().int().positive().optional()
});

export const notificationsQuerySchema = z.object({
  unreadOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true')
});

/** Parses with `schema`, turning the first issue into a ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${field}${issue?.message ?? 'invalid input'}`);
  }
  return parsed.data;
}
