import { z } from 'zod';
import { FILING_STATUSES } from '@dayboard/shared-types';
import { ValidationError } from './errors';
import { isIsoDate } from './dates';

export const userIdSchema = z.string().min(1);

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD calendar date' });

export const centsSchema = z.number().int();
export const nonNegativeCentsSchema = centsSchema.nonnegative();

export const bracketSchema = z.object({
  lowBoundCents: nonNegativeCentsSchema,
  highBoundCents: nonNegativeCentsSchema,
  rateBasisPoints: z.number().int().nonnegative().max(10000),
});

export const federalTaxTableSchema = z.object({
  year: z.number().int(),
  standardDeductionCents: nonNegativeCentsSchema,
  standardDeductionMarriedCents: nonNegativeCentsSchema.optional(),
  brackets: z.array(bracketSchema).min(1),
});

export const stateTaxTableSchema = z.object({
  year: z.number().int(),
  state: z.string().trim().toUpperCase(),
  brackets: z.array(bracketSchema),
});

export const taxTableSetSchema = z.object({
  federal: z.array(federalTaxTableSchema),
  states: z.array(stateTaxTableSchema).default([]),
});

export type TaxTableSetData = z.infer<typeof taxTableSetSchema>;

export const filingStatusSchema = z.enum(FILING_STATUSES);

export const estimateTaxesRequestSchema = z.object({
  incomeCents: nonNegativeCentsSchema,
  state: z.string().trim().toUpperCase().default(''),
  // Checked by the estimator so married and unknown statuses get their own errors.
  filingStatus: z.string().trim().toLowerCase(),
  payFreq: z.string().trim().toLowerCase().default('biweekly'),
  termWeeks: z.number().int().nonnegative(),
  year: z.number().int().min(1900).max(2200).optional(),
});

export type EstimateTaxesRequest = z.infer<typeof estimateTaxesRequestSchema>;

export const transactionSchema = z.object({
  id: z.string().min(1),
  accountId: z.string(),
  amountCents: z.number().finite(),
  date: isoDateSchema,
  merchantName: z.string(),
  pending: z.boolean().default(false),
  category: z.array(z.string()).default([]),
});

export const newSubscriptionSchema = z.object(
  {
    merchant: z.string().trim().min(1),
    amountCents: centsSchema.positive(),
    cadenceDays: z.number().int().positive(),
    nextDue: isoDateSchema.nullable().optional(),
  },
  { invalid_type_error: 'Expected a subscription object' }
);

export const profileInputSchema = z.object({
  homeAddr: z.string().trim().default(''),
  officeAddr: z.string().trim().default(''),
  city: z.string().trim().default(''),
  state: z.string().trim().toUpperCase().max(2).default(''),
  hourlyCents: nonNegativeCentsSchema.nullable().default(null),
  hoursPerWeek: z.number().int().min(0).max(168).nullable().default(null),
  stipendCents: nonNegativeCentsSchema.nullable().default(null),
  payFreq: z.string().trim().toLowerCase().default('biweekly'),
  startDate: isoDateSchema.nullable().default(null),
  inOfficeDays: z.number().int().min(0).max(7).default(3),
  foodCostCents: nonNegativeCentsSchema.default(1200),
});

export type ProfileInput = z.infer<typeof profileInputSchema>;

export const commuteRequestSchema = z.object({
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  city: z.string().trim().optional(),
  surge: z.number().finite().min(1).optional(),
});

export type CommuteRequest = z.infer<typeof commuteRequestSchema>;

/**
 * Parses `input` with `schema`, turning zod failures into a ValidationError
 * whose details carry the individual issues.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.issues);
  }
  return result.data;
}

export function validateUserId(id: unknown): string {
  return parseWithSchema(userIdSchema, id, 'Invalid user id');
}
