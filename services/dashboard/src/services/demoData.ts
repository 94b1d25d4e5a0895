import { join } from 'path';
import { z } from 'zod';
import type { CommuteEntry, CostModel, IsoDate, Profile, Subscription, Transaction, UserId } from '@dayboard/shared-types';
import { addDays, readJsonFile, transactionSchema } from '@dayboard/shared-utils';

export const DEMO_DATA_PATH = join(__dirname, '..', 'data', 'demo-data.json');

const costModelSchema = z.object({
  baseFareCents: z.number().int().nonnegative(),
  perMileCents: z.number().int().nonnegative(),
  perMinuteCents: z.number().int().nonnegative(),
});

// Dates are stored as offsets so the demo always looks current.
const demoDataSchema = z.object({
  userId: z.string().min(1),
  profile: z.object({
    homeAddr: z.string(),
    officeAddr: z.string(),
    city: z.string(),
    state: z.string(),
    hourlyCents: z.number().int().nullable(),
    hoursPerWeek: z.number().int().nullable(),
    stipendCents: z.number().int().nullable(),
    payFreq: z.string(),
    startDaysAgo: z.number().int().nonnegative().nullable(),
    inOfficeDays: z.number().int(),
    foodCostCents: z.number().int(),
  }),
  subscriptions: z.array(
    z.object({
      merchant: z.string(),
      amountCents: z.number().int().positive(),
      cadenceDays: z.number().int().positive(),
      dueInDays: z.number().int().nullable(),
    })
  ),
  transactions: z.array(transactionSchema.omit({ date: true }).extend({ daysAgo: z.number().int().nonnegative() })),
  commutes: z.array(
    z.object({
      daysAgo: z.number().int().nonnegative(),
      from: z.string(),
      to: z.string(),
      costCents: z.number().int().nonnegative(),
      method: z.string(),
    })
  ),
  cityCostModels: z.record(costModelSchema),
});

export interface DemoData {
  userId: UserId;
  profile: Profile;
  subscriptions: Subscription[];
  transactions: Transaction[];
  commutes: CommuteEntry[];
  cityCostModels: Record<string, CostModel>;
}

export function loadDemoData(today: IsoDate, path: string = DEMO_DATA_PATH): DemoData {
  const raw = readJsonFile(path, demoDataSchema);
  const { startDaysAgo, ...profile } = raw.profile;

  return {
    userId: raw.userId,
    profile: {
      ...profile,
      userId: raw.userId,
      startDate: startDaysAgo === null ? null : addDays(today, -startDaysAgo),
    },
    subscriptions: raw.subscriptions.map((s, index): Subscription => ({
      id: `demo-sub-${index + 1}`,
      merchant: s.merchant,
      amountCents: s.amountCents,
      cadenceDays: s.cadenceDays,
      nextDue: s.dueInDays === null ? null : addDays(today, s.dueInDays),
      source: 'manual',
      isActive: true,
    })),
    transactions: raw.transactions.map(({ daysAgo, ...t }): Transaction => ({ ...t, date: addDays(today, -daysAgo) })),
    commutes: raw.commutes.map(({ daysAgo, ...c }, index): CommuteEntry => ({
      ...c,
      id: `demo-commute-${index + 1}`,
      date: addDays(today, -daysAgo),
    })),
    cityCostModels: raw.cityCostModels,
  };
}
