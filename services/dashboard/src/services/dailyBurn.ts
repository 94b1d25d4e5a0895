import type { CommuteEntry, DailyBurn, IsoDate, Subscription } from '@dayboard/shared-types';

export interface DailyBurnInput {
  today: IsoDate;
  subscriptions: readonly Subscription[];
  commutes: readonly CommuteEntry[];
  foodCostCents: number;
  /** Food is only spent on days at the office. */
  isOfficeDay?: boolean;
}

/** What the user spends on `today`: subscriptions falling due, commutes taken and lunch. */
export function calculateDailyBurn(input: DailyBurnInput): DailyBurn {
  const subscriptions = input.subscriptions.filter(s => s.isActive && s.nextDue === input.today);
  const commutes = input.commutes.filter(c => c.date === input.today);
  const foodCents = input.isOfficeDay === false ? 0 : input.foodCostCents;

  const totalCents =
    subscriptions.reduce((sum, s) => sum + s.amountCents, 0) +
    commutes.reduce((sum, c) => sum + c.costCents, 0) +
    foodCents;

  return {
    totalCents,
    breakdown: { subscriptions, commutes, foodCents },
  };
}
