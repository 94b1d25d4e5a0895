import type { RecurringSubscription, SubscriptionFrequency, Transaction } from '@dayboard/shared-types';
import { addDays, compareIsoDates, daysBetween } from '@dayboard/shared-utils';

/** Largest distance, in days, any gap may sit from the group's average gap. */
export const GAP_TOLERANCE_DAYS = 5;

/** Fewest charges that can establish a pattern. */
export const MIN_GROUP_SIZE = 2;

export function groupKey(transaction: Pick<Transaction, 'merchantName' | 'amountCents'>): string {
  return `${transaction.merchantName.toLowerCase()}_${transaction.amountCents.toFixed(2)}`;
}

export function classifyFrequency(averageGapDays: number): Exclude<SubscriptionFrequency, 'unknown'> {
  if (averageGapDays <= 8) {
    return 'weekly';
  }
  if (averageGapDays <= 35) {
    return 'monthly';
  }
  if (averageGapDays <= 95) {
    return 'quarterly';
  }
  return 'yearly';
}

function newestFirst(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => compareIsoDates(b.date, a.date));
}

/** Day gaps between consecutive charges of a newest-first list. */
export function dayGaps(sorted: readonly Transaction[]): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    gaps.push(daysBetween(sorted[i].date, sorted[i - 1].date));
  }
  return gaps;
}

/** Average gap across the whole span of a newest-first list, in whole days. */
export function averageGapDays(sorted: readonly Transaction[]): number {
  if (sorted.length < 2) {
    return 0;
  }
  const spanDays = daysBetween(sorted[sorted.length - 1].date, sorted[0].date);
  return Math.trunc(spanDays / (sorted.length - 1));
}

/**
 * Charges recur when every gap stays within {@link GAP_TOLERANCE_DAYS} of the
 * average gap. Two charges have a single gap, which is its own average, so any
 * pair passes.
 */
export function isRecurring(sorted: readonly Transaction[]): boolean {
  const gaps = dayGaps(sorted);
  if (gaps.length === 0) {
    return false;
  }
  const average = Math.trunc(gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length);
  return gaps.every(gap => Math.abs(gap - average) <= GAP_TOLERANCE_DAYS);
}

export function determineFrequency(sorted: readonly Transaction[]): SubscriptionFrequency {
  return sorted.length < 2 ? 'unknown' : classifyFrequency(averageGapDays(sorted));
}

/**
 * Finds charges that repeat with the same merchant and exact amount at a
 * steady interval. Pending charges and credits are ignored. Each returned
 * subscription describes its most recent charge; results are ordered by next
 * due date, then merchant name.
 */
export function detectRecurring(transactions: readonly Transaction[]): RecurringSubscription[] {
  const groups = new Map<string, Transaction[]>();

  for (const transaction of transactions) {
    if (transaction.pending || transaction.amountCents < 0) {
      continue;
    }
    const key = groupKey(transaction);
    const group = groups.get(key);
    if (group) {
      group.push(transaction);
    } else {
      groups.set(key, [transaction]);
    }
  }

  const subscriptions: RecurringSubscription[] = [];

  for (const group of groups.values()) {
    if (group.length < MIN_GROUP_SIZE) {
      continue;
    }

    const sorted = newestFirst(group);
    if (!isRecurring(sorted)) {
      continue;
    }

    const latest = sorted[0];
    subscriptions.push({
      merchantName: latest.merchantName,
      amountCents: latest.amountCents,
      frequency: determineFrequency(sorted),
      lastChargeDate: latest.date,
      nextDueDate: addDays(latest.date, averageGapDays(sorted)),
      category: [...latest.category],
    });
  }

  return subscriptions.sort(
    (a, b) => compareIsoDates(a.nextDueDate, b.nextDueDate) || a.merchantName.localeCompare(b.merchantName)
  );
}
