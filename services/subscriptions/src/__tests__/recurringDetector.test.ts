import { describe, expect, it } from '@jest/globals';
import type { IsoDate, SubscriptionFrequency, Transaction } from '@dayboard/shared-types';
import { addDays } from '@dayboard/shared-utils';
import {
  averageGapDays,
  classifyFrequency,
  detectRecurring,
  groupKey,
  isRecurring,
} from '../services/recurringDetector';

let nextId = 0;

function txn(merchantName: string, amountCents: number, date: IsoDate, overrides: Partial<Transaction> = {}): Transaction {
  nextId += 1;
  return {
    id: `txn-${nextId}`,
    accountId: 'acct-1',
    amountCents,
    date,
    merchantName,
    pending: false,
    category: ['Subscription'],
    ...overrides,
  };
}

function everyNDays(merchant: string, amountCents: number, start: IsoDate, gapDays: number, count: number): Transaction[] {
  return Array.from({ length: count }, (_, i) => txn(merchant, amountCents, addDays(start, i * gapDays)));
}

describe('detectRecurring', () => {
  it('finds a monthly charge and projects the next one', () => {
    const history = [
      txn('Spotify', 999, '2024-01-15'),
      txn('Spotify', 999, '2024-02-14'),
      txn('Spotify', 999, '2024-03-15'),
    ];

    expect(detectRecurring(history)).toEqual([
      {
        merchantName: 'Spotify',
        amountCents: 999,
        frequency: 'monthly',
        lastChargeDate: '2024-03-15',
        nextDueDate: '2024-04-14',
        category: ['Subscription'],
      },
    ]);
  });

  it('does not depend on input order', () => {
    const history = [
      txn('Spotify', 999, '2024-02-14'),
      txn('Spotify', 999, '2024-03-15'),
      txn('Spotify', 999, '2024-01-15'),
    ];

    expect(detectRecurring(history)[0].lastChargeDate).toBe('2024-03-15');
  });

  it('needs at least two charges', () => {
    expect(detectRecurring([txn('Spotify', 999, '2024-03-15')])).toEqual([]);
    expect(detectRecurring([txn('Spotify', 999, '2024-02-14'), txn('Spotify', 999, '2024-03-15')])).toHaveLength(1);
  });

  const pairs: Array<[number, SubscriptionFrequency, IsoDate]> = [
    [0, 'weekly', '2024-03-15'],
    [1, 'weekly', '2024-03-16'],
    [30, 'monthly', '2024-04-14'],
    [400, 'yearly', '2025-04-19'],
  ];

  it.each(pairs)('treats a pair %i days apart as recurring', (gapDays, frequency, nextDueDate) => {
    const [subscription, ...rest] = detectRecurring(everyNDays('Spotify', 999, addDays('2024-03-15', -gapDays), gapDays, 2));

    expect(rest).toEqual([]);
    expect(subscription).toEqual(
      expect.objectContaining({ frequency, lastChargeDate: '2024-03-15', nextDueDate })
    );
  });

  it('groups merchants case-insensitively but amounts exactly', () => {
    const sameMerchant = detectRecurring([txn('NETFLIX', 1599, '2024-01-05'), txn('Netflix', 1599, '2024-02-04')]);
    const differentAmounts = detectRecurring([txn('Netflix', 1599, '2024-01-05'), txn('Netflix', 1799, '2024-02-04')]);

    expect(sameMerchant).toHaveLength(1);
    expect(sameMerchant[0].merchantName).toBe('Netflix');
    expect(differentAmounts).toEqual([]);
  });

  it('ignores pending charges and credits', () => {
    const history = [
      txn('City Gym', 4000, '2024-03-01'),
      txn('City Gym', 4000, '2024-03-08', { pending: true }),
      txn('Payroll', -200000, '2024-03-01'),
      txn('Payroll', -200000, '2024-03-15'),
    ];

    expect(detectRecurring(history)).toEqual([]);
  });

  it('rejects irregular gaps', () => {
    const steadyEnough = [txn('Gym', 4000, '2023-12-26'), txn('Gym', 4000, '2024-01-25'), txn('Gym', 4000, '2024-03-01')];
    const irregular = [txn('Gym', 4000, '2024-01-01'), txn('Gym', 4000, '2024-01-21'), txn('Gym', 4000, '2024-03-01')];

    expect(detectRecurring(steadyEnough)).toHaveLength(1);
    expect(detectRecurring(irregular)).toEqual([]);
  });

  const cadences: Array<[number, SubscriptionFrequency]> = [
    [8, 'weekly'],
    [9, 'monthly'],
    [35, 'monthly'],
    [36, 'quarterly'],
    [95, 'quarterly'],
    [96, 'yearly'],
  ];

  it.each(cadences)('classifies a %i-day cadence as %s', (gap, frequency) => {
    const [subscription] = detectRecurring(everyNDays('Service', 500, '2024-01-01', gap, 3));

    expect(subscription.frequency).toBe(frequency);
    expect(subscription.nextDueDate).toBe(addDays('2024-01-01', gap * 3));
  });

  it('orders results by next due date, then merchant', () => {
    const result = detectRecurring([
      ...everyNDays('Zeta Cloud', 300, '2024-01-01', 30, 2),
      ...everyNDays('Alpha News', 400, '2024-01-01', 30, 2),
      ...everyNDays('Coffee Club', 500, '2024-01-01', 7, 3),
    ]);

    expect(result.map(s => [s.merchantName, s.nextDueDate])).toEqual([
      ['Coffee Club', '2024-01-22'],
      ['Alpha News', '2024-03-01'],
      ['Zeta Cloud', '2024-03-01'],
    ]);
  });
});

describe('detector helpers', () => {
  it('keys groups on merchant and amount', () => {
    expect(groupKey({ merchantName: 'Spotify', amountCents: 999 })).toBe('spotify_999.00');
  });

  it('averages over the whole span', () => {
    const sorted = [txn('A', 1, '2024-03-01'), txn('A', 1, '2024-01-25'), txn('A', 1, '2023-12-26')];

    expect(averageGapDays(sorted)).toBe(33);
    expect(averageGapDays(sorted.slice(0, 1))).toBe(0);
    expect(isRecurring(sorted.slice(0, 1))).toBe(false);
  });

  it('classifies average gaps at the boundaries', () => {
    expect(classifyFrequency(1)).toBe('weekly');
    expect(classifyFrequency(30)).toBe('monthly');
    expect(classifyFrequency(91)).toBe('quarterly');
    expect(classifyFrequency(365)).toBe('yearly');
  });
});
