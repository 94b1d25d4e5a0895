import type {
  IsoDate,
  RecurringSubscription,
  Subscription,
  SubscriptionFrequency,
  SubscriptionId,
  UserId,
} from '@dayboard/shared-types';
import { createServiceLogger, ServiceLogger } from '@dayboard/observability';
import {
  addDays,
  isoDateSchema,
  newSubscriptionSchema,
  NotFoundError,
  parseWithSchema,
  validateUserId,
} from '@dayboard/shared-utils';
import { detectRecurring } from './recurringDetector';
import { DetectedSubscription, SubscriptionRepository } from './subscriptionRepository';
import { TransactionSource } from './transactionSource';

const CADENCE_DAYS: Record<SubscriptionFrequency, number> = {
  weekly: 7,
  monthly: 30,
  quarterly: 91,
  yearly: 365,
  unknown: 30,
};

export function cadenceDaysFor(frequency: SubscriptionFrequency): number {
  return CADENCE_DAYS[frequency];
}

export function toDetectedSubscription(recurring: RecurringSubscription): DetectedSubscription {
  return {
    merchant: recurring.merchantName,
    amountCents: Math.round(recurring.amountCents),
    cadenceDays: cadenceDaysFor(recurring.frequency),
    nextDue: recurring.nextDueDate,
  };
}

export interface SubscriptionServiceOptions {
  /** How far back a detection run reads transactions. */
  lookbackDays?: number;
  logger?: ServiceLogger;
}

export interface DetectionRun {
  window: { from: IsoDate; to: IsoDate };
  transactionsScanned: number;
  detected: RecurringSubscription[];
  stored: Subscription[];
}

export class SubscriptionService {
  private readonly lookbackDays: number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly subscriptions: SubscriptionRepository,
    private readonly transactions: TransactionSource,
    options: SubscriptionServiceOptions = {}
  ) {
    this.lookbackDays = options.lookbackDays ?? 90;
    this.logger = options.logger ?? createServiceLogger('subscriptions-service');
  }

  async list(userId: UserId): Promise<Subscription[]> {
    return this.subscriptions.listActive(validateUserId(userId));
  }

  async createManual(userId: UserId, body: unknown): Promise<Subscription> {
    const input = parseWithSchema(newSubscriptionSchema, body, 'invalid subscription fields');
    const created = await this.subscriptions.create(validateUserId(userId), input);
    this.logger.info('Manual subscription created', { userId, subscriptionId: created.id });
    return created;
  }

  async remove(userId: UserId, id: SubscriptionId): Promise<void> {
    const removed = await this.subscriptions.deactivate(validateUserId(userId), id);
    if (!removed) {
      throw new NotFoundError('Subscription', id);
    }
    this.logger.info('Subscription deactivated', { userId, subscriptionId: id });
  }

  /**
   * Re-derives the user's transaction-based subscriptions from the lookback
   * window ending on `today`. The previous detected set is replaced wholesale.
   */
  async refreshDetected(userId: UserId, today: IsoDate): Promise<DetectionRun> {
    const user = validateUserId(userId);
    const to = parseWithSchema(isoDateSchema, today, 'Invalid detection date');
    const from = addDays(to, -this.lookbackDays);

    const history = await this.transactions.listTransactions(user, from, to);
    const detected = detectRecurring(history);
    const stored = await this.subscriptions.replaceDetected(user, detected.map(toDetectedSubscription));

    this.logger.info('Recurring charge detection completed', {
      userId: user,
      from,
      to,
      transactionsScanned: history.length,
      detected: detected.length,
    });

    return { window: { from, to }, transactionsScanned: history.length, detected, stored };
  }

  async dueOn(userId: UserId, date: IsoDate): Promise<Subscription[]> {
    const subscriptions = await this.list(userId);
    return subscriptions.filter(s => s.nextDue === date);
  }
}
