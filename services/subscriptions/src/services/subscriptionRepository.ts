import { randomUUID } from 'crypto';
import { db, Database } from '@dayboard/database';
import type { NewSubscription, Subscription, SubscriptionId, UserId } from '@dayboard/shared-types';
import { compareIsoDates } from '@dayboard/shared-utils';

export type DetectedSubscription = Omit<Subscription, 'id' | 'source' | 'isActive'>;

export interface SubscriptionRepository {
  /** Active subscriptions, soonest due first; those without a due date last. */
  listActive(userId: UserId): Promise<Subscription[]>;
  create(userId: UserId, input: NewSubscription): Promise<Subscription>;
  /** Returns false when no active subscription with that id belongs to the user. */
  deactivate(userId: UserId, id: SubscriptionId): Promise<boolean>;
  /**
   * Swaps every transaction-derived subscription for `detected`. Manual
   * subscriptions are left alone.
   */
  replaceDetected(userId: UserId, detected: DetectedSubscription[]): Promise<Subscription[]>;
}

export function compareByNextDue(a: Subscription, b: Subscription): number {
  if (a.nextDue === b.nextDue) {
    return 0;
  }
  if (a.nextDue === null) {
    return 1;
  }
  if (b.nextDue === null) {
    return -1;
  }
  return compareIsoDates(a.nextDue, b.nextDue);
}

interface SubscriptionRow extends Record<string, unknown> {
  id: string;
  merchant: string;
  amount_cents: number;
  cadence_days: number;
  next_due: string | null;
  source: Subscription['source'];
  is_active: boolean;
}

const SUBSCRIPTION_COLUMNS = `id, merchant, amount_cents, cadence_days,
  to_char(next_due, 'YYYY-MM-DD') AS next_due, source, is_active`;

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    merchant: row.merchant,
    amountCents: Number(row.amount_cents),
    cadenceDays: Number(row.cadence_days),
    nextDue: row.next_due,
    source: row.source,
    isActive: row.is_active,
  };
}

export class PostgresSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly database: Database = db) {}

  async listActive(userId: UserId): Promise<Subscription[]> {
    const result = await this.database.query<SubscriptionRow>(
      `SELECT ${SUBSCRIPTION_COLUMNS}
       FROM subscriptions
       WHERE user_id = $1 AND is_active = true
       ORDER BY next_due ASC NULLS LAST`,
      [userId]
    );
    return result.rows.map(toSubscription);
  }

  async create(userId: UserId, input: NewSubscription): Promise<Subscription> {
    const id = randomUUID();
    await this.database.query(
      `INSERT INTO subscriptions (id, user_id, merchant, amount_cents, cadence_days, next_due, source, is_active)
       VALUES ($1, $2, $3, $4, $5, $6, 'manual', true)`,
      [id, userId, input.merchant, input.amountCents, input.cadenceDays, input.nextDue ?? null]
    );
    return {
      id,
      merchant: input.merchant,
      amountCents: input.amountCents,
      cadenceDays: input.cadenceDays,
      nextDue: input.nextDue ?? null,
      source: 'manual',
      isActive: true,
    };
  }

  async deactivate(userId: UserId, id: SubscriptionId): Promise<boolean> {
    const result = await this.database.query(
      `UPDATE subscriptions SET is_active = false
       WHERE id = $1 AND user_id = $2 AND is_active = true`,
      [id, userId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async replaceDetected(userId: UserId, detected: DetectedSubscription[]): Promise<Subscription[]> {
    return this.database.transaction(async client => {
      await client.query(`DELETE FROM subscriptions WHERE user_id = $1 AND source = 'plaid'`, [userId]);

      const stored: Subscription[] = [];
      for (const subscription of detected) {
        const result = await client.query<SubscriptionRow>(
          `INSERT INTO subscriptions (id, user_id, merchant, amount_cents, cadence_days, next_due, source, is_active)
           VALUES ($1, $2, $3, $4, $5, $6, 'plaid', true)
           RETURNING ${SUBSCRIPTION_COLUMNS}`,
          [
            randomUUID(),
            userId,
            subscription.merchant,
            subscription.amountCents,
            subscription.cadenceDays,
            subscription.nextDue,
          ]
        );
        stored.push(...result.rows.map(toSubscription));
      }
      return stored;
    });
  }
}

export class InMemorySubscriptionRepository implements SubscriptionRepository {
  private readonly rows = new Map<UserId, Subscription[]>();

  constructor(seed: Record<UserId, Subscription[]> = {}) {
    for (const [userId, subscriptions] of Object.entries(seed)) {
      this.rows.set(userId, subscriptions.map(s => ({ ...s })));
    }
  }

  private forUser(userId: UserId): Subscription[] {
    let subscriptions = this.rows.get(userId);
    if (!subscriptions) {
      subscriptions = [];
      this.rows.set(userId, subscriptions);
    }
    return subscriptions;
  }

  async listActive(userId: UserId): Promise<Subscription[]> {
    return this.forUser(userId)
      .filter(s => s.isActive)
      .map(s => ({ ...s }))
      .sort(compareByNextDue);
  }

  async create(userId: UserId, input: NewSubscription): Promise<Subscription> {
    const subscription: Subscription = {
      id: randomUUID(),
      merchant: input.merchant,
      amountCents: input.amountCents,
      cadenceDays: input.cadenceDays,
      nextDue: input.nextDue ?? null,
      source: 'manual',
      isActive: true,
    };
    this.forUser(userId).push(subscription);
    return { ...subscription };
  }

  async deactivate(userId: UserId, id: SubscriptionId): Promise<boolean> {
    const match = this.forUser(userId).find(s => s.id === id && s.isActive);
    if (!match) {
      return false;
    }
    match.isActive = false;
    return true;
  }

  async replaceDetected(userId: UserId, detected: DetectedSubscription[]): Promise<Subscription[]> {
    const kept = this.forUser(userId).filter(s => s.source !== 'plaid');
    const stored: Subscription[] = detected.map(d => ({
      ...d,
      id: randomUUID(),
      source: 'plaid',
      isActive: true,
    }));
    this.rows.set(userId, [...kept, ...stored]);
    return stored.map(s => ({ ...s }));
  }
}
