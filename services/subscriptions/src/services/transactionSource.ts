import { db, Queryable } from '@dayboard/database';
import type { IsoDate, Transaction, UserId } from '@dayboard/shared-types';
import { compareIsoDates } from '@dayboard/shared-utils';

/** Supplies a user's transaction history for a closed date window. */
export interface TransactionSource {
  listTransactions(userId: UserId, from: IsoDate, to: IsoDate): Promise<Transaction[]>;
}

interface TransactionRow extends Record<string, unknown> {
  id: string;
  account_id: string | null;
  amount_cents: number;
  txn_date: string;
  merchant: string | null;
  pending: boolean | null;
  category: string[] | null;
}

export class PostgresTransactionSource implements TransactionSource {
  constructor(private readonly database: Queryable = db) {}

  async listTransactions(userId: UserId, from: IsoDate, to: IsoDate): Promise<Transaction[]> {
    const result = await this.database.query<TransactionRow>(
      `SELECT COALESCE(ext_id, id::text) AS id,
              account_id,
              amount_cents,
              to_char(txn_date, 'YYYY-MM-DD') AS txn_date,
              merchant,
              pending,
              category
       FROM transactions
       WHERE user_id = $1 AND txn_date BETWEEN $2 AND $3
       ORDER BY txn_date DESC`,
      [userId, from, to]
    );

    return result.rows.map(row => ({
      id: row.id,
      accountId: row.account_id ?? '',
      amountCents: Number(row.amount_cents),
      date: row.txn_date,
      merchantName: row.merchant ?? '',
      pending: row.pending ?? false,
      category: row.category ?? [],
    }));
  }
}

export class InMemoryTransactionSource implements TransactionSource {
  private readonly transactions = new Map<UserId, Transaction[]>();

  constructor(seed: Record<UserId, Transaction[]> = {}) {
    for (const [userId, transactions] of Object.entries(seed)) {
      this.transactions.set(userId, [...transactions]);
    }
  }

  add(userId: UserId, ...transactions: Transaction[]): void {
    this.transactions.set(userId, [...(this.transactions.get(userId) ?? []), ...transactions]);
  }

  async listTransactions(userId: UserId, from: IsoDate, to: IsoDate): Promise<Transaction[]> {
    return (this.transactions.get(userId) ?? []).filter(
      t => compareIsoDates(t.date, from) >= 0 && compareIsoDates(t.date, to) <= 0
    );
  }
}
