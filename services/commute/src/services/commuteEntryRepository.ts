import { randomUUID } from 'crypto';
import { db, Queryable } from '@dayboard/database';
import type { CommuteEntry, IsoDate, UserId } from '@dayboard/shared-types';

export type NewCommuteEntry = Omit<CommuteEntry, 'id'>;

/** Log of commute trips the user has taken or planned. */
export interface CommuteEntryRepository {
  list(userId: UserId): Promise<CommuteEntry[]>;
  listOn(userId: UserId, date: IsoDate): Promise<CommuteEntry[]>;
  add(userId: UserId, entry: NewCommuteEntry): Promise<CommuteEntry>;
}

interface CommuteEntryRow extends Record<string, unknown> {
  id: string;
  entry_date: string;
  from_label: string;
  to_label: string;
  cost_cents: number;
  method: string;
}

const ENTRY_COLUMNS = `id, to_char(entry_date, 'YYYY-MM-DD') AS entry_date, from_label, to_label, cost_cents, method`;

function toEntry(row: CommuteEntryRow): CommuteEntry {
  return {
    id: row.id,
    date: row.entry_date,
    from: row.from_label,
    to: row.to_label,
    costCents: Number(row.cost_cents),
    method: row.method,
  };
}

export class PostgresCommuteEntryRepository implements CommuteEntryRepository {
  constructor(private readonly database: Queryable = db) {}

  async list(userId: UserId): Promise<CommuteEntry[]> {
    const result = await this.database.query<CommuteEntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM commute_entries WHERE user_id = $1 ORDER BY entry_date DESC`,
      [userId]
    );
    return result.rows.map(toEntry);
  }

  async listOn(userId: UserId, date: IsoDate): Promise<CommuteEntry[]> {
    const result = await this.database.query<CommuteEntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM commute_entries WHERE user_id = $1 AND entry_date = $2`,
      [userId, date]
    );
    return result.rows.map(toEntry);
  }

  async add(userId: UserId, entry: NewCommuteEntry): Promise<CommuteEntry> {
    const id = randomUUID();
    await this.database.query(
      `INSERT INTO commute_entries (id, user_id, entry_date, from_label, to_label, cost_cents, method)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [id, userId, entry.date, entry.from, entry.to, entry.costCents, entry.method]
    );
    return { id, ...entry };
  }
}

export class InMemoryCommuteEntryRepository implements CommuteEntryRepository {
  private readonly entries = new Map<UserId, CommuteEntry[]>();

  constructor(seed: Record<UserId, CommuteEntry[]> = {}) {
    for (const [userId, entries] of Object.entries(seed)) {
      this.entries.set(userId, entries.map(e => ({ ...e })));
    }
  }

  async list(userId: UserId): Promise<CommuteEntry[]> {
    return (this.entries.get(userId) ?? []).map(e => ({ ...e }));
  }

  async listOn(userId: UserId, date: IsoDate): Promise<CommuteEntry[]> {
    return (await this.list(userId)).filter(e => e.date === date);
  }

  async add(userId: UserId, entry: NewCommuteEntry): Promise<CommuteEntry> {
    const stored: CommuteEntry = { id: randomUUID(), ...entry };
    this.entries.set(userId, [...(this.entries.get(userId) ?? []), stored]);
    return { ...stored };
  }
}
