import { db, Queryable } from '@dayboard/database';
import type { Profile, UserId } from '@dayboard/shared-types';

export const DEFAULT_IN_OFFICE_DAYS = 3;
export const DEFAULT_FOOD_COST_CENTS = 1200;

export interface ProfileRepository {
  /** Null when the user has not saved a profile yet; callers decide on defaults. */
  get(userId: UserId): Promise<Profile | null>;
  upsert(profile: Profile): Promise<void>;
}

interface ProfileRow extends Record<string, unknown> {
  home_addr: string | null;
  office_addr: string | null;
  city: string | null;
  state: string | null;
  hourly_cents: number | null;
  hours_per_week: number | null;
  stipend_cents: number | null;
  pay_freq: string | null;
  start_date: string | null;
  in_office_days: number | null;
  food_cost_cents: number | null;
}

function nullableNumber(value: number | null): number | null {
  return value === null ? null : Number(value);
}

export class PostgresProfileRepository implements ProfileRepository {
  constructor(private readonly database: Queryable = db) {}

  async get(userId: UserId): Promise<Profile | null> {
    const result = await this.database.query<ProfileRow>(
      `SELECT home_addr, office_addr, city, state, hourly_cents, hours_per_week,
              stipend_cents, pay_freq, to_char(start_date, 'YYYY-MM-DD') AS start_date,
              in_office_days, food_cost_cents
       FROM profiles WHERE user_id = $1`,
      [userId]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      userId,
      homeAddr: row.home_addr ?? '',
      officeAddr: row.office_addr ?? '',
      city: row.city ?? '',
      state: row.state ?? '',
      hourlyCents: nullableNumber(row.hourly_cents),
      hoursPerWeek: nullableNumber(row.hours_per_week),
      stipendCents: nullableNumber(row.stipend_cents),
      payFreq: row.pay_freq ?? 'biweekly',
      startDate: row.start_date,
      inOfficeDays: row.in_office_days ?? DEFAULT_IN_OFFICE_DAYS,
      foodCostCents: row.food_cost_cents ?? DEFAULT_FOOD_COST_CENTS,
    };
  }

  async upsert(profile: Profile): Promise<void> {
    await this.database.query(
      `INSERT INTO profiles (
         user_id, home_addr, office_addr, city, state, hourly_cents,
         hours_per_week, stipend_cents, pay_freq, start_date,
         in_office_days, food_cost_cents
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (user_id) DO UPDATE SET
         home_addr = EXCLUDED.home_addr,
         office_addr = EXCLUDED.office_addr,
         city = EXCLUDED.city,
         state = EXCLUDED.state,
         hourly_cents = EXCLUDED.hourly_cents,
         hours_per_week = EXCLUDED.hours_per_week,
         stipend_cents = EXCLUDED.stipend_cents,
         pay_freq = EXCLUDED.pay_freq,
         start_date = EXCLUDED.start_date,
         in_office_days = EXCLUDED.in_office_days,
         food_cost_cents = EXCLUDED.food_cost_cents`,
      [
        profile.userId,
        profile.homeAddr,
        profile.officeAddr,
        profile.city,
        profile.state,
        profile.hourlyCents,
        profile.hoursPerWeek,
        profile.stipendCents,
        profile.payFreq,
        profile.startDate,
        profile.inOfficeDays,
        profile.foodCostCents,
      ]
    );
  }
}

export class InMemoryProfileRepository implements ProfileRepository {
  private readonly profiles = new Map<UserId, Profile>();

  constructor(seed: Profile[] = []) {
    for (const profile of seed) {
      this.profiles.set(profile.userId, { ...profile });
    }
  }

  async get(userId: UserId): Promise<Profile | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async upsert(profile: Profile): Promise<void> {
    this.profiles.set(profile.userId, { ...profile });
  }
}
