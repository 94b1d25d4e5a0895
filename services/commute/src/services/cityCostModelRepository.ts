import { db, Queryable } from '@dayboard/database';
import type { CostModel } from '@dayboard/shared-types';

export interface CityCostModelRepository {
  get(city: string): Promise<CostModel | null>;
}

interface CostModelRow extends Record<string, unknown> {
  base_fare_cents: number;
  per_mile_cents: number;
  per_minute_cents: number;
}

export function normalizeCity(city: string): string {
  return city.trim().toLowerCase();
}

export class PostgresCityCostModelRepository implements CityCostModelRepository {
  constructor(private readonly database: Queryable = db) {}

  async get(city: string): Promise<CostModel | null> {
    const result = await this.database.query<CostModelRow>(
      `SELECT base_fare_cents, per_mile_cents, per_minute_cents
       FROM city_cost_models
       WHERE lower(city) = $1`,
      [normalizeCity(city)]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      baseFareCents: Number(row.base_fare_cents),
      perMileCents: Number(row.per_mile_cents),
      perMinuteCents: Number(row.per_minute_cents),
    };
  }
}

export class InMemoryCityCostModelRepository implements CityCostModelRepository {
  private readonly models = new Map<string, CostModel>();

  constructor(models: Record<string, CostModel> = {}) {
    for (const [city, model] of Object.entries(models)) {
      this.models.set(normalizeCity(city), { ...model });
    }
  }

  async get(city: string): Promise<CostModel | null> {
    const model = this.models.get(normalizeCity(city));
    return model ? { ...model } : null;
  }
}
