// Core domain types

export type UserId = string;
export type SubscriptionId = string;

/** Calendar date without time of day, formatted `YYYY-MM-DD`. */
export type IsoDate = string;

// Tax estimation

/**
 * One marginal-rate band of a bracket table. All amounts are integer cents and
 * rates are basis points (1/100 of a percent). A `highBoundCents` of 0 marks
 * the unbounded top bracket.
 */
export interface Bracket {
  lowBoundCents: number;
  highBoundCents: number;
  rateBasisPoints: number;
}

export const FILING_STATUSES = ['single', 'married'] as const;
export type FilingStatus = (typeof FILING_STATUSES)[number];

export const KNOWN_PAY_FREQUENCIES = ['weekly', 'biweekly', 'monthly'] as const;
export type KnownPayFrequency = (typeof KNOWN_PAY_FREQUENCIES)[number];

// Unrecognised schedules are accepted and paid out like biweekly.
export type PayFrequency = KnownPayFrequency | (string & {});

export interface TaxProfile {
  annualIncomeCents: number;
  state: string;
  filingStatus: string;
  payFrequency: PayFrequency;
  termWeeks: number;
}

export interface TaxResult {
  readonly federalCents: number;
  readonly stateCents: number;
  readonly ficaCents: number;
  readonly perPaycheckNetCents: number;
  readonly termNetCents: number;
}

export interface FederalTaxTable {
  year: number;
  brackets: Bracket[];
  standardDeductionCents: number;
}

export interface StateTaxTable {
  year: number;
  state: string;
  brackets: Bracket[];
}

export interface TaxTableSet {
  federal: FederalTaxTable[];
  states: StateTaxTable[];
}

// Transactions and subscriptions

export interface Transaction {
  id: string;
  accountId: string;
  /** Positive amounts are money spent; negative amounts are credits. */
  amountCents: number;
  date: IsoDate;
  merchantName: string;
  pending: boolean;
  category: string[];
}

export type SubscriptionFrequency = 'weekly' | 'monthly' | 'quarterly' | 'yearly' | 'unknown';

export interface RecurringSubscription {
  merchantName: string;
  amountCents: number;
  frequency: SubscriptionFrequency;
  lastChargeDate: IsoDate;
  nextDueDate: IsoDate;
  category: string[];
}

export type SubscriptionSource = 'manual' | 'plaid';

export interface Subscription {
  id: SubscriptionId;
  merchant: string;
  amountCents: number;
  cadenceDays: number;
  nextDue: IsoDate | null;
  source: SubscriptionSource;
  isActive: boolean;
}

export interface NewSubscription {
  merchant: string;
  amountCents: number;
  cadenceDays: number;
  nextDue?: IsoDate | null;
}

// Commute

export interface CommuteDistance {
  miles: number;
  minutes: number;
}

export interface CostModel {
  baseFareCents: number;
  perMileCents: number;
  perMinuteCents: number;
}

export interface CommuteEstimate {
  distanceMiles: number;
  durationMinutes: number;
  estCostLowCents: number;
  estCostHighCents: number;
}

export interface CommuteEntry {
  id: string;
  date: IsoDate;
  from: string;
  to: string;
  costCents: number;
  method: string;
}

// Profile

export interface Profile {
  userId: UserId;
  homeAddr: string;
  officeAddr: string;
  city: string;
  state: string;
  hourlyCents: number | null;
  hoursPerWeek: number | null;
  stipendCents: number | null;
  payFreq: PayFrequency;
  startDate: IsoDate | null;
  inOfficeDays: number;
  foodCostCents: number;
}

// Dashboard

export interface DailyBurn {
  totalCents: number;
  breakdown: {
    subscriptions: Subscription[];
    commutes: CommuteEntry[];
    foodCents: number;
  };
}

export interface StateComparison {
  state: string;
  stateCents: number;
  termNetCents: number;
  effectiveStateRateBps: number;
}
