import type { Bracket, FilingStatus, PayFrequency, TaxProfile, TaxResult } from '@dayboard/shared-types';
import { FILING_STATUSES } from '@dayboard/shared-types';
import { NotImplementedError, ValidationError } from '@dayboard/shared-utils';
import { walkBrackets } from './brackets';

// Flat 7.65% on gross pay: no wage base cap, no Social Security / Medicare split.
const FICA_RATE_BPS = 765;

function isFilingStatus(value: string): value is FilingStatus {
  return FILING_STATUSES.some(status => status === value);
}

/**
 * Accepts only filing statuses the estimator can compute. Married filing is a
 * known status that is not modelled yet and is reported as such rather than
 * as invalid input.
 */
export function assertSupportedFilingStatus(filingStatus: string): 'single' {
  if (!isFilingStatus(filingStatus)) {
    throw new ValidationError(`unsupported filing status: ${filingStatus}`, { filingStatus });
  }
  if (filingStatus === 'married') {
    throw new NotImplementedError('married filing jointly not yet supported', { filingStatus });
  }
  return filingStatus;
}

/** Largest amount whose product with a rate of at most 10000 bps stays exact. */
export const MAX_AMOUNT_CENTS = Math.trunc(Number.MAX_SAFE_INTEGER / 10000);

function assertWholeCents(name: string, value: number, max: number = MAX_AMOUNT_CENTS): void {
  if (!Number.isSafeInteger(value) || value < 0 || value > max) {
    throw new ValidationError(`${name} must be a non-negative whole number`, { [name]: value });
  }
}

export function taxableIncome(annualIncomeCents: number, standardDeductionCents: number): number {
  return Math.max(0, annualIncomeCents - standardDeductionCents);
}

export function ficaTax(grossIncomeCents: number): number {
  return Math.trunc((grossIncomeCents * FICA_RATE_BPS) / 10000);
}

export function paychecksInTerm(payFrequency: PayFrequency, termWeeks: number): number {
  switch (payFrequency) {
    case 'weekly':
      return termWeeks;
    case 'biweekly':
      return Math.trunc(termWeeks / 2);
    case 'monthly':
      // Four weeks to the month.
      return Math.trunc(termWeeks / 4);
    default:
      return Math.trunc(termWeeks / 2);
  }
}

/**
 * Federal, state and FICA tax on a year's income, plus the net take-home
 * spread over the paychecks of the term.
 *
 * Federal and state brackets are applied to the same taxable base (gross less
 * the standard deduction, never below zero); FICA uses gross income. A missing
 * or empty state table contributes no state tax.
 */
export function estimateTaxes(
  profile: TaxProfile,
  federalBrackets: readonly Bracket[],
  stateBrackets: readonly Bracket[] | null | undefined,
  standardDeductionCents: number
): TaxResult {
  assertSupportedFilingStatus(profile.filingStatus);
  assertWholeCents('annualIncomeCents', profile.annualIncomeCents);
  assertWholeCents('termWeeks', profile.termWeeks, Number.MAX_SAFE_INTEGER);
  assertWholeCents('standardDeductionCents', standardDeductionCents);

  const taxable = taxableIncome(profile.annualIncomeCents, standardDeductionCents);
  const federalCents = walkBrackets(taxable, federalBrackets);
  const stateCents = stateBrackets && stateBrackets.length > 0 ? walkBrackets(taxable, stateBrackets) : 0;
  const ficaCents = ficaTax(profile.annualIncomeCents);

  const checks = paychecksInTerm(profile.payFrequency, profile.termWeeks);
  const netAnnual = profile.annualIncomeCents - (federalCents + stateCents + ficaCents);

  return Object.freeze({
    federalCents,
    stateCents,
    ficaCents,
    perPaycheckNetCents: checks > 0 ? Math.trunc(netAnnual / checks) : 0,
    termNetCents: netAnnual,
  });
}
