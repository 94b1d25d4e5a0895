import { describe, expect, it } from '@jest/globals';
import type { Bracket, TaxProfile } from '@dayboard/shared-types';
import { NotImplementedError, ValidationError } from '@dayboard/shared-utils';
import { estimateTaxes, ficaTax, MAX_AMOUNT_CENTS, paychecksInTerm, taxableIncome } from '../services/taxEstimator';

const federalFlat: Bracket[] = [{ lowBoundCents: 0, highBoundCents: 0, rateBasisPoints: 2200 }];
const stateFlat: Bracket[] = [{ lowBoundCents: 0, highBoundCents: 0, rateBasisPoints: 500 }];
const federalProgressive: Bracket[] = [
  { lowBoundCents: 0, highBoundCents: 1160000, rateBasisPoints: 1000 },
  { lowBoundCents: 1160000, highBoundCents: 4715000, rateBasisPoints: 1200 },
  { lowBoundCents: 4715000, highBoundCents: 10052500, rateBasisPoints: 2200 },
  { lowBoundCents: 10052500, highBoundCents: 0, rateBasisPoints: 2400 },
];
const STANDARD_DEDUCTION = 1385000;

function profile(overrides: Partial<TaxProfile> = {}): TaxProfile {
  return {
    annualIncomeCents: 5200000,
    state: 'IN',
    filingStatus: 'single',
    payFrequency: 'biweekly',
    termWeeks: 12,
    ...overrides,
  };
}

describe('estimateTaxes', () => {
  it('computes a biweekly internship term', () => {
    const result = estimateTaxes(profile(), federalFlat, stateFlat, STANDARD_DEDUCTION);

    expect(result).toEqual({
      federalCents: 839300,
      stateCents: 190750,
      ficaCents: 397800,
      termNetCents: 3772150,
      perPaycheckNetCents: 628691,
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('keeps net equal to gross minus every tax', () => {
    const result = estimateTaxes(profile({ annualIncomeCents: 8765432 }), federalProgressive, stateFlat, STANDARD_DEDUCTION);

    expect(result.termNetCents).toBe(8765432 - result.federalCents - result.stateCents - result.ficaCents);
  });

  it('returns zeros for zero income', () => {
    expect(estimateTaxes(profile({ annualIncomeCents: 0 }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toEqual({
      federalCents: 0,
      stateCents: 0,
      ficaCents: 0,
      termNetCents: 0,
      perPaycheckNetCents: 0,
    });
  });

  it('charges only FICA when income is under the standard deduction', () => {
    const result = estimateTaxes(profile({ annualIncomeCents: 1000000 }), federalFlat, stateFlat, STANDARD_DEDUCTION);

    expect(result.federalCents).toBe(0);
    expect(result.stateCents).toBe(0);
    expect(result.ficaCents).toBe(76500);
    expect(result.termNetCents).toBe(923500);
    expect(result.perPaycheckNetCents).toBe(153916);
  });

  it('treats a missing or empty state table as no state tax', () => {
    expect(estimateTaxes(profile(), federalFlat, null, STANDARD_DEDUCTION).stateCents).toBe(0);
    expect(estimateTaxes(profile(), federalFlat, undefined, STANDARD_DEDUCTION).stateCents).toBe(0);
    expect(estimateTaxes(profile({ state: 'TX' }), federalFlat, [], STANDARD_DEDUCTION).stateCents).toBe(0);
  });

  it('reports no paycheck amount when the term has no paychecks', () => {
    const result = estimateTaxes(profile({ termWeeks: 0 }), federalFlat, stateFlat, STANDARD_DEDUCTION);

    expect(result.perPaycheckNetCents).toBe(0);
    expect(result.termNetCents).toBe(3772150);
  });

  it('divides by the number of weekly paychecks', () => {
    const result = estimateTaxes(profile({ payFrequency: 'weekly' }), federalFlat, stateFlat, STANDARD_DEDUCTION);

    expect(result.perPaycheckNetCents).toBe(314345);
  });

  it('never lowers total tax as income rises', () => {
    let previous = -1;
    for (let income = 0; income <= 20000000; income += 250000) {
      const result = estimateTaxes(profile({ annualIncomeCents: income }), federalProgressive, stateFlat, STANDARD_DEDUCTION);
      const total = result.federalCents + result.stateCents + result.ficaCents;
      expect(total).toBeGreaterThanOrEqual(previous);
      previous = total;
    }
  });

  it('reports married filing as not yet supported', () => {
    expect(() => estimateTaxes(profile({ filingStatus: 'married' }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toThrow(
      NotImplementedError
    );
    expect(() => estimateTaxes(profile({ filingStatus: 'married' }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toThrow(
      'married filing jointly not yet supported'
    );
  });

  it('rejects unknown filing statuses as invalid input', () => {
    expect(() =>
      estimateTaxes(profile({ filingStatus: 'head_of_household' }), federalFlat, stateFlat, STANDARD_DEDUCTION)
    ).toThrow('unsupported filing status: head_of_household');
    expect(() => estimateTaxes(profile({ filingStatus: '' }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toThrow(
      ValidationError
    );
  });

  it('checks the filing status before the amounts', () => {
    expect(() =>
      estimateTaxes(profile({ filingStatus: 'married', annualIncomeCents: -5 }), federalFlat, stateFlat, STANDARD_DEDUCTION)
    ).toThrow(NotImplementedError);
  });

  it('rejects negative or fractional amounts', () => {
    expect(() => estimateTaxes(profile({ annualIncomeCents: -1 }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toThrow(
      'annualIncomeCents must be a non-negative whole number'
    );
    expect(() => estimateTaxes(profile({ termWeeks: 1.5 }), federalFlat, stateFlat, STANDARD_DEDUCTION)).toThrow(
      ValidationError
    );
    expect(() => estimateTaxes(profile(), federalFlat, stateFlat, -100)).toThrow(ValidationError);
  });

  it('rejects amounts too large to tax in exact cents', () => {
    expect(() =>
      estimateTaxes(profile({ annualIncomeCents: 2 ** 53 }), federalFlat, stateFlat, STANDARD_DEDUCTION)
    ).toThrow('annualIncomeCents must be a non-negative whole number');
    expect(() =>
      estimateTaxes(profile({ annualIncomeCents: MAX_AMOUNT_CENTS + 1 }), federalFlat, stateFlat, STANDARD_DEDUCTION)
    ).toThrow(ValidationError);
    expect(() => estimateTaxes(profile(), federalFlat, stateFlat, MAX_AMOUNT_CENTS + 1)).toThrow(
      'standardDeductionCents must be a non-negative whole number'
    );
  });

  it('still taxes the largest accepted amount', () => {
    const result = estimateTaxes(profile({ annualIncomeCents: MAX_AMOUNT_CENTS }), federalFlat, [], 0);

    expect(MAX_AMOUNT_CENTS).toBe(900719925474);
    expect(result.federalCents).toBe(198158383604);
    expect(result.ficaCents).toBe(68905074298);
  });
});

describe('estimator helpers', () => {
  it('floors taxable income at zero', () => {
    expect(taxableIncome(5200000, 1385000)).toBe(3815000);
    expect(taxableIncome(100, 1385000)).toBe(0);
  });

  it('truncates FICA to whole cents', () => {
    expect(ficaTax(5200000)).toBe(397800);
    expect(ficaTax(1001)).toBe(76);
  });

  it('counts paychecks per frequency', () => {
    expect(paychecksInTerm('weekly', 12)).toBe(12);
    expect(paychecksInTerm('biweekly', 13)).toBe(6);
    expect(paychecksInTerm('monthly', 12)).toBe(3);
    expect(paychecksInTerm('monthly', 3)).toBe(0);
    expect(paychecksInTerm('semimonthly', 13)).toBe(6);
  });
});
