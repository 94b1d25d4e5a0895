import type { StateComparison, TaxProfile } from '@dayboard/shared-types';
import { estimateTaxes, TaxTableRepository } from '@dayboard/estimate-service';
import { NotFoundError } from '@dayboard/shared-utils';

/**
 * Net term pay for the same profile in each of `states`, best first. States
 * without brackets compare as having no income tax.
 */
export async function compareStates(
  profile: TaxProfile,
  states: readonly string[],
  tables: TaxTableRepository,
  year: number
): Promise<StateComparison[]> {
  const federal = await tables.getFederalTable(year);
  if (!federal) {
    throw new NotFoundError('Federal tax table', String(year));
  }

  const comparisons: StateComparison[] = [];
  for (const state of new Set(states.map(s => s.trim().toUpperCase()))) {
    const brackets = await tables.getStateBrackets(year, state);
    const result = estimateTaxes({ ...profile, state }, federal.brackets, brackets, federal.standardDeductionCents);
    comparisons.push({
      state,
      stateCents: result.stateCents,
      termNetCents: result.termNetCents,
      effectiveStateRateBps:
        profile.annualIncomeCents > 0 ? Math.trunc((result.stateCents * 10000) / profile.annualIncomeCents) : 0,
    });
  }

  return comparisons.sort((a, b) => b.termNetCents - a.termNetCents || a.state.localeCompare(b.state));
}
