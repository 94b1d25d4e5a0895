import type { CommuteDistance, CommuteEstimate, CostModel } from '@dayboard/shared-types';
import { ValidationError } from '@dayboard/shared-utils';

export const DEFAULT_COST_MODEL: Readonly<CostModel> = Object.freeze({
  baseFareCents: 200,
  perMileCents: 150,
  perMinuteCents: 25,
});

/**
 * Ride cost as base fare plus distance and time charges. The high estimate
 * scales the low one by `surge`; both are truncated to whole cents.
 */
export function estimateCommuteCost(distance: CommuteDistance, model: CostModel, surge = 1): CommuteEstimate {
  if (!Number.isFinite(surge) || surge < 1) {
    throw new ValidationError('surge must be a number of at least 1', { surge });
  }
  if (distance.miles < 0 || distance.minutes < 0) {
    throw new ValidationError('distance and duration cannot be negative', { ...distance });
  }

  const low = model.baseFareCents + model.perMileCents * distance.miles + model.perMinuteCents * distance.minutes;
  return {
    distanceMiles: distance.miles,
    durationMinutes: distance.minutes,
    estCostLowCents: Math.trunc(low),
    estCostHighCents: Math.trunc(low * surge),
  };
}
