import type { Bracket } from '@dayboard/shared-types';

const BASIS_POINTS = 10000;

export interface BracketSegment {
  bracket: Bracket;
  segmentCents: number;
}

export function sortBrackets(brackets: readonly Bracket[]): Bracket[] {
  return [...brackets].sort((a, b) => a.lowBoundCents - b.lowBoundCents);
}

/**
 * Splits `taxableIncomeCents` across an ascending bracket table. A bracket
 * whose high bound is 0 is the open-ended top bracket and absorbs whatever is
 * left. The walk stops as soon as no income remains, so brackets above the
 * income produce no segment.
 */
export function bracketSegments(taxableIncomeCents: number, brackets: readonly Bracket[]): BracketSegment[] {
  const segments: BracketSegment[] = [];
  let remaining = taxableIncomeCents;

  for (const bracket of sortBrackets(brackets)) {
    if (remaining <= 0) {
      break;
    }
    const upperBound = bracket.highBoundCents === 0 ? taxableIncomeCents : bracket.highBoundCents;
    const segmentCents = Math.min(remaining, upperBound - bracket.lowBoundCents);
    segments.push({ bracket, segmentCents });
    remaining -= segmentCents;
  }

  return segments;
}

/** Progressive tax on `taxableIncomeCents`; each bracket's share is truncated to whole cents. */
export function walkBrackets(taxableIncomeCents: number, brackets: readonly Bracket[]): number {
  return bracketSegments(taxableIncomeCents, brackets).reduce(
    (tax, { bracket, segmentCents }) => tax + Math.trunc((segmentCents * bracket.rateBasisPoints) / BASIS_POINTS),
    0
  );
}
