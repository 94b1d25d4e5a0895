export { walkBrackets, bracketSegments, sortBrackets, type BracketSegment } from './services/brackets';
export {
  estimateTaxes,
  assertSupportedFilingStatus,
  taxableIncome,
  ficaTax,
  paychecksInTerm,
} from './services/taxEstimator';
export {
  PostgresTaxTableRepository,
  InMemoryTaxTableRepository,
  type TaxTableRepository,
} from './services/taxTableRepository';
export { EstimateService, type EstimateServiceOptions } from './services/estimateService';
