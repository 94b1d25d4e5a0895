export { estimateCommuteCost, DEFAULT_COST_MODEL } from './services/costModel';
export {
  GoogleDistanceMatrixProvider,
  FixedDistanceProvider,
  parseDistanceMatrix,
  type DistanceProvider,
  type GoogleDistanceMatrixOptions,
} from './services/distanceProvider';
export {
  PostgresCityCostModelRepository,
  InMemoryCityCostModelRepository,
  normalizeCity,
  type CityCostModelRepository,
} from './services/cityCostModelRepository';
export { CommuteService, type CommuteServiceOptions } from './services/commuteService';
export {
  PostgresCommuteEntryRepository,
  InMemoryCommuteEntryRepository,
  type CommuteEntryRepository,
  type NewCommuteEntry,
} from './services/commuteEntryRepository';
