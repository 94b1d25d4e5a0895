export {
  detectRecurring,
  classifyFrequency,
  determineFrequency,
  isRecurring,
  dayGaps,
  averageGapDays,
  groupKey,
  GAP_TOLERANCE_DAYS,
  MIN_GROUP_SIZE,
} from './services/recurringDetector';
export {
  PostgresSubscriptionRepository,
  InMemorySubscriptionRepository,
  compareByNextDue,
  type SubscriptionRepository,
  type DetectedSubscription,
} from './services/subscriptionRepository';
export {
  PostgresTransactionSource,
  InMemoryTransactionSource,
  type TransactionSource,
} from './services/transactionSource';
export {
  SubscriptionService,
  cadenceDaysFor,
  toDetectedSubscription,
  type DetectionRun,
  type SubscriptionServiceOptions,
} from './services/subscriptionService';
