export { createServiceLogger, maskPII, type ServiceLogger } from './logger';
export { withExponentialBackoff, backoffDelay, type RetryOptions } from './retry';
