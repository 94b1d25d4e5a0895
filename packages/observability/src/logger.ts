import { randomUUID } from 'crypto';
import { createLogger, LogLevel } from '@dayboard/shared-utils';

type Metadata = Record<string, unknown>;

// Order matters: card numbers must be caught before the bare digit-run rule.
const REDACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN]'],
  [/\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/g, '[CARD]'],
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]'],
  [/\b\d{10,}\b/g, '[PHONE]'],
];

export function maskPII(text: string): string {
  let masked = text;
  for (const [pattern, label] of REDACTIONS) {
    masked = masked.replace(pattern, label);
  }
  return masked;
}

/** Masks the top-level string values of log metadata; nested values pass through. */
function maskMetadata(metadata: Metadata): Metadata {
  return Object.fromEntries(
    Object.entries(metadata).map(([key, value]) => [key, typeof value === 'string' ? maskPII(value) : value])
  );
}

export interface ServiceLogger {
  debug(message: string, meta?: Metadata): void;
  info(message: string, meta?: Metadata): void;
  warn(message: string, meta?: Metadata): void;
  error(message: string, error?: unknown, meta?: Metadata): void;
}

/**
 * Logger for one service. Every line carries the fixed `context` plus a trace
 * id shared by all lines of this logger (`TRACE_ID` when set), and user
 * supplied text is masked before it is written.
 */
export function createServiceLogger(service: string, context: Metadata = {}, minLevel?: LogLevel): ServiceLogger {
  const base = createLogger(service, minLevel);
  const traceId = process.env.TRACE_ID || randomUUID();
  const metadata = (meta: Metadata = {}): Metadata => maskMetadata({ ...context, ...meta, traceId });

  return {
    debug: (message, meta) => base.debug(maskPII(message), metadata(meta)),
    info: (message, meta) => base.info(maskPII(message), metadata(meta)),
    warn: (message, meta) => base.warn(maskPII(message), metadata(meta)),
    error: (message, error, meta) => base.error(maskPII(message), error, metadata(meta)),
  };
}
