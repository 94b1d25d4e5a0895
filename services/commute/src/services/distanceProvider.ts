import axios, { AxiosInstance, isAxiosError } from 'axios';
import type { CommuteDistance } from '@dayboard/shared-types';
import { createServiceLogger, withExponentialBackoff } from '@dayboard/observability';
import { ExternalServiceError, isAppError } from '@dayboard/shared-utils';

const logger = createServiceLogger('commute-service');

const DISTANCE_MATRIX_URL = 'https://maps.googleapis.com/maps/api/distancematrix/json';
const MILES_PER_METER = 0.000621371;

export interface DistanceProvider {
  measure(origin: string, destination: string): Promise<CommuteDistance>;
}

export interface DistanceMatrixResponse {
  status: string;
  rows?: Array<{
    elements?: Array<{
      status: string;
      distance?: { value: number; text: string };
      duration?: { value: number; text: string };
    }>;
  }>;
}

export interface GoogleDistanceMatrixOptions {
  apiKey?: string;
  http?: AxiosInstance;
  maxAttempts?: number;
}

export class GoogleDistanceMatrixProvider implements DistanceProvider {
  private readonly apiKey?: string;
  private readonly http: AxiosInstance;
  private readonly maxAttempts: number;

  constructor(options: GoogleDistanceMatrixOptions = {}) {
    this.apiKey = options.apiKey;
    this.http = options.http ?? axios.create({ timeout: 10000 });
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  async measure(origin: string, destination: string): Promise<CommuteDistance> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ExternalServiceError('distance-matrix', 'MAPS_API_KEY is not configured');
    }

    const response = await withExponentialBackoff(
      () =>
        this.http.get<DistanceMatrixResponse>(DISTANCE_MATRIX_URL, {
          params: { origins: origin, destinations: destination, units: 'imperial', key: apiKey },
        }),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: 300,
        // Only transport failures and 5xx responses are worth another attempt.
        shouldRetry: error => isAxiosError(error) && (!error.response || error.response.status >= 500),
        onRetry: (attempt, error, delayMs) => {
          logger.warn('Distance matrix retry scheduled', {
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      }
    ).catch((error: unknown) => {
      logger.error('Distance matrix request failed', error);
      if (isAppError(error)) {
        throw error;
      }
      throw new ExternalServiceError('distance-matrix', 'request failed', {
        cause: error instanceof Error ? error.message : String(error),
      });
    });

    return parseDistanceMatrix(response.data);
  }
}

export function parseDistanceMatrix(body: DistanceMatrixResponse): CommuteDistance {
  const element = body.rows?.[0]?.elements?.[0];
  if (body.status !== 'OK' || !element) {
    throw new ExternalServiceError('distance-matrix', `API error: ${body.status}`);
  }
  if (element.status !== 'OK' || !element.distance || !element.duration) {
    throw new ExternalServiceError('distance-matrix', `element error: ${element.status}`);
  }
  return {
    miles: element.distance.value * MILES_PER_METER,
    minutes: element.duration.value / 60,
  };
}

/** Returns the same distance for every trip; used when no maps key is available. */
export class FixedDistanceProvider implements DistanceProvider {
  constructor(private readonly distance: CommuteDistance = { miles: 3.2, minutes: 14 }) {}

  async measure(): Promise<CommuteDistance> {
    return { ...this.distance };
  }
}
