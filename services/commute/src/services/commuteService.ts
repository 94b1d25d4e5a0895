import type { CommuteEstimate, CostModel } from '@dayboard/shared-types';
import { createServiceLogger, ServiceLogger } from '@dayboard/observability';
import { commuteRequestSchema, parseWithSchema } from '@dayboard/shared-utils';
import { CityCostModelRepository } from './cityCostModelRepository';
import { DEFAULT_COST_MODEL, estimateCommuteCost } from './costModel';
import { DistanceProvider } from './distanceProvider';

export interface CommuteServiceOptions {
  defaultSurge?: number;
  logger?: ServiceLogger;
}

export class CommuteService {
  private readonly defaultSurge: number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly distances: DistanceProvider,
    private readonly costModels: CityCostModelRepository,
    options: CommuteServiceOptions = {}
  ) {
    this.defaultSurge = options.defaultSurge ?? 1;
    this.logger = options.logger ?? createServiceLogger('commute-service');
  }

  async estimate(body: unknown): Promise<CommuteEstimate> {
    const request = parseWithSchema(commuteRequestSchema, body, 'Invalid commute request');
    const model = await this.resolveModel(request.city);
    const distance = await this.distances.measure(request.origin, request.destination);
    const estimate = estimateCommuteCost(distance, model, request.surge ?? this.defaultSurge);

    this.logger.info('Commute estimate computed', {
      city: request.city ?? null,
      miles: estimate.distanceMiles,
      minutes: estimate.durationMinutes,
    });
    return estimate;
  }

  private async resolveModel(city: string | undefined): Promise<CostModel> {
    if (!city) {
      return DEFAULT_COST_MODEL;
    }
    const model = await this.costModels.get(city);
    if (!model) {
      this.logger.debug('No cost model for city, using default', { city });
      return DEFAULT_COST_MODEL;
    }
    return model;
  }
}
