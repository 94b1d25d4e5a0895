import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import type { ServiceLogger } from '@dayboard/observability';
import { ValidationError } from '@dayboard/shared-utils';
import { InMemoryCityCostModelRepository } from '../services/cityCostModelRepository';
import { CommuteService } from '../services/commuteService';
import { FixedDistanceProvider } from '../services/distanceProvider';

describe('CommuteService', () => {
  let logger: ServiceLogger;
  let service: CommuteService;

  beforeEach(() => {
    logger = { info: jest.fn(), warn: jest.fn(), debug: jest.fn(), error: jest.fn() };
    service = new CommuteService(
      new FixedDistanceProvider(),
      new InMemoryCityCostModelRepository({
        Indianapolis: { baseFareCents: 150, perMileCents: 120, perMinuteCents: 20 },
      }),
      { logger }
    );
  });

  it('prices the trip with the city cost model', async () => {
    const estimate = await service.estimate({ origin: 'Home', destination: 'Office', city: ' indianapolis ' });

    expect(estimate).toEqual({ distanceMiles: 3.2, durationMinutes: 14, estCostLowCents: 814, estCostHighCents: 814 });
    expect(logger.info).toHaveBeenCalledWith('Commute estimate computed', {
      city: 'indianapolis',
      miles: 3.2,
      minutes: 14,
    });
  });

  it('falls back to the default model', async () => {
    const noCity = await service.estimate({ origin: 'Home', destination: 'Office' });
    const unknownCity = await service.estimate({ origin: 'Home', destination: 'Office', city: 'Gary' });

    expect(noCity.estCostLowCents).toBe(1030);
    expect(unknownCity.estCostLowCents).toBe(1030);
    expect(logger.debug).toHaveBeenCalledWith('No cost model for city, using default', { city: 'Gary' });
  });

  it('applies the request surge or the configured default', async () => {
    const surged = await service.estimate({ origin: 'Home', destination: 'Office', city: 'Indianapolis', surge: 2 });
    const withDefault = new CommuteService(new FixedDistanceProvider(), new InMemoryCityCostModelRepository(), {
      defaultSurge: 1.5,
      logger,
    });

    expect(surged.estCostHighCents).toBe(1628);
    await expect(withDefault.estimate({ origin: 'Home', destination: 'Office' })).resolves.toEqual(
      expect.objectContaining({ estCostLowCents: 1030, estCostHighCents: 1545 })
    );
  });

  it('rejects incomplete requests', async () => {
    await expect(service.estimate({ origin: '', destination: 'Office' })).rejects.toThrow('Invalid commute request');
    await expect(service.estimate({ origin: 'Home', destination: 'Office', surge: 0.5 })).rejects.toThrow(
      ValidationError
    );
  });
});
