import { Database, TAX_TABLES_PATH } from '@dayboard/database';
import {
  CityCostModelRepository,
  CommuteEntryRepository,
  CommuteService,
  FixedDistanceProvider,
  GoogleDistanceMatrixProvider,
  InMemoryCityCostModelRepository,
  InMemoryCommuteEntryRepository,
  PostgresCityCostModelRepository,
  PostgresCommuteEntryRepository,
} from '@dayboard/commute-service';
import {
  EstimateService,
  InMemoryTaxTableRepository,
  PostgresTaxTableRepository,
  TaxTableRepository,
} from '@dayboard/estimate-service';
import { createServiceLogger, ServiceLogger } from '@dayboard/observability';
import type { DailyBurn, IsoDate, Profile, StateComparison, TaxResult, UserId } from '@dayboard/shared-types';
import {
  isoDateSchema,
  NotFoundError,
  parseWithSchema,
  profileInputSchema,
  toIsoDate,
  validateUserId,
} from '@dayboard/shared-utils';
import {
  InMemorySubscriptionRepository,
  InMemoryTransactionSource,
  PostgresSubscriptionRepository,
  PostgresTransactionSource,
  SubscriptionService,
} from '@dayboard/subscriptions-service';
import { DashboardConfig } from '../config';
import { calculateDailyBurn } from './dailyBurn';
import { loadDemoData } from './demoData';
import { InMemoryProfileRepository, PostgresProfileRepository, ProfileRepository } from './profileRepository';
import { compareStates } from './stateComparison';

export interface DashboardDependencies {
  profiles: ProfileRepository;
  taxTables: TaxTableRepository;
  estimates: EstimateService;
  subscriptions: SubscriptionService;
  commute: CommuteService;
  commuteEntries: CommuteEntryRepository;
  costModels: CityCostModelRepository;
}

export class DashboardService {
  private readonly logger: ServiceLogger;

  constructor(
    readonly config: Readonly<DashboardConfig>,
    readonly deps: DashboardDependencies,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {
    this.logger = createServiceLogger('dashboard-service', { demoMode: config.demoMode }, config.logLevel);
  }

  async getProfile(userId: UserId): Promise<Profile | null> {
    return this.deps.profiles.get(validateUserId(userId));
  }

  async saveProfile(userId: UserId, body: unknown): Promise<Profile> {
    const input = parseWithSchema(profileInputSchema, body, 'Invalid profile');
    const profile: Profile = { ...input, userId: validateUserId(userId) };
    await this.deps.profiles.upsert(profile);
    this.logger.info('Profile saved', { userId: profile.userId });
    return profile;
  }

  /** Estimate from a raw request body, for the configured tax year unless the body names one. */
  async estimateTaxes(body: unknown): Promise<TaxResult> {
    return this.deps.estimates.estimate(body);
  }

  /** Pass `isOfficeDay: false` for a remote day; lunch is then left out. */
  async dailyBurn(userId: UserId, today: IsoDate, options: { isOfficeDay?: boolean } = {}): Promise<DailyBurn> {
    const user = validateUserId(userId);
    const date = parseWithSchema(isoDateSchema, today, 'Invalid date');
    const [profile, subscriptions, commutes] = await Promise.all([
      this.deps.profiles.get(user),
      this.deps.subscriptions.dueOn(user, date),
      this.deps.commuteEntries.listOn(user, date),
    ]);

    return calculateDailyBurn({
      today: date,
      subscriptions,
      commutes,
      foodCostCents: profile?.foodCostCents ?? 0,
      isOfficeDay: options.isOfficeDay,
    });
  }

  /**
   * Compares term net pay across states for the user's saved profile and a
   * projected annual income.
   */
  async compareStates(
    userId: UserId,
    annualIncomeCents: number,
    states: readonly string[],
    termWeeks: number
  ): Promise<StateComparison[]> {
    const profile = await this.deps.profiles.get(validateUserId(userId));
    if (!profile) {
      throw new NotFoundError('Profile', userId);
    }
    return compareStates(
      {
        annualIncomeCents,
        state: profile.state,
        filingStatus: 'single',
        payFrequency: profile.payFreq,
        termWeeks,
      },
      states,
      this.deps.taxTables,
      this.config.taxYear
    );
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

/**
 * The bundled tables only cover a few years. When the configured year is not
 * among them the demo runs on the newest bundled year instead.
 */
function resolveDemoTaxYear(config: Readonly<DashboardConfig>, tables: InMemoryTaxTableRepository): number {
  const years = tables.federalYears();
  const latest = years[years.length - 1];
  if (latest === undefined || years.includes(config.taxYear)) {
    return config.taxYear;
  }
  serviceLogger('dashboard-service', config).warn('No bundled tax tables for configured year; using latest', {
    configuredYear: config.taxYear,
    taxYear: latest,
  });
  return latest;
}

function createDemoDependencies(
  config: Readonly<DashboardConfig>,
  today: IsoDate,
  taxTables: InMemoryTaxTableRepository
): DashboardDependencies {
  const demo = loadDemoData(today);
  const costModels = new InMemoryCityCostModelRepository(demo.cityCostModels);

  return {
    profiles: new InMemoryProfileRepository([demo.profile]),
    taxTables,
    estimates: new EstimateService(taxTables, {
      defaultYear: config.taxYear,
      logger: serviceLogger('estimate-service', config),
    }),
    subscriptions: new SubscriptionService(
      new InMemorySubscriptionRepository({ [demo.userId]: demo.subscriptions }),
      new InMemoryTransactionSource({ [demo.userId]: demo.transactions }),
      { lookbackDays: config.recurringLookbackDays, logger: serviceLogger('subscriptions-service', config) }
    ),
    commute: new CommuteService(new FixedDistanceProvider(), costModels, {
      defaultSurge: config.defaultSurge,
      logger: serviceLogger('commute-service', config),
    }),
    commuteEntries: new InMemoryCommuteEntryRepository({ [demo.userId]: demo.commutes }),
    costModels,
  };
}

function createPostgresDependencies(config: Readonly<DashboardConfig>, database: Database): DashboardDependencies {
  const taxTables = new PostgresTaxTableRepository(database);
  const costModels = new PostgresCityCostModelRepository(database);

  return {
    profiles: new PostgresProfileRepository(database),
    taxTables,
    estimates: new EstimateService(taxTables, {
      defaultYear: config.taxYear,
      logger: serviceLogger('estimate-service', config),
    }),
    subscriptions: new SubscriptionService(
      new PostgresSubscriptionRepository(database),
      new PostgresTransactionSource(database),
      { lookbackDays: config.recurringLookbackDays, logger: serviceLogger('subscriptions-service', config) }
    ),
    commute: new CommuteService(new GoogleDistanceMatrixProvider({ apiKey: config.mapsApiKey }), costModels, {
      defaultSurge: config.defaultSurge,
      logger: serviceLogger('commute-service', config),
    }),
    commuteEntries: new PostgresCommuteEntryRepository(database),
    costModels,
  };
}

function serviceLogger(service: string, config: Readonly<DashboardConfig>): ServiceLogger {
  return createServiceLogger(service, undefined, config.logLevel);
}

/**
 * Wires the dashboard for the configured mode: in-memory stores seeded with
 * demo data, or Postgres-backed stores on a dedicated pool.
 */
export function createDashboard(
  config: Readonly<DashboardConfig>,
  today: IsoDate = toIsoDate(new Date())
): DashboardService {
  if (config.demoMode) {
    const taxTables = InMemoryTaxTableRepository.fromFile(TAX_TABLES_PATH);
    const demoConfig = Object.freeze({ ...config, taxYear: resolveDemoTaxYear(config, taxTables) });
    return new DashboardService(demoConfig, createDemoDependencies(demoConfig, today, taxTables));
  }

  const database = new Database(config.database);
  return new DashboardService(config, createPostgresDependencies(config, database), () => database.close());
}
