import type { Bracket, TaxProfile, TaxResult } from '@dayboard/shared-types';
import { createServiceLogger, ServiceLogger } from '@dayboard/observability';
import { estimateTaxesRequestSchema, NotFoundError, parseWithSchema } from '@dayboard/shared-utils';
import { assertSupportedFilingStatus, estimateTaxes } from './taxEstimator';
import { TaxTableRepository } from './taxTableRepository';

export interface EstimateServiceOptions {
  /** Year used when a request does not name one. */
  defaultYear?: number;
  logger?: ServiceLogger;
}

export class EstimateService {
  private readonly defaultYear: number;
  private readonly logger: ServiceLogger;

  constructor(private readonly tables: TaxTableRepository, options: EstimateServiceOptions = {}) {
    this.defaultYear = options.defaultYear ?? new Date().getFullYear();
    this.logger = options.logger ?? createServiceLogger('estimate-service');
  }

  /**
   * Validates a raw estimate request, loads the bracket tables for its year
   * and state, and runs the estimator.
   */
  async estimate(body: unknown): Promise<TaxResult> {
    const request = parseWithSchema(estimateTaxesRequestSchema, body, 'Invalid tax estimate request');
    const profile: TaxProfile = {
      annualIncomeCents: request.incomeCents,
      state: request.state,
      filingStatus: request.filingStatus,
      payFrequency: request.payFreq,
      termWeeks: request.termWeeks,
    };
    return this.estimateProfile(profile, request.year);
  }

  async estimateProfile(profile: TaxProfile, year: number = this.defaultYear): Promise<TaxResult> {
    // Reject before touching the tables.
    assertSupportedFilingStatus(profile.filingStatus);

    const federal = await this.tables.getFederalTable(year);
    if (!federal) {
      throw new NotFoundError('Federal tax table', String(year));
    }

    const stateBrackets = await this.loadStateBrackets(year, profile.state);
    const result = estimateTaxes(profile, federal.brackets, stateBrackets, federal.standardDeductionCents);

    this.logger.info('Tax estimate computed', {
      year,
      state: profile.state || null,
      payFrequency: profile.payFrequency,
      termWeeks: profile.termWeeks,
    });
    return result;
  }

  private async loadStateBrackets(year: number, state: string): Promise<Bracket[]> {
    if (!state) {
      return [];
    }
    const brackets = await this.tables.getStateBrackets(year, state);
    // Zero-tax states carry a 0 bps bracket, so an empty list is a missing table.
    if (brackets.length === 0) {
      this.logger.warn('No state brackets found; state tax treated as zero', { year, state });
    }
    return brackets;
  }
}
