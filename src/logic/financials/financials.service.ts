import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { Environment } from '../../config/configuration';
import { SecDocumentMetadata } from '../documents/document-metadata';

const lineItemSchema = z.object({
  label: z.string().optional(),
  value: z.number(),
  unit: z.string().optional(),
});

const financialsResultSchema = z.object({
  fiscal_year: z.string().optional(),
  fiscal_period: z.string().optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  financials: z.record(z.string(), z.record(z.string(), lineItemSchema)).default({}),
});

const financialsResponseSchema = z.object({
  results: z.array(financialsResultSchema).default([]),
});

export type FinancialStatements = z.infer<typeof financialsResultSchema>;

export class FinancialsRequestError extends Error {
  constructor(readonly status: number, readonly ticker: string) {
    super(`Financials request for ${ticker} failed with status ${status}`);
    this.name = 'FinancialsRequestError';
  }
}

export interface FinancialStatementsSource {
  getStatementsForFiling(metadata: SecDocumentMetadata): Promise<FinancialStatements[]>;
}

@Injectable()
export class FinancialsService implements FinancialStatementsSource {
  private readonly logger = new Logger(FinancialsService.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(private readonly configService: ConfigService<Environment, true>) {
    this.apiKey = this.configService.get('POLYGON_API_KEY', { infer: true });
    this.baseUrl = this.configService.get('POLYGON_BASE_URL', { infer: true }).replace(/\/+$/, '');
  }

  /**
   * Structured statements reported for the filing's fiscal period, or an
   * empty list when none match or no API key is configured.
   */
  async getStatementsForFiling(metadata: SecDocumentMetadata): Promise<FinancialStatements[]> {
    if (!this.apiKey) {
      this.logger.warn(`POLYGON_API_KEY is not set, no structured financials for ${metadata.company_ticker}`);
      return [];
    }

    const params = new URLSearchParams({
      ticker: metadata.company_ticker,
      timeframe: metadata.quarter ? 'quarterly' : 'annual',
      limit: '20',
      sort: 'period_of_report_date',
      order: 'desc',
      apiKey: this.apiKey,
    });
    const resp = await fetch(`${this.baseUrl}/vX/reference/financials?${params.toString()}`);
    if (!resp.ok) {
      throw new FinancialsRequestError(resp.status, metadata.company_ticker);
    }

    const { results } = financialsResponseSchema.parse(await resp.json());
    const fiscalPeriod = metadata.quarter ? `Q${metadata.quarter}` : 'FY';
    return results.filter(
      result => result.fiscal_year === String(metadata.year) && result.fiscal_period === fiscalPeriod,
    );
  }
}

/** One line per reported item: "<statement>.<item> (<label>): <value> <unit>". */
export function formatStatements(statements: FinancialStatements[]): string {
  const lines: string[] = [];
  for (const statement of statements) {
    if (statement.start_date && statement.end_date) {
      lines.push(`period: ${statement.start_date} to ${statement.end_date}`);
    }
    for (const [section, items] of Object.entries(statement.financials)) {
      for (const [key, item] of Object.entries(items)) {
        const label = item.label ? ` (${item.label})` : '';
        const unit = item.unit ? ` ${item.unit}` : '';
        lines.push(`${section}.${key}${label}: ${item.value}${unit}`);
      }
    }
  }
  return lines.join('\n');
}
