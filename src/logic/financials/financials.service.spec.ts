import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { FinancialsRequestError, FinancialsService, formatStatements } from './financials.service';

const acmeQ1 = { company_name: 'ACME Inc', company_ticker: 'ACME', doc_type: '10-Q' as const, year: 2023, quarter: 1 };

async function serviceWithKey(apiKey: string): Promise<FinancialsService> {
  const config: Record<string, string> = { POLYGON_API_KEY: apiKey, POLYGON_BASE_URL: 'https://financials.test/' };
  const module: TestingModule = await Test.createTestingModule({
    providers: [FinancialsService, { provide: ConfigService, useValue: { get: (key: string) => config[key] } }],
  }).compile();
  return module.get<FinancialsService>(FinancialsService);
}

describe('FinancialsService', () => {
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('returns nothing without an API key', async () => {
    const service = await serviceWithKey('');

    await expect(service.getStatementsForFiling(acmeQ1)).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('keeps only the statements of the filing period', async () => {
    fetchMock.mockResolvedValue(
      new Response(
        JSON.stringify({
          results: [
            { fiscal_year: '2023', fiscal_period: 'Q2', financials: {} },
            {
              fiscal_year: '2023',
              fiscal_period: 'Q1',
              financials: { income_statement: { revenues: { label: 'Revenues', value: 1200, unit: 'USD' } } },
            },
          ],
        }),
        { status: 200 },
      ),
    );
    const service = await serviceWithKey('test-key');

    const statements = await service.getStatementsForFiling(acmeQ1);

    expect(statements.map(statement => statement.fiscal_period)).toEqual(['Q1']);
    const [url] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(
      'https://financials.test/vX/reference/financials?ticker=ACME&timeframe=quarterly&limit=20&sort=period_of_report_date&order=desc&apiKey=test-key',
    );
  });

  it('raises on a failed request', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 503 }));
    const service = await serviceWithKey('test-key');

    await expect(service.getStatementsForFiling(acmeQ1)).rejects.toBeInstanceOf(FinancialsRequestError);
  });
});

describe('formatStatements', () => {
  it('writes one line per reported item', () => {
    expect(
      formatStatements([
        {
          start_date: '2023-01-01',
          end_date: '2023-03-31',
          financials: {
            income_statement: { revenues: { label: 'Revenues', value: 1200, unit: 'USD' } },
            balance_sheet: { assets: { value: 5000 } },
          },
        },
      ]),
    ).toBe(
      'period: 2023-01-01 to 2023-03-31\nincome_statement.revenues (Revenues): 1200 USD\nbalance_sheet.assets: 5000',
    );
  });
});
