// src/services/providers/finance/serp-finance.ts
import type {
  CurrencyConversionParams,
  CurrencyConversionResult,
  StockQuoteParams,
  UpstreamPayload,
} from '@/mcp/tool-contract';
import type { FinanceProvider } from '@/services/providers/finance/finance-provider';
import type { SerpApiClient } from '@/services/providers/serpapi';
import { UpstreamError } from '@/services/providers/upstream';
import { isRecord } from '@/utils/helpers';

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Google Finance through SerpAPI: `USD-EUR` style pairs for FX, `SYMBOL:EXCHANGE` for quotes. */
export class SerpFinanceProvider implements FinanceProvider {
  readonly name = 'serpapi-google-finance';

  constructor(private readonly serp: SerpApiClient) {}

  async convertCurrency(params: CurrencyConversionParams): Promise<CurrencyConversionResult> {
    const { from_currency, to_currency, amount } = params;
    if (from_currency === to_currency) {
      return { from_currency, to_currency, amount, rate: 1, converted_amount: amount, summary: {} };
    }

    const pair = `${from_currency}-${to_currency}`;
    const payload = await this.serp.search('google_finance', { q: pair, hl: 'en' });
    const summary = isRecord(payload.summary) ? payload.summary : undefined;
    const rate = summary?.extracted_price;
    if (!summary || typeof rate !== 'number' || !Number.isFinite(rate)) {
      throw new UpstreamError(`Exchange rate unavailable for ${pair}`);
    }

    return {
      from_currency,
      to_currency,
      amount,
      rate,
      converted_amount: round(amount * rate, 4),
      summary,
    };
  }

  async getStockQuote(params: StockQuoteParams): Promise<UpstreamPayload> {
    const q = params.exchange ? `${params.symbol}:${params.exchange}` : params.symbol;
    return this.serp.search('google_finance', { q, hl: 'en' });
  }
}
