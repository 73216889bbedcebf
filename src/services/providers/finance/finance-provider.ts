// src/services/providers/finance/finance-provider.ts
import type {
  CurrencyConversionParams,
  CurrencyConversionResult,
  StockQuoteParams,
  UpstreamPayload,
} from '@/mcp/tool-contract';

export interface FinanceProvider {
  name: string;
  convertCurrency(params: CurrencyConversionParams): Promise<CurrencyConversionResult>;
  getStockQuote(params: StockQuoteParams): Promise<UpstreamPayload>;
}
