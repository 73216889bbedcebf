import express from 'express';
import { currencyConversionSchema, stockQuoteSchema } from '@/mcp/tool-contract';
import type { FinanceProvider } from '@/services/providers/finance/finance-provider';
import { envelopeHandler } from '@/routes/handler';

/** Mounted at /finance. */
export function financeRoutes(provider: FinanceProvider): express.Router {
  const router = express.Router();

  const convert = envelopeHandler(currencyConversionSchema, (params) => provider.convertCurrency(params));
  router.get('/convert-currency', convert);
  router.post('/convert-currency', convert);

  router.get('/stock/:symbol', envelopeHandler(stockQuoteSchema, (params) => provider.getStockQuote(params)));

  return router;
}
