import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ToolCall, ToolRouter } from './tool-router.js';

const ticker = z.string().min(1).describe('Ticker symbol of the company (e.g. AAPL, GOOGL)');
const cryptoTicker = z
  .string()
  .min(1)
  .describe(
    'Ticker symbol of the crypto currency (e.g. BTC-USD). The list of available crypto tickers can be retrieved via the get_available_crypto_tickers tool.'
  );
const period = z
  .enum(['annual', 'quarterly', 'ttm'])
  .default('annual')
  .describe('Period of the statements (annual, quarterly or ttm)');
const statementLimit = z.number().int().positive().default(4).describe('Number of statements to return (default: 4)');

const priceRange = {
  start_date: z.string().describe('Start date of the price data (e.g. 2020-01-01)'),
  end_date: z.string().describe('End date of the price data (e.g. 2020-12-31)'),
  interval: z
    .enum(['minute', 'hour', 'day', 'week', 'month'])
    .default('day')
    .describe('Interval of the price data'),
  interval_multiplier: z.number().int().positive().default(1).describe('Multiplier of the interval (e.g. 1, 2, 3)')
};

export function registerFinancialTools(server: McpServer, router: ToolRouter, logger: Logger = silentLogger): void {
  const run = async (name: string, call: ToolCall, signal?: AbortSignal): Promise<CallToolResult> => {
    try {
      const text = await router.invoke(call, signal);
      return { content: [{ type: 'text', text }] };
    } catch (error) {
      logger.error(`Tool ${name} failed: ${errorMessage(error)}`);
      return { content: [{ type: 'text', text: errorMessage(error) }], isError: true };
    }
  };

  server.tool(
    'get_income_statements',
    'Get income statements for a company.',
    { ticker, period, limit: statementLimit },
    async (args, extra) =>
      run('get_income_statements', {
        operation: 'income_statements',
        params: { ticker: args.ticker, period: args.period, limit: args.limit },
        field: 'income_statements',
        emptyMessage: 'Unable to fetch income statements or no income statements found.',
        useCache: true
      }, extra.signal)
  );

  server.tool(
    'get_balance_sheets',
    'Get balance sheets for a company.',
    { ticker, period, limit: statementLimit },
    async (args, extra) =>
      run('get_balance_sheets', {
        operation: 'balance_sheets',
        params: { ticker: args.ticker, period: args.period, limit: args.limit },
        field: 'balance_sheets',
        emptyMessage: 'Unable to fetch balance sheets or no balance sheets found.',
        useCache: true
      }, extra.signal)
  );

  server.tool(
    'get_cash_flow_statements',
    'Get cash flow statements for a company.',
    { ticker, period, limit: statementLimit },
    async (args, extra) =>
      run('get_cash_flow_statements', {
        operation: 'cash_flow_statements',
        params: { ticker: args.ticker, period: args.period, limit: args.limit },
        field: 'cash_flow_statements',
        emptyMessage: 'Unable to fetch cash flow statements or no cash flow statements found.',
        useCache: true
      }, extra.signal)
  );

  server.tool(
    'get_current_stock_price',
    'Get the current / latest price of a company. Always fetched live.',
    { ticker },
    async (args, extra) =>
      run('get_current_stock_price', {
        operation: 'price_snapshot',
        params: { ticker: args.ticker },
        field: 'snapshot',
        emptyMessage: 'Unable to fetch current price or no current price found.',
        useCache: false
      }, extra.signal)
  );

  server.tool(
    'get_historical_stock_prices',
    'Gets historical stock prices for a company.',
    { ticker, ...priceRange },
    async (args, extra) =>
      run('get_historical_stock_prices', {
        operation: 'prices',
        params: {
          ticker: args.ticker,
          interval: args.interval,
          interval_multiplier: args.interval_multiplier,
          start_date: args.start_date,
          end_date: args.end_date
        },
        field: 'prices',
        emptyMessage: 'Unable to fetch prices or no prices found.',
        useCache: true
      }, extra.signal)
  );

  server.tool(
    'get_company_news',
    'Get news for a company.',
    { ticker },
    async (args, extra) =>
      run('get_company_news', {
        operation: 'news',
        params: { ticker: args.ticker },
        field: 'news',
        emptyMessage: 'Unable to fetch news or no news found.',
        useCache: true
      }, extra.signal)
  );

  server.tool(
    'get_available_crypto_tickers',
    'Gets all available crypto tickers.',
    async (extra) =>
      run('get_available_crypto_tickers', {
        operation: 'crypto_tickers',
        params: {},
        field: 'tickers',
        useCache: true
      }, extra.signal)
  );

  const cryptoPrices = (name: string) =>
    async (args: { ticker: string; start_date: string; end_date: string; interval: string; interval_multiplier: number }, signal: AbortSignal) =>
      run(name, {
        operation: 'crypto_prices',
        params: {
          ticker: args.ticker,
          interval: args.interval,
          interval_multiplier: args.interval_multiplier,
          start_date: args.start_date,
          end_date: args.end_date
        },
        field: 'prices',
        emptyMessage: 'Unable to fetch prices or no prices found.',
        useCache: true
      }, signal);

  const getCryptoPrices = cryptoPrices('get_crypto_prices');
  server.tool(
    'get_crypto_prices',
    'Gets historical prices for a crypto currency.',
    { ticker: cryptoTicker, ...priceRange },
    async (args, extra) => getCryptoPrices(args, extra.signal)
  );

  const getHistoricalCryptoPrices = cryptoPrices('get_historical_crypto_prices');
  server.tool(
    'get_historical_crypto_prices',
    'Gets historical prices for a crypto currency.',
    { ticker: cryptoTicker, ...priceRange },
    async (args, extra) => getHistoricalCryptoPrices(args, extra.signal)
  );

  server.tool(
    'get_current_crypto_price',
    'Get the current / latest price of a crypto currency. Always fetched live.',
    { ticker: cryptoTicker },
    async (args, extra) =>
      run('get_current_crypto_price', {
        operation: 'crypto_price_snapshot',
        params: { ticker: args.ticker },
        field: 'snapshot',
        emptyMessage: 'Unable to fetch current price or no current price found.',
        useCache: false
      }, extra.signal)
  );

  server.tool(
    'get_sec_filings',
    'Get all SEC filings for a company.',
    {
      ticker,
      limit: z.number().int().positive().default(10).describe('Number of SEC filings to return (default: 10)'),
      filing_type: z.string().optional().describe('Type of SEC filing (e.g. 10-K, 10-Q, 8-K)')
    },
    async (args, extra) =>
      run('get_sec_filings', {
        operation: 'filings',
        params: { ticker: args.ticker, limit: args.limit, filing_type: args.filing_type },
        field: 'filings',
        emptyMessage: 'Unable to fetch SEC filings or no SEC filings found.',
        useCache: true
      }, extra.signal)
  );
}
