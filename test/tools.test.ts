import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { UpstreamTimeoutError } from '../src/errors.js';
import { ResponseCache } from '../src/response-cache.js';
import { createFinancialServer } from '../src/server.js';
import { ToolRouter } from '../src/tool-router.js';
import type { Payload, UpstreamClient } from '../src/upstream-client.js';

const openClients: Client[] = [];

async function connect(fetch: UpstreamClient['fetch']) {
  const cache = new ResponseCache<Payload>({ ttlMinutes: 10 });
  const router = new ToolRouter({
    cache,
    client: { fetch, checkHealth: vi.fn<UpstreamClient['checkHealth']>() }
  });
  const server = createFinancialServer(router);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  openClients.push(client);
  return { client, cache };
}

afterEach(async () => {
  await Promise.all(openClients.splice(0).map((client) => client.close()));
});

describe('financial tools', () => {
  it('lists every tool', async () => {
    const { client } = await connect(vi.fn<UpstreamClient['fetch']>());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'get_available_crypto_tickers',
      'get_balance_sheets',
      'get_cash_flow_statements',
      'get_company_news',
      'get_crypto_prices',
      'get_current_crypto_price',
      'get_current_stock_price',
      'get_historical_crypto_prices',
      'get_historical_stock_prices',
      'get_income_statements',
      'get_sec_filings'
    ]);
  });

  it('applies argument defaults and returns the statements', async () => {
    const fetch = vi
      .fn<UpstreamClient['fetch']>()
      .mockResolvedValue({ income_statements: [{ ticker: 'AAPL', net_income: 5 }] });
    const { client } = await connect(fetch);

    const result = await client.callTool({ name: 'get_income_statements', arguments: { ticker: 'AAPL' } });

    expect(fetch).toHaveBeenCalledWith(
      'income_statements',
      { ticker: 'AAPL', period: 'annual', limit: 4 },
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([
      { type: 'text', text: JSON.stringify([{ ticker: 'AAPL', net_income: 5 }], null, 2) }
    ]);
  });

  it('caches statements across tool calls', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ balance_sheets: [{ cash: 1 }] });
    const { client } = await connect(fetch);

    await client.callTool({ name: 'get_balance_sheets', arguments: { ticker: 'MSFT', period: 'quarterly' } });
    await client.callTool({ name: 'get_balance_sheets', arguments: { ticker: 'MSFT', period: 'quarterly' } });

    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('never caches the current stock price', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ snapshot: { price: 200 } });
    const { client, cache } = await connect(fetch);

    await client.callTool({ name: 'get_current_stock_price', arguments: { ticker: 'NVDA' } });
    await client.callTool({ name: 'get_current_stock_price', arguments: { ticker: 'NVDA' } });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch.mock.calls[0][0]).toBe('price_snapshot');
    expect(cache.size).toBe(0);
  });

  it('sends the optional filing type only when given', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ filings: [{ form: '10-K' }] });
    const { client } = await connect(fetch);

    await client.callTool({ name: 'get_sec_filings', arguments: { ticker: 'AAPL' } });
    await client.callTool({ name: 'get_sec_filings', arguments: { ticker: 'AAPL', filing_type: '10-K' } });

    expect(fetch.mock.calls[0][1]).toEqual({ ticker: 'AAPL', limit: 10, filing_type: undefined });
    expect(fetch.mock.calls[1][1]).toEqual({ ticker: 'AAPL', limit: 10, filing_type: '10-K' });
  });

  it('routes both crypto price tools to the same cached request', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ prices: [{ close: 42 }] });
    const { client } = await connect(fetch);
    const args = { ticker: 'BTC-USD', start_date: '2024-01-01', end_date: '2024-01-31' };

    await client.callTool({ name: 'get_crypto_prices', arguments: args });
    const result = await client.callTool({ name: 'get_historical_crypto_prices', arguments: args });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][1]).toEqual({
      ticker: 'BTC-USD',
      interval: 'day',
      interval_multiplier: 1,
      start_date: '2024-01-01',
      end_date: '2024-01-31'
    });
    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify([{ close: 42 }], null, 2) }]);
  });

  it('lists crypto tickers without arguments', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ tickers: ['BTC-USD', 'ETH-USD'] });
    const { client } = await connect(fetch);

    const result = await client.callTool({ name: 'get_available_crypto_tickers', arguments: {} });

    expect(fetch.mock.calls[0][0]).toBe('crypto_tickers');
    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(['BTC-USD', 'ETH-USD'], null, 2) }]);
  });

  it('reports the empty message when nothing is found', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockResolvedValue({ news: [] });
    const { client } = await connect(fetch);

    const result = await client.callTool({ name: 'get_company_news', arguments: { ticker: 'AAPL' } });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([{ type: 'text', text: 'Unable to fetch news or no news found.' }]);
  });

  it('surfaces upstream failures as tool errors', async () => {
    const fetch = vi.fn<UpstreamClient['fetch']>().mockRejectedValue(new UpstreamTimeoutError(30_000));
    const { client, cache } = await connect(fetch);

    const result = await client.callTool({ name: 'get_cash_flow_statements', arguments: { ticker: 'AAPL' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Request timeout after 30000ms' }]);
    expect(cache.size).toBe(0);
  });
});
