export const ENDPOINTS = {
  income_statements: '/financials/income-statements/',
  balance_sheets: '/financials/balance-sheets/',
  cash_flow_statements: '/financials/cash-flow-statements/',
  price_snapshot: '/prices/snapshot/',
  prices: '/prices/',
  news: '/news/',
  crypto_tickers: '/crypto/prices/tickers',
  crypto_prices: '/crypto/prices/',
  crypto_price_snapshot: '/crypto/prices/snapshot/',
  filings: '/filings/'
} as const;

export type Operation = keyof typeof ENDPOINTS;
