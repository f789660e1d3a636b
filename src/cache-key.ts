export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

export function compactParams(params: QueryParams): Record<string, QueryValue> {
  const compact: Record<string, QueryValue> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) compact[name] = value;
  }
  return compact;
}

/**
 * Key for one logical upstream request: the operation name followed by its
 * parameters sorted by name, e.g. `income_statements?limit=4&period=annual&ticker=AAPL`.
 * Names and values are percent-encoded so no value can forge a separator.
 */
export function buildCacheKey(operation: string, params: QueryParams = {}): string {
  const query = Object.entries(compactParams(params))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(String(value))}`)
    .join('&');
  return query ? `${operation}?${query}` : operation;
}
