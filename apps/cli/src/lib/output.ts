export function formatOutput(payload: unknown, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  console.log(payload);
}

/** Parses repeated `key=value` pairs into a query object. */
export function parseQueryPairs(pairs: readonly string[]): Record<string, string> {
  const query: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new Error(`Invalid query parameter '${pair}', expected key=value`);
    }
    query[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return query;
}

export function parseJsonBody(raw: string | undefined): unknown {
  if (raw === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse body JSON: ${message}`);
  }
}
