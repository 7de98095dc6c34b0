import type { NodeConfig, Serializer } from '@esforge/transport';

export { apiKeyHeader } from '@esforge/transport';

export const GLOBAL_PARAMS = ['pretty', 'human', 'error_trace', 'format', 'filter_path'] as const;

/** Values that are left out of URL paths and query strings. */
export function isSkipped(value: unknown): boolean {
  return value === undefined || value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

export function escapeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((entry) => String(entry)).join(',');
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

/**
 * Joins path parts into a URL path. Skipped parts are dropped and `,` and `*` stay
 * readable so multi-target paths such as `/logs-*,metrics/_search` survive.
 */
export function makePath(...parts: unknown[]): string {
  const segments = parts
    .filter((part) => !isSkipped(part))
    .map((part) => encodeURIComponent(escapeValue(part)).replace(/%2C/gi, ',').replace(/%2A/gi, '*'));
  return `/${segments.join('/')}`;
}

export function pickQueryParams(
  params: Record<string, unknown>,
  accepted: readonly string[]
): Record<string, string> {
  const allowed = new Set<string>([...accepted, ...GLOBAL_PARAMS]);
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (!allowed.has(key) || isSkipped(value)) {
      continue;
    }
    query[key] = escapeValue(value);
  }
  return query;
}

export function requireParams(params: Record<string, unknown>, names: readonly string[]): void {
  for (const name of names) {
    if (isSkipped(params[name])) {
      if (names.length === 1) {
        throw new TypeError(`Empty value passed for a required argument '${name}'.`);
      }
      throw new TypeError('Empty value passed for a required argument.');
    }
  }
}

/** Serializes a bulk body into newline-delimited JSON ending in a newline. */
export function bulkBody(serializer: Serializer, body: unknown): string {
  const encoded = Array.isArray(body)
    ? body.map((line) => serializer.dumps(line)).join('\n')
    : serializer.dumps(body);
  return encoded.endsWith('\n') ? encoded : `${encoded}\n`;
}

function parseHost(host: string): NodeConfig {
  const href = host.includes('://') ? host : `http://${host}`;
  const url = new URL(href);
  const node: NodeConfig = { host: url.hostname.replace(/^\[(.*)\]$/, '$1') };
  if (url.port) {
    node.port = Number.parseInt(url.port, 10);
  } else if (url.protocol === 'http:' && /^[a-z]+:\/\/[^/]*:80(?:\/|$)/i.test(href)) {
    // URL drops the scheme's default port
    node.port = 80;
  }
  if (url.protocol === 'https:') {
    node.scheme = 'https';
    node.port = node.port ?? 443;
  }
  if (url.username || url.password) {
    node.basicAuth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password)
    };
  }
  if (url.pathname && url.pathname !== '/') {
    node.urlPrefix = url.pathname;
  }
  return node;
}

export function normalizeHosts(hosts?: string | ReadonlyArray<string | NodeConfig>): NodeConfig[] {
  if (hosts === undefined) {
    return [{ host: 'localhost' }];
  }
  const list = typeof hosts === 'string' ? [hosts] : hosts;
  return list.map((host) => (typeof host === 'string' ? parseHost(host) : host));
}
