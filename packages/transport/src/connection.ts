import { gzipSync } from 'node:zlib';
import { performance } from 'node:perf_hooks';
import { Agent, Headers, fetch } from 'undici';
import type { Response } from 'undici';
import { silentLogger, type Logger } from '@esforge/shared';
import { apiKeyHeader, basicAuthHeader } from './auth';
import { ConnectionError, ConnectionTimeout, RequestAbortedError, errorForStatus } from './errors';
import type { Connection, ConnectionRequest, ConnectionResponse, NodeConfig } from './types';
import { CLIENT_VERSION } from './version';

export const DEFAULT_PORT = 9200;
export const DEFAULT_TIMEOUT_MS = 10_000;

const USER_AGENT = `esforge-js/${CLIENT_VERSION} (Node.js ${process.version})`;

export type HttpConnectionOptions = {
  logger?: Logger;
};

/** Forwards an abort of `external` to `primary`; the returned function detaches the listener. */
function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => {};
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => {};
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => {
    external.removeEventListener('abort', onAbort);
  };
}

export function normalizeUrlPrefix(prefix: string | undefined): string {
  if (!prefix) {
    return '';
  }
  const trimmed = prefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed.length > 0 ? `/${trimmed}` : '';
}

export function formatHost(host: string): string {
  if (host.includes(':') && !host.startsWith('[')) {
    return `[${host}]`;
  }
  return host;
}

export function buildBaseUrl(config: NodeConfig): string {
  const scheme = config.scheme ?? 'http';
  const port = config.port ?? DEFAULT_PORT;
  const defaultPort = scheme === 'https' ? 443 : 80;
  const portSuffix = port === defaultPort ? '' : `:${port}`;
  return `${scheme}://${formatHost(config.host)}${portSuffix}${normalizeUrlPrefix(config.urlPrefix)}`;
}

/**
 * Extracts the human readable part of each `Warning` header entry. Entries look like
 * `299 Elasticsearch-8.0.0 "this is deprecated"`; unquoted values are returned whole.
 */
export function parseWarningHeader(header: string): string[] {
  const quoted = Array.from(header.matchAll(/"((?:[^"\\]|\\.)*)"/g), (match) => match[1] ?? '');
  if (quoted.length > 0) {
    return quoted.filter((warning) => !/^[A-Z][a-z]{2}, \d{2} [A-Z][a-z]{2} \d{4}/.test(warning));
  }
  return [header];
}

function errorDetails(body: string): { error: string; info: unknown } {
  if (body.length === 0) {
    return { error: '', info: undefined };
  }
  let info: unknown = body;
  try {
    info = JSON.parse(body);
  } catch {
    return { error: body, info: body };
  }
  if (typeof info === 'object' && info !== null && 'error' in info) {
    const error = info.error;
    if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
      return { error: error.type, info };
    }
    if (typeof error === 'string') {
      return { error, info };
    }
  }
  return { error: body, info };
}

function buildQueryString(query: ConnectionRequest['query']): string {
  if (!query) {
    return '';
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  const encoded = params.toString();
  return encoded.length > 0 ? `?${encoded}` : '';
}

export class HttpConnection implements Connection {
  readonly config: NodeConfig;
  readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly defaultHeaders: Record<string, string>;
  private readonly agent: Agent;

  constructor(config: NodeConfig, options: HttpConnectionOptions = {}) {
    this.config = config;
    this.baseUrl = buildBaseUrl(config);
    this.logger = options.logger ?? silentLogger;
    this.agent = new Agent({ keepAliveTimeout: 60_000 });
    this.defaultHeaders = this.buildDefaultHeaders();
  }

  toString(): string {
    return `<HttpConnection: ${this.baseUrl}>`;
  }

  async performRequest(
    method: string,
    path: string,
    request: ConnectionRequest = {}
  ): Promise<ConnectionResponse> {
    const url = `${this.baseUrl}${path}${buildQueryString(request.query)}`;
    const headers = new Headers(this.defaultHeaders);
    for (const [key, value] of Object.entries(request.headers ?? {})) {
      headers.set(key, value);
    }

    let payload: string | Buffer | undefined = request.body;
    if (payload !== undefined && this.config.compress) {
      payload = gzipSync(Buffer.from(payload, 'utf8'));
      headers.set('content-encoding', 'gzip');
    }

    const controller = new AbortController();
    const detachSignal = combineSignals(controller, request.signal);
    const timeoutMs = request.timeoutMs ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const start = performance.now();
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
        dispatcher: this.agent
      });
      text = await response.text();
    } catch (err) {
      const durationSeconds = (performance.now() - start) / 1000;
      if (request.signal?.aborted && !timedOut) {
        this.logger.debug({ method, url, durationSeconds }, `${method} ${url} aborted by the caller`);
        throw new RequestAbortedError(request.signal.reason);
      }
      this.logRequestFail(method, url, request.body, durationSeconds, undefined, undefined, err);
      if (timedOut) {
        throw new ConnectionTimeout('TIMEOUT', err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(reason, err);
    } finally {
      clearTimeout(timeout);
      detachSignal();
    }
    const durationSeconds = (performance.now() - start) / 1000;

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    const warning = responseHeaders.warning;
    if (warning) {
      for (const message of parseWarningHeader(warning)) {
        this.logger.warn({ url }, message);
      }
    }

    const status = response.status;
    const ignored = request.ignore ?? [];
    if ((status < 200 || status >= 300) && !ignored.includes(status)) {
      this.logRequestFail(method, url, request.body, durationSeconds, status, text);
      const { error, info } = errorDetails(text);
      throw errorForStatus(status, error, info);
    }

    this.logRequestSuccess(method, url, request.body, status, text, durationSeconds);
    return { statusCode: status, headers: responseHeaders, body: text };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private buildDefaultHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'user-agent': USER_AGENT,
      'content-type': 'application/json'
    };
    if (this.config.compress) {
      headers['accept-encoding'] = 'gzip,deflate';
    }
    if (this.config.opaqueId) {
      headers['x-opaque-id'] = this.config.opaqueId;
    }
    if (this.config.apiKey) {
      headers.authorization = apiKeyHeader(this.config.apiKey);
    } else if (this.config.basicAuth) {
      headers.authorization = basicAuthHeader(this.config.basicAuth);
    } else if (this.config.bearerAuth) {
      headers.authorization = `Bearer ${this.config.bearerAuth}`;
    }
    for (const [key, value] of Object.entries(this.config.headers ?? {})) {
      headers[key.toLowerCase()] = value;
    }
    return headers;
  }

  private logRequestSuccess(
    method: string,
    url: string,
    body: string | undefined,
    status: number,
    response: string,
    durationSeconds: number
  ): void {
    this.logger.info(
      { method, url, status, durationSeconds },
      `${method} ${url} [status:${status} request:${durationSeconds.toFixed(3)}s]`
    );
    if (body !== undefined) {
      this.logger.debug('> %s', body);
    }
    this.logger.debug('< %s', response);
  }

  private logRequestFail(
    method: string,
    url: string,
    body: string | undefined,
    durationSeconds: number,
    status?: number,
    response?: string,
    err?: unknown
  ): void {
    // a missing document on HEAD is an answer, not a failure
    if (method === 'HEAD' && status === 404) {
      return;
    }
    this.logger.warn(
      { method, url, status: status ?? 'N/A', durationSeconds, err },
      `${method} ${url} [status:${status ?? 'N/A'} request:${durationSeconds.toFixed(3)}s]`
    );
    if (body !== undefined) {
      this.logger.debug('> %s', body);
    }
    if (response !== undefined) {
      this.logger.debug('< %s', response);
    }
  }
}

export function createHttpConnectionFactory(options: HttpConnectionOptions = {}) {
  return (config: NodeConfig): Connection => new HttpConnection(config, options);
}
