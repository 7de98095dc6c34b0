import type { Serializer, TransportRequestOptions } from '@esforge/transport';
import { bulkBody } from './utils';

export interface TransportLike {
  readonly serializer: Serializer;
  performRequest(method: string, path: string, options?: TransportRequestOptions): Promise<unknown>;
  close?(): Promise<void>;
}

export interface SyncTransportLike {
  readonly serializer: Serializer;
  performRequest(method: string, path: string, options?: TransportRequestOptions): unknown;
  close?(): void;
}

export interface ClientLike {
  readonly transport: TransportLike;
}

export interface SyncClientLike {
  readonly transport: SyncTransportLike;
}

export type RequestOptions = {
  headers?: Record<string, string>;
  requestTimeoutMs?: number;
  ignore?: number | readonly number[];
  opaqueId?: string;
  signal?: AbortSignal;
  clientMeta?: ReadonlyArray<readonly [string, string]>;
};

export function toTransportOptions(
  query: Record<string, string> | undefined,
  body: unknown,
  options: RequestOptions = {}
): TransportRequestOptions {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }
  if (options.opaqueId) {
    headers['x-opaque-id'] = options.opaqueId;
  }
  const ignore = typeof options.ignore === 'number' ? [options.ignore] : options.ignore;
  return {
    query,
    body,
    headers,
    requestTimeoutMs: options.requestTimeoutMs,
    ignore,
    signal: options.signal,
    clientMeta: options.clientMeta
  };
}

/**
 * Base class of every API namespace. Generated modules extend it and call
 * `performRequest` with an already built path and query.
 */
export class NamespacedClient {
  constructor(protected readonly client: ClientLike) {}

  get transport(): TransportLike {
    return this.client.transport;
  }

  protected async performRequest(
    method: string,
    path: string,
    query?: Record<string, string>,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown> {
    return await this.transport.performRequest(method, path, toTransportOptions(query, body, options));
  }

  protected bulkBody(body: unknown): string {
    return bulkBody(this.transport.serializer, body);
  }
}

export class SyncNamespacedClient {
  constructor(protected readonly client: SyncClientLike) {}

  get transport(): SyncTransportLike {
    return this.client.transport;
  }

  protected performRequest(
    method: string,
    path: string,
    query?: Record<string, string>,
    body?: unknown,
    options?: RequestOptions
  ): unknown {
    return this.transport.performRequest(method, path, toTransportOptions(query, body, options));
  }

  protected bulkBody(body: unknown): string {
    return bulkBody(this.transport.serializer, body);
  }
}
