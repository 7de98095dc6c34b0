import {
  ImproperlyConfigured,
  Transport,
  TransportError,
  nodeFromCloudId,
  type ApiKeyCredentials,
  type BasicAuthCredentials,
  type NodeConfig,
  type TransportOptions
} from '@esforge/transport';
import { NamespacedClient, toTransportOptions, type ClientLike, type RequestOptions, type TransportLike } from './base';
import type {
  BulkParams,
  BulkResponse,
  ClearScrollParams,
  CountParams,
  CountResponse,
  DeleteParams,
  DocumentParams,
  GetResponse,
  GlobalParams,
  IndexParams,
  InfoResponse,
  ScrollParams,
  SearchParams,
  SearchResponse,
  WriteResponse
} from './types';
import { bulkBody, isSkipped, makePath, normalizeHosts, pickQueryParams, requireParams } from './utils';

export type ClientOptions = Omit<TransportOptions, 'nodes'> & {
  node?: string | NodeConfig;
  nodes?: ReadonlyArray<string | NodeConfig>;
  cloudId?: string;
  apiKey?: ApiKeyCredentials;
  basicAuth?: BasicAuthCredentials;
  bearerAuth?: string;
  headers?: Record<string, string>;
  opaqueId?: string;
  requestTimeoutMs?: number;
  compress?: boolean;
  transport?: TransportLike;
};

const SEARCH_QUERY = [
  'q',
  'scroll',
  'size',
  'from',
  'sort',
  'routing',
  'track_total_hits',
  'request_cache',
  'search_type',
  'preference',
  'timeout',
  '_source'
];
const COUNT_QUERY = ['q', 'routing', 'preference'];
const INDEX_QUERY = [
  'op_type',
  'refresh',
  'routing',
  'pipeline',
  'if_seq_no',
  'if_primary_term',
  'version',
  'version_type',
  'timeout',
  'wait_for_active_shards'
];
const GET_QUERY = [
  'routing',
  'preference',
  'realtime',
  'refresh',
  '_source',
  '_source_includes',
  '_source_excludes',
  'version',
  'version_type'
];
const DELETE_QUERY = [
  'routing',
  'refresh',
  'if_seq_no',
  'if_primary_term',
  'timeout',
  'version',
  'version_type',
  'wait_for_active_shards'
];
const BULK_QUERY = ['pipeline', 'refresh', 'routing', 'timeout', 'wait_for_active_shards', 'require_alias', '_source'];
const SCROLL_QUERY = ['scroll', 'rest_total_hits_as_int'];

function resolveNodes(options: ClientOptions): NodeConfig[] {
  const shared: Omit<NodeConfig, 'host'> = {};
  if (options.apiKey !== undefined) shared.apiKey = options.apiKey;
  if (options.basicAuth !== undefined) shared.basicAuth = options.basicAuth;
  if (options.bearerAuth !== undefined) shared.bearerAuth = options.bearerAuth;
  if (options.headers !== undefined) shared.headers = options.headers;
  if (options.opaqueId !== undefined) shared.opaqueId = options.opaqueId;
  if (options.requestTimeoutMs !== undefined) shared.timeoutMs = options.requestTimeoutMs;
  if (options.compress !== undefined) shared.compress = options.compress;

  if (options.cloudId) {
    if (options.node || options.nodes) {
      throw new ImproperlyConfigured("You cannot pass both 'cloudId' and 'node'/'nodes'");
    }
    return [nodeFromCloudId(options.cloudId, shared)];
  }

  const hosts = options.nodes ?? (options.node ? [options.node] : undefined);
  return normalizeHosts(hosts).map((node) => ({ ...shared, ...node }));
}

export class XPackClient extends NamespacedClient {
  async info(params: GlobalParams & { categories?: string | string[] } = {}, options?: RequestOptions) {
    return this.performRequest('GET', '/_xpack', pickQueryParams(params, ['categories']), undefined, options);
  }

  async usage(params: GlobalParams & { master_timeout?: string } = {}, options?: RequestOptions) {
    return this.performRequest('GET', '/_xpack/usage', pickQueryParams(params, ['master_timeout']), undefined, options);
  }
}

export class Client implements ClientLike {
  readonly transport: TransportLike;
  readonly xpack: XPackClient;

  constructor(options: ClientOptions = {}) {
    const {
      node: _node,
      nodes: _nodes,
      cloudId: _cloudId,
      apiKey: _apiKey,
      basicAuth: _basicAuth,
      bearerAuth: _bearerAuth,
      headers: _headers,
      opaqueId: _opaqueId,
      requestTimeoutMs: _requestTimeoutMs,
      compress: _compress,
      transport,
      ...transportOptions
    } = options;
    this.transport = transport ?? new Transport({ ...transportOptions, nodes: resolveNodes(options) });
    this.xpack = new XPackClient(this);
  }

  toString(): string {
    return '<Client>';
  }

  async info(params: GlobalParams = {}, options?: RequestOptions): Promise<InfoResponse> {
    return this.send<InfoResponse>('GET', '/', pickQueryParams(params, []), undefined, options);
  }

  /** Returns whether the cluster answers. Transport failures resolve to `false`. */
  async ping(params: GlobalParams = {}, options?: RequestOptions): Promise<boolean> {
    try {
      return await this.send<boolean>('HEAD', '/', pickQueryParams(params, []), undefined, options);
    } catch (err) {
      if (err instanceof TransportError) {
        return false;
      }
      throw err;
    }
  }

  async search<TDocument = unknown>(
    params: SearchParams = {},
    options?: RequestOptions
  ): Promise<SearchResponse<TDocument>> {
    const { index, body, ...query } = params;
    return this.send<SearchResponse<TDocument>>(
      'POST',
      makePath(index, '_search'),
      pickQueryParams(query, SEARCH_QUERY),
      body,
      options
    );
  }

  async count(params: CountParams = {}, options?: RequestOptions): Promise<CountResponse> {
    const { index, body, ...query } = params;
    return this.send<CountResponse>(
      'POST',
      makePath(index, '_count'),
      pickQueryParams(query, COUNT_QUERY),
      body,
      options
    );
  }

  async index<TDocument>(params: IndexParams<TDocument>, options?: RequestOptions): Promise<WriteResponse> {
    requireParams(params, ['index', 'body']);
    const { index, id, body, ...query } = params;
    const method = id === undefined || id === '' ? 'POST' : 'PUT';
    return this.send<WriteResponse>(
      method,
      makePath(index, '_doc', id),
      pickQueryParams(query, INDEX_QUERY),
      body,
      options
    );
  }

  async get<TDocument = unknown>(params: DocumentParams, options?: RequestOptions): Promise<GetResponse<TDocument>> {
    requireParams(params, ['index', 'id']);
    const { index, id, ...query } = params;
    return this.send<GetResponse<TDocument>>(
      'GET',
      makePath(index, '_doc', id),
      pickQueryParams(query, GET_QUERY),
      undefined,
      options
    );
  }

  async exists(params: DocumentParams, options?: RequestOptions): Promise<boolean> {
    requireParams(params, ['index', 'id']);
    const { index, id, ...query } = params;
    return this.send<boolean>(
      'HEAD',
      makePath(index, '_doc', id),
      pickQueryParams(query, GET_QUERY),
      undefined,
      options
    );
  }

  async delete(params: DeleteParams, options?: RequestOptions): Promise<WriteResponse> {
    requireParams(params, ['index', 'id']);
    const { index, id, ...query } = params;
    return this.send<WriteResponse>(
      'DELETE',
      makePath(index, '_doc', id),
      pickQueryParams(query, DELETE_QUERY),
      undefined,
      options
    );
  }

  async bulk(params: BulkParams, options: RequestOptions = {}): Promise<BulkResponse> {
    requireParams(params, ['body']);
    const { index, body, ...query } = params;
    const headers = { 'content-type': 'application/x-ndjson', ...options.headers };
    return this.send<BulkResponse>(
      'POST',
      makePath(index, '_bulk'),
      pickQueryParams(query, BULK_QUERY),
      bulkBody(this.transport.serializer, body),
      { ...options, headers }
    );
  }

  async scroll<TDocument = unknown>(
    params: ScrollParams = {},
    options?: RequestOptions
  ): Promise<SearchResponse<TDocument>> {
    const { scroll_id: scrollId, body, ...query } = params;
    if (isSkipped(scrollId) && isSkipped(body)) {
      throw new TypeError('You need to supply scroll_id or body.');
    }
    const payload = isSkipped(body) ? { scroll_id: scrollId } : body;
    const queryParams = pickQueryParams(isSkipped(body) ? query : { ...query, scroll_id: scrollId }, [
      ...SCROLL_QUERY,
      'scroll_id'
    ]);
    return this.send<SearchResponse<TDocument>>('POST', '/_search/scroll', queryParams, payload, options);
  }

  async clearScroll(params: ClearScrollParams = {}, options?: RequestOptions): Promise<unknown> {
    const { scroll_id: scrollId, body, ...query } = params;
    if (isSkipped(scrollId) && isSkipped(body)) {
      throw new TypeError('You need to supply scroll_id or body.');
    }
    if (isSkipped(body)) {
      const payload = { scroll_id: Array.isArray(scrollId) ? scrollId : [scrollId] };
      return this.send<unknown>('DELETE', '/_search/scroll', pickQueryParams(query, []), payload, options);
    }
    const queryParams = pickQueryParams({ ...query, scroll_id: scrollId }, ['scroll_id']);
    return this.send<unknown>('DELETE', '/_search/scroll', queryParams, body, options);
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  private async send<T>(
    method: string,
    path: string,
    query: Record<string, string>,
    body: unknown,
    options?: RequestOptions
  ): Promise<T> {
    const response = await this.transport.performRequest(method, path, toTransportOptions(query, body, options));
    return response as T;
  }
}
