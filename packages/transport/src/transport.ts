import { silentLogger, type Logger } from '@esforge/shared';
import { createHttpConnectionFactory } from './connection';
import {
  AuthenticationException,
  AuthorizationException,
  ConnectionError,
  ConnectionTimeout,
  SerializationError,
  TransportError,
  UnsupportedProductError
} from './errors';
import { NodePool, SingleNodePool, type ConnectionPool } from './pool';
import type { NodeSelector } from './selector';
import { Deserializer, JsonSerializer, defaultSerializers, type Serializer } from './serializer';
import type { Connection, ConnectionFactory, ConnectionResponse, NodeConfig, QueryValue } from './types';
import { CLIENT_VERSION, clientMetaVersion } from './version';

export type SendGetBodyAs = 'GET' | 'POST' | 'source';

export type SniffedNodeInfo = {
  roles: string[];
  publishAddress?: string;
  /** The node's entry from `GET /_nodes/_all/http`. */
  raw: Record<string, unknown>;
};

/** Returns the node to connect to, or null to skip it. */
export type NodeFilter = (info: SniffedNodeInfo, node: NodeConfig) => NodeConfig | null;

export type TransportOptions = {
  nodes?: NodeConfig[];
  connectionFactory?: ConnectionFactory;
  selector?: NodeSelector;
  randomizeNodes?: boolean;
  deadTimeoutMs?: number;
  timeoutCutoff?: number;
  sniffOnStart?: boolean;
  sniffIntervalMs?: number;
  sniffTimeoutMs?: number;
  sniffOnConnectionFail?: boolean;
  nodeFilter?: NodeFilter;
  serializer?: Serializer;
  serializers?: Serializer[];
  defaultMimetype?: string;
  maxRetries?: number;
  retryOnStatus?: readonly number[];
  retryOnTimeout?: boolean;
  sendGetBodyAs?: SendGetBodyAs;
  metaHeader?: boolean;
  productCheck?: boolean;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
};

export type TransportRequestOptions = {
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  requestTimeoutMs?: number;
  ignore?: readonly number[];
  signal?: AbortSignal;
  /** Extra `key=value` pairs appended to `x-elastic-client-meta`. */
  clientMeta?: ReadonlyArray<readonly [string, string]>;
};

export type ProductCheckResult = 'ok' | 'unsupported_product' | 'unsupported_distribution';

const TAGLINE = 'You Know, for Search';

export function defaultNodeFilter(info: SniffedNodeInfo, node: NodeConfig): NodeConfig | null {
  if (info.roles.length === 1 && info.roles[0] === 'master') {
    return null;
  }
  return node;
}

export function parsePublishAddress(address: string | undefined): { host: string; port: number } | null {
  if (!address || !address.includes(':')) {
    return null;
  }
  // 7.x reports `fqdn/ip:port` when http.publish_host is set
  const slash = address.indexOf('/');
  const host = slash === -1 ? null : address.slice(0, slash);
  const hostPort = slash === -1 ? address : address.slice(slash + 1);
  const colon = hostPort.lastIndexOf(':');
  const port = Number.parseInt(hostPort.slice(colon + 1), 10);
  if (!Number.isInteger(port)) {
    return null;
  }
  return { host: host ?? hostPort.slice(0, colon), port };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSniffedNode(raw: Record<string, unknown>): SniffedNodeInfo {
  const roles = Array.isArray(raw.roles) ? raw.roles.filter((role): role is string => typeof role === 'string') : [];
  const http = isRecord(raw.http) ? raw.http : {};
  const publishAddress = typeof http.publish_address === 'string' ? http.publish_address : undefined;
  return { roles, publishAddress, raw };
}

function compareVersions(left: number[], right: number[]): number {
  for (let i = 0; i < 3; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Decides whether a `GET /` response came from a supported Elasticsearch.
 */
export function checkProduct(headers: Record<string, string>, response: unknown): ProductCheckResult {
  const body = isRecord(response) ? response : {};
  const version = isRecord(body.version) ? body.version : {};
  let versionNumber = [0, 0, 0];
  if (typeof version.number === 'string') {
    const match = /^([0-9]+)\.([0-9]+)(?:\.([0-9]+))?/.exec(version.number);
    if (match) {
      versionNumber = [Number(match[1]), Number(match[2]), match[3] === undefined ? 999 : Number(match[3])];
    }
  }

  const badTagline = body.tagline !== TAGLINE;
  const badBuildFlavor = version.build_flavor !== 'default';
  const badProductHeader = headers['x-elastic-product'] !== 'Elasticsearch';

  if (compareVersions(versionNumber, [7, 0, 0]) >= 0 && compareVersions(versionNumber, [7, 14, 0]) < 0) {
    if (badTagline) {
      return 'unsupported_product';
    }
    if (badBuildFlavor) {
      return 'unsupported_distribution';
    }
    return 'ok';
  }
  if (
    compareVersions(versionNumber, [6, 0, 0]) < 0 ||
    (compareVersions(versionNumber, [7, 0, 0]) < 0 && badTagline) ||
    (compareVersions(versionNumber, [7, 14, 0]) >= 0 && badProductHeader)
  ) {
    return 'unsupported_product';
  }
  return 'ok';
}

function productCheckMessage(result: ProductCheckResult): string {
  if (result === 'unsupported_distribution') {
    return 'The client noticed that the server is not a supported distribution of Elasticsearch';
  }
  return 'The client noticed that the server is not Elasticsearch and we do not support this unknown product';
}

function configKey(node: NodeConfig): string {
  return JSON.stringify(Object.entries(node).sort(([left], [right]) => left.localeCompare(right)));
}

export class Transport {
  readonly serializer: Serializer;
  readonly deserializer: Deserializer;
  private readonly logger: Logger;
  private readonly connectionFactory: ConnectionFactory;
  private readonly options: TransportOptions;
  private readonly maxRetries: number;
  private readonly retryOnStatus: readonly number[];
  private readonly retryOnTimeout: boolean;
  private readonly sendGetBodyAs: SendGetBodyAs;
  private readonly metaHeader: boolean;
  private readonly productCheck: boolean;
  private readonly sniffOnStart: boolean;
  private readonly sniffIntervalMs: number | undefined;
  private readonly sniffTimeoutMs: number;
  private readonly sniffOnConnectionFail: boolean;
  private readonly nodeFilter: NodeFilter;
  private readonly nodeDefaults: Omit<NodeConfig, 'host'>;
  private readonly now: () => number;
  private readonly clientMeta: ReadonlyArray<readonly [string, string]>;
  private readonly seedConnections: Connection[];
  private connectionOpts: Array<[Connection, NodeConfig]> = [];
  private pool: ConnectionPool;
  private lastSniff: number;
  private sniffing: Promise<void> | null = null;
  private startupSniff: Promise<void> | null = null;
  private verification: Promise<void> | null = null;

  constructor(options: TransportOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.connectionFactory = options.connectionFactory ?? createHttpConnectionFactory({ logger: this.logger });
    this.serializer = options.serializer ?? new JsonSerializer();
    const serializers = defaultSerializers();
    for (const serializer of options.serializers ?? []) {
      serializers.set(serializer.mimetype, serializer);
    }
    serializers.set(this.serializer.mimetype, this.serializer);
    this.deserializer = new Deserializer(serializers, options.defaultMimetype ?? 'application/json');

    this.maxRetries = options.maxRetries ?? 3;
    this.retryOnStatus = options.retryOnStatus ?? [502, 503, 504];
    this.retryOnTimeout = options.retryOnTimeout ?? false;
    this.sendGetBodyAs = options.sendGetBodyAs ?? 'GET';
    this.metaHeader = options.metaHeader ?? true;
    this.productCheck = options.productCheck ?? true;
    this.nodeFilter = options.nodeFilter ?? defaultNodeFilter;
    this.now = options.now ?? Date.now;
    this.clientMeta = [
      ['es', clientMetaVersion(CLIENT_VERSION)],
      ['js', clientMetaVersion(process.versions.node)],
      ['t', clientMetaVersion(CLIENT_VERSION)]
    ];

    const nodes = options.nodes && options.nodes.length > 0 ? options.nodes : [{ host: 'localhost' }];
    const cloud = nodes.some((node) => node.cloudId !== undefined);
    this.sniffOnStart = !cloud && (options.sniffOnStart ?? false);
    this.sniffIntervalMs = cloud ? undefined : options.sniffIntervalMs;
    this.sniffOnConnectionFail = !cloud && (options.sniffOnConnectionFail ?? false);
    this.sniffTimeoutMs = options.sniffTimeoutMs ?? 100;

    const { host: _host, port: _port, urlPrefix: _prefix, cloudId: _cloudId, ...defaults } = nodes[0];
    this.nodeDefaults = defaults;

    this.pool = this.setConnections(nodes);
    this.seedConnections = [...this.pool.connections];
    this.lastSniff = this.now();
  }

  get connectionPool(): ConnectionPool {
    return this.pool;
  }

  addConnection(node: NodeConfig): void {
    const nodes = this.connectionOpts.map(([, config]) => config);
    nodes.push(node);
    this.pool = this.setConnections(nodes);
  }

  async performRequest(method: string, path: string, options: TransportRequestOptions = {}): Promise<unknown> {
    let resolvedMethod = method.toUpperCase();
    const query: Record<string, QueryValue> = { ...(options.query ?? {}) };
    let body: string | undefined;
    if (options.body !== undefined && options.body !== null) {
      body = this.serializer.dumps(options.body);
      if ((resolvedMethod === 'GET' || resolvedMethod === 'HEAD') && this.sendGetBodyAs !== 'GET') {
        if (this.sendGetBodyAs === 'POST') {
          resolvedMethod = 'POST';
        } else {
          query.source = body;
          body = undefined;
        }
      }
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(options.headers ?? {})) {
      headers[key.toLowerCase()] = value;
    }
    if (this.metaHeader) {
      headers['x-elastic-client-meta'] = [...this.clientMeta, ...(options.clientMeta ?? [])]
        .map(([key, value]) => `${key}=${value}`)
        .join(',');
    }

    if (this.sniffOnStart) {
      this.startupSniff ??= this.sniffHosts(true).catch((err: unknown) => {
        this.startupSniff = null;
        throw err;
      });
      await this.startupSniff;
    }

    if (this.productCheck) {
      await this.verifyElasticsearch(headers, options.requestTimeoutMs);
    }

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      const connection = await this.getConnection();
      try {
        const response = await connection.performRequest(resolvedMethod, path, {
          query,
          body,
          headers,
          timeoutMs: options.requestTimeoutMs,
          ignore: options.ignore,
          signal: options.signal
        });
        this.pool.markLive(connection);

        if (resolvedMethod === 'HEAD') {
          return response.statusCode >= 200 && response.statusCode < 300;
        }
        if (response.body.length === 0) {
          return response.body;
        }
        return this.deserializer.loads(response.body, response.headers['content-type']);
      } catch (err) {
        // a cancelled request leaves the node's health alone
        if (!(err instanceof TransportError) || options.signal?.aborted) {
          throw err;
        }
        if (resolvedMethod === 'HEAD' && err.statusCode === 404) {
          return false;
        }

        let retry = false;
        if (err instanceof ConnectionTimeout) {
          retry = this.retryOnTimeout;
        } else if (err instanceof ConnectionError) {
          retry = true;
        } else if (typeof err.statusCode === 'number' && this.retryOnStatus.includes(err.statusCode)) {
          retry = true;
        }

        if (!retry) {
          throw err;
        }
        await this.markDead(connection);
        if (attempt === this.maxRetries) {
          throw err;
        }
        this.logger.info({ attempt: attempt + 1, path }, `Retrying ${resolvedMethod} ${path} (${err.message})`);
      }
    }
    throw new TransportError({ statusCode: 'N/A', error: 'Retries exhausted' });
  }

  /**
   * Replaces the pool with the nodes reported by `GET /_nodes/_all/http`. Concurrent callers
   * share the sniff that is already running.
   */
  sniffHosts(initial = false): Promise<void> {
    if (!this.sniffing) {
      this.sniffing = this.runSniff(initial).finally(() => {
        this.sniffing = null;
      });
    }
    return this.sniffing;
  }

  async close(): Promise<void> {
    const connections = new Set<Connection>([
      ...this.connectionOpts.map(([connection]) => connection),
      ...this.seedConnections
    ]);
    await Promise.all(Array.from(connections, (connection) => connection.close()));
  }

  private setConnections(nodes: NodeConfig[]): ConnectionPool {
    const previous = new Map(this.connectionOpts.map(([connection, config]) => [configKey(config), connection]));
    this.connectionOpts = nodes.map((node) => [previous.get(configKey(node)) ?? this.connectionFactory(node), node]);
    const connections = this.connectionOpts.map(([connection]) => connection);
    if (connections.length === 1) {
      return new SingleNodePool(connections[0]);
    }
    return new NodePool(connections, {
      selector: this.options.selector,
      randomizeNodes: this.options.randomizeNodes,
      deadTimeoutMs: this.options.deadTimeoutMs,
      timeoutCutoff: this.options.timeoutCutoff,
      now: this.now,
      random: this.options.random
    });
  }

  private async getConnection(): Promise<Connection> {
    if (this.sniffIntervalMs !== undefined && this.now() >= this.lastSniff + this.sniffIntervalMs) {
      await this.sniffHosts();
    }
    return this.pool.getConnection();
  }

  private async markDead(connection: Connection): Promise<void> {
    this.pool.markDead(connection);
    if (!this.sniffOnConnectionFail) {
      return;
    }
    try {
      await this.sniffHosts();
    } catch (err) {
      if (!(err instanceof TransportError)) {
        throw err;
      }
      this.logger.warn({ err }, 'Sniffing after a connection failure did not succeed');
    }
  }

  private async runSniff(initial: boolean): Promise<void> {
    const nodeInfo = await this.fetchSniffData(initial);
    const nodes: NodeConfig[] = [];
    for (const info of nodeInfo) {
      const address = parsePublishAddress(info.publishAddress);
      if (!address) {
        continue;
      }
      const node = this.nodeFilter(info, { ...this.nodeDefaults, host: address.host, port: address.port });
      if (node) {
        nodes.push(node);
      }
    }
    if (nodes.length === 0) {
      throw new TransportError({ statusCode: 'N/A', error: 'Unable to sniff hosts - no viable hosts found.' });
    }
    const previous = this.connectionOpts.map(([connection]) => connection);
    this.pool = this.setConnections(nodes);
    this.logger.debug({ nodes: nodes.length }, 'Sniffed cluster nodes');

    const kept = new Set<Connection>([...this.connectionOpts.map(([connection]) => connection), ...this.seedConnections]);
    await Promise.all(previous.filter((connection) => !kept.has(connection)).map((connection) => connection.close()));
  }

  private async fetchSniffData(initial: boolean): Promise<SniffedNodeInfo[]> {
    const previousSniff = this.lastSniff;
    this.lastSniff = this.now();
    const candidates = new Set<Connection>([...this.pool.connections, ...this.seedConnections]);
    for (const connection of candidates) {
      try {
        const response = await connection.performRequest('GET', '/_nodes/_all/http', {
          timeoutMs: initial ? undefined : this.sniffTimeoutMs
        });
        const data = this.deserializer.loads(response.body, response.headers['content-type']);
        if (!isRecord(data) || !isRecord(data.nodes)) {
          throw new SerializationError('Sniff response has no nodes', { data });
        }
        return Object.values(data.nodes).filter(isRecord).map(toSniffedNode);
      } catch (err) {
        if (err instanceof ConnectionError || err instanceof SerializationError) {
          this.logger.debug({ err, node: connection.baseUrl }, 'Sniffing node failed');
          continue;
        }
        this.lastSniff = previousSniff;
        throw err;
      }
    }
    this.lastSniff = previousSniff;
    throw new TransportError({ statusCode: 'N/A', error: 'Unable to sniff hosts.' });
  }

  private verifyElasticsearch(headers: Record<string, string>, timeoutMs?: number): Promise<void> {
    if (!this.verification) {
      this.verification = this.runProductCheck(headers, timeoutMs).catch((err: unknown) => {
        // only a definite answer is cached; connection trouble is retried on the next call
        if (!(err instanceof UnsupportedProductError)) {
          this.verification = null;
        }
        throw err;
      });
    }
    return this.verification;
  }

  private async runProductCheck(headers: Record<string, string>, timeoutMs?: number): Promise<void> {
    const requestHeaders = { accept: 'application/json', ...headers };
    let firstError: unknown;
    const candidates = new Set<Connection>([...this.pool.connections, ...this.seedConnections]);
    for (const connection of candidates) {
      let response: ConnectionResponse;
      try {
        response = await connection.performRequest('GET', '/', { headers: requestHeaders, timeoutMs });
      } catch (err) {
        if (err instanceof AuthenticationException || err instanceof AuthorizationException) {
          this.logger.warn(
            'The client is unable to verify that the server is Elasticsearch due security privileges on the server side'
          );
          return;
        }
        if (err instanceof TransportError) {
          firstError ??= err;
          continue;
        }
        throw err;
      }

      let info: unknown;
      try {
        info = this.deserializer.loads(response.body, 'application/json');
      } catch (err) {
        if (err instanceof SerializationError) {
          firstError ??= err;
          continue;
        }
        throw err;
      }
      const result = checkProduct(response.headers, info);
      if (result !== 'ok') {
        throw new UnsupportedProductError(productCheckMessage(result));
      }
      return;
    }
    throw firstError ?? new TransportError({ statusCode: 'N/A', error: 'Unable to verify the server product' });
  }
}
