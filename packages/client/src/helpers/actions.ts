import { computeExponentialBackoff, silentLogger, sleep, type Logger } from '@esforge/shared';
import { TransportError, type Serializer, type StatusCode } from '@esforge/transport';
import type { RequestOptions } from '../base';
import type {
  BulkParams,
  BulkResponse,
  ClearScrollParams,
  ScrollParams,
  SearchHit,
  SearchParams,
  SearchResponse
} from '../types';
import { BulkIndexError, ScanError } from './errors';

export type BulkAction = Record<string, Record<string, unknown>>;

/** An action line plus its data line; `undefined` data means there is no data line. */
export type ExpandedAction = [action: BulkAction, data: unknown];

export type BulkSource = string | Record<string, unknown>;

export type BulkItemInfo = {
  status?: StatusCode;
  error?: unknown;
  data?: unknown;
  exception?: unknown;
  [key: string]: unknown;
};

export type BulkItem = Record<string, BulkItemInfo>;

export type BulkResult = [ok: boolean, item: BulkItem];

type ChunkEntry = [action: BulkAction] | [action: BulkAction, data: unknown];

export type BulkChunk = {
  entries: ChunkEntry[];
  lines: string[];
};

export interface BulkCapable {
  readonly transport: { readonly serializer: Serializer };
  bulk(params: BulkParams, options?: RequestOptions): Promise<BulkResponse>;
}

export interface ScrollCapable {
  search<TDocument = unknown>(params: SearchParams, options?: RequestOptions): Promise<SearchResponse<TDocument>>;
  scroll<TDocument = unknown>(params: ScrollParams, options?: RequestOptions): Promise<SearchResponse<TDocument>>;
  clearScroll(params: ClearScrollParams, options?: RequestOptions): Promise<unknown>;
}

const METADATA_KEYS = [
  '_id',
  '_index',
  '_if_seq_no',
  '_if_primary_term',
  '_parent',
  '_percolate',
  '_retry_on_conflict',
  '_routing',
  '_timestamp',
  '_type',
  '_version',
  '_version_type',
  'if_seq_no',
  'if_primary_term',
  'parent',
  'pipeline',
  'retry_on_conflict',
  'routing',
  'version',
  'version_type'
];

// sent without their leading underscore
const LEGACY_METADATA_KEYS = new Set([
  '_if_seq_no',
  '_if_primary_term',
  '_parent',
  '_retry_on_conflict',
  '_routing',
  '_version',
  '_version_type'
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits one document into the action and data lines of a bulk request. Metadata
 * such as `_index`, `_id` or `routing` moves into the action.
 */
export function expandAction(doc: BulkSource): ExpandedAction {
  if (typeof doc === 'string') {
    return [{ index: {} }, doc];
  }

  const data: Record<string, unknown> = { ...doc };
  const opType = typeof data._op_type === 'string' ? data._op_type : 'index';
  delete data._op_type;
  const meta: Record<string, unknown> = {};

  if (opType === 'update' && '_source' in data && !isPlainObject(data._source)) {
    meta._source = data._source;
    delete data._source;
  }

  for (const key of METADATA_KEYS) {
    if (key in data) {
      meta[LEGACY_METADATA_KEYS.has(key) ? key.slice(1) : key] = data[key];
      delete data[key];
    }
  }

  const action: BulkAction = { [opType]: meta };
  if (opType === 'delete') {
    return [action, undefined];
  }
  return [action, '_source' in data ? data._source : data];
}

export class ActionChunker {
  private size = 0;
  private actionCount = 0;
  private lines: string[] = [];
  private entries: ChunkEntry[] = [];

  constructor(
    private readonly chunkSize: number,
    private readonly maxChunkBytes: number,
    private readonly serializer: Serializer
  ) {}

  /** Adds an action, returning the previous chunk when this one would overflow it. */
  feed(action: BulkAction, data: unknown): BulkChunk | null {
    let result: BulkChunk | null = null;
    const actionLine = this.serializer.dumps(action);
    // each line is followed by a newline
    let currentSize = Buffer.byteLength(actionLine, 'utf8') + 1;
    let dataLine: string | undefined;
    if (data !== undefined) {
      dataLine = this.serializer.dumps(data);
      currentSize += Buffer.byteLength(dataLine, 'utf8') + 1;
    }

    if (
      this.lines.length > 0 &&
      (this.size + currentSize > this.maxChunkBytes || this.actionCount === this.chunkSize)
    ) {
      result = { entries: this.entries, lines: this.lines };
      this.entries = [];
      this.lines = [];
      this.size = 0;
      this.actionCount = 0;
    }

    this.lines.push(actionLine);
    if (dataLine !== undefined) {
      this.lines.push(dataLine);
      this.entries.push([action, data]);
    } else {
      this.entries.push([action]);
    }
    this.size += currentSize;
    this.actionCount += 1;
    return result;
  }

  flush(): BulkChunk | null {
    if (this.lines.length === 0) {
      return null;
    }
    const result = { entries: this.entries, lines: this.lines };
    this.entries = [];
    this.lines = [];
    this.size = 0;
    this.actionCount = 0;
    return result;
  }
}

export async function* chunkActions(
  actions: Iterable<ExpandedAction> | AsyncIterable<ExpandedAction>,
  chunkSize: number,
  maxChunkBytes: number,
  serializer: Serializer
): AsyncGenerator<BulkChunk, void, undefined> {
  const chunker = new ActionChunker(chunkSize, maxChunkBytes, serializer);
  for await (const [action, data] of actions) {
    const chunk = chunker.feed(action, data);
    if (chunk) {
      yield chunk;
    }
  }
  const rest = chunker.flush();
  if (rest) {
    yield rest;
  }
}

function firstEntry<T>(record: Record<string, T>): [string, T] | null {
  const entries = Object.entries(record);
  return entries.length > 0 ? entries[0] : null;
}

function* processChunkSuccess(
  response: BulkResponse,
  entries: ChunkEntry[],
  raiseOnError: boolean
): Generator<BulkResult, void, undefined> {
  const errors: BulkItem[] = [];
  const count = Math.min(entries.length, response.items.length);
  for (let i = 0; i < count; i += 1) {
    const result = firstEntry(response.items[i]);
    if (!result) {
      continue;
    }
    const [opType, item] = result;
    const status = item.status ?? 500;
    const ok = status >= 200 && status < 300;
    if (!ok && raiseOnError) {
      const failed: BulkItemInfo = { ...item };
      const entry = entries[i];
      if (entry.length === 2) {
        failed.data = entry[1];
      }
      errors.push({ [opType]: failed });
    }
    // once an error is recorded the rest of the chunk is only collected
    if (ok || errors.length === 0) {
      yield [ok, { [opType]: item }];
    }
  }
  if (errors.length > 0) {
    throw new BulkIndexError(`${errors.length} document(s) failed to index.`, errors);
  }
}

function processChunkError(
  error: TransportError,
  entries: ChunkEntry[],
  raiseOnException: boolean,
  raiseOnError: boolean
): BulkResult[] {
  if (raiseOnException) {
    throw error;
  }
  const failures: BulkItem[] = [];
  for (const entry of entries) {
    const action = firstEntry(entry[0]);
    if (!action) {
      continue;
    }
    const [opType, meta] = action;
    const info: BulkItemInfo = { error: error.message, status: error.statusCode, exception: error };
    if (opType !== 'delete' && entry.length === 2) {
      info.data = entry[1];
    }
    failures.push({ [opType]: { ...info, ...meta } });
  }
  if (raiseOnError) {
    throw new BulkIndexError(`${failures.length} document(s) failed to index.`, failures);
  }
  return failures.map((failure): BulkResult => [false, failure]);
}

type ChunkOptions = {
  raiseOnException: boolean;
  raiseOnError: boolean;
  params: Omit<BulkParams, 'body'>;
  requestOptions: RequestOptions;
};

async function processBulkChunk(
  client: BulkCapable,
  lines: string[],
  entries: ChunkEntry[],
  options: ChunkOptions
): Promise<Iterable<BulkResult>> {
  let response: BulkResponse;
  try {
    response = await client.bulk({ ...options.params, body: `${lines.join('\n')}\n` }, options.requestOptions);
  } catch (err) {
    if (err instanceof TransportError) {
      return processChunkError(err, entries, options.raiseOnException, options.raiseOnError);
    }
    throw err;
  }
  return processChunkSuccess(response, entries, options.raiseOnError);
}

export type StreamingBulkOptions = {
  chunkSize?: number;
  maxChunkBytes?: number;
  raiseOnError?: boolean;
  raiseOnException?: boolean;
  expandActionCallback?: (doc: BulkSource) => ExpandedAction;
  /** Retries for documents rejected with 429. */
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  yieldOk?: boolean;
  params?: Omit<BulkParams, 'body'>;
  requestOptions?: RequestOptions;
  wait?: (ms: number) => Promise<void>;
};

/**
 * Sends the actions in chunks through the bulk API and yields one `[ok, item]` pair
 * per action.
 */
export async function* streamingBulk(
  client: BulkCapable,
  actions: Iterable<BulkSource> | AsyncIterable<BulkSource>,
  options: StreamingBulkOptions = {}
): AsyncGenerator<BulkResult, void, undefined> {
  const {
    chunkSize = 500,
    maxChunkBytes = 100 * 1024 * 1024,
    raiseOnError = true,
    raiseOnException = true,
    expandActionCallback = expandAction,
    maxRetries = 0,
    initialBackoffMs = 2_000,
    maxBackoffMs = 600_000,
    yieldOk = true,
    params = {},
    wait = sleep
  } = options;
  const requestOptions: RequestOptions = {
    ...options.requestOptions,
    clientMeta: [...(options.requestOptions?.clientMeta ?? []), ['h', 'bp']]
  };
  const serializer = client.transport.serializer;

  async function* expanded(): AsyncGenerator<ExpandedAction, void, undefined> {
    for await (const doc of actions) {
      yield expandActionCallback(doc);
    }
  }

  for await (const chunk of chunkActions(expanded(), chunkSize, maxChunkBytes, serializer)) {
    let { lines, entries } = chunk;
    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      const retryLines: string[] = [];
      const retryEntries: ChunkEntry[] = [];
      if (attempt > 0) {
        await wait(computeExponentialBackoff(attempt, { baseMs: initialBackoffMs, maxMs: maxBackoffMs }));
      }

      try {
        const results = await processBulkChunk(client, lines, entries, {
          raiseOnException,
          raiseOnError,
          params,
          requestOptions
        });
        let index = 0;
        for (const [ok, item] of results) {
          const entry = entries[index];
          index += 1;
          if (!entry) {
            break;
          }
          if (ok) {
            if (yieldOk) {
              yield [ok, item];
            }
            continue;
          }
          const failure = firstEntry(item);
          if (!failure) {
            continue;
          }
          const [opType, info] = failure;
          if (maxRetries > 0 && info.status === 429 && attempt + 1 <= maxRetries) {
            for (const part of entry) {
              retryLines.push(serializer.dumps(part));
            }
            retryEntries.push(entry);
          } else {
            yield [ok, { [opType]: info }];
          }
        }
      } catch (err) {
        if (err instanceof TransportError && attempt < maxRetries && err.statusCode === 429) {
          continue;
        }
        throw err;
      }

      if (retryLines.length === 0) {
        break;
      }
      lines = retryLines;
      entries = retryEntries;
    }
  }
}

export type ParallelBulkOptions = Omit<
  StreamingBulkOptions,
  'maxRetries' | 'initialBackoffMs' | 'maxBackoffMs' | 'yieldOk' | 'wait'
> & {
  /** Bulk requests in flight at once. */
  concurrency?: number;
  /** Chunks read ahead of the one being yielded; never fewer than `concurrency`. */
  queueSize?: number;
};

type ChunkOutcome = { results: BulkResult[] } | { error: unknown };

/**
 * Like `streamingBulk`, but with up to `concurrency` bulk requests in flight. Results
 * are yielded in the order of the chunks they belong to.
 */
export async function* parallelBulk(
  client: BulkCapable,
  actions: Iterable<BulkSource> | AsyncIterable<BulkSource>,
  options: ParallelBulkOptions = {}
): AsyncGenerator<BulkResult, void, undefined> {
  const {
    concurrency = 4,
    queueSize = 4,
    chunkSize = 500,
    maxChunkBytes = 100 * 1024 * 1024,
    raiseOnError = true,
    raiseOnException = true,
    expandActionCallback = expandAction,
    params = {}
  } = options;
  const requestOptions: RequestOptions = {
    ...options.requestOptions,
    clientMeta: [...(options.requestOptions?.clientMeta ?? []), ['h', 'bp']]
  };
  const window = Math.max(queueSize, concurrency);

  let active = 0;
  const waiting: Array<() => void> = [];
  const acquire = async (): Promise<void> => {
    if (active < concurrency) {
      active += 1;
      return;
    }
    await new Promise<void>((resolve) => waiting.push(resolve));
  };
  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  const send = async (chunk: BulkChunk): Promise<ChunkOutcome> => {
    await acquire();
    try {
      const results = await processBulkChunk(client, chunk.lines, chunk.entries, {
        raiseOnException,
        raiseOnError,
        params,
        requestOptions
      });
      return { results: Array.from(results) };
    } catch (err) {
      return { error: err };
    } finally {
      release();
    }
  };

  async function* expanded(): AsyncGenerator<ExpandedAction, void, undefined> {
    for await (const doc of actions) {
      yield expandActionCallback(doc);
    }
  }

  const pending: Array<Promise<ChunkOutcome>> = [];
  const next = async function* (): AsyncGenerator<BulkResult, void, undefined> {
    const outcome = await pending.shift();
    if (!outcome) {
      return;
    }
    if ('error' in outcome) {
      throw outcome.error;
    }
    yield* outcome.results;
  };

  try {
    for await (const chunk of chunkActions(expanded(), chunkSize, maxChunkBytes, client.transport.serializer)) {
      pending.push(send(chunk));
      if (pending.length >= window) {
        yield* next();
      }
    }
    while (pending.length > 0) {
      yield* next();
    }
  } finally {
    // requests already sent are allowed to finish before the generator returns
    await Promise.all(pending);
  }
}

export type BulkHelperOptions = StreamingBulkOptions & {
  statsOnly?: boolean;
};

/**
 * Runs `streamingBulk` to completion and returns the number of successful actions with
 * either the failed items or, with `statsOnly`, their count.
 */
export async function bulk(
  client: BulkCapable,
  actions: Iterable<BulkSource> | AsyncIterable<BulkSource>,
  options: BulkHelperOptions & { statsOnly: true }
): Promise<[number, number]>;
export async function bulk(
  client: BulkCapable,
  actions: Iterable<BulkSource> | AsyncIterable<BulkSource>,
  options?: BulkHelperOptions & { statsOnly?: false }
): Promise<[number, BulkItem[]]>;
export async function bulk(
  client: BulkCapable,
  actions: Iterable<BulkSource> | AsyncIterable<BulkSource>,
  options: BulkHelperOptions = {}
): Promise<[number, number | BulkItem[]]> {
  const { statsOnly = false, ...streaming } = options;
  let success = 0;
  let failed = 0;
  const errors: BulkItem[] = [];
  for await (const [ok, item] of streamingBulk(client, actions, { ...streaming, yieldOk: true })) {
    if (ok) {
      success += 1;
      continue;
    }
    failed += 1;
    if (!statsOnly) {
      errors.push(item);
    }
  }
  return [success, statsOnly ? failed : errors];
}

export type ScanOptions = {
  query?: Record<string, unknown>;
  scroll?: string;
  raiseOnError?: boolean;
  preserveOrder?: boolean;
  size?: number;
  requestTimeoutMs?: number;
  clearScroll?: boolean;
  searchParams?: Omit<SearchParams, 'body' | 'scroll' | 'size'>;
  scrollParams?: Omit<ScrollParams, 'body' | 'scroll_id' | 'scroll'>;
  logger?: Logger;
};

/**
 * Iterates over every hit of a search through the scroll API. Unless `preserveOrder`
 * is set the search is sorted by `_doc`, the cheapest order to scroll in.
 */
export async function* scan<TDocument = unknown>(
  client: ScrollCapable,
  options: ScanOptions = {}
): AsyncGenerator<SearchHit<TDocument>, void, undefined> {
  const {
    scroll = '5m',
    raiseOnError = true,
    preserveOrder = false,
    size = 1000,
    clearScroll = true,
    logger = silentLogger
  } = options;
  const query = preserveOrder ? options.query : { ...options.query, sort: '_doc' };
  const requestOptions: RequestOptions = { requestTimeoutMs: options.requestTimeoutMs, clientMeta: [['h', 's']] };

  let response = await client.search<TDocument>(
    { ...options.searchParams, body: query, scroll, size },
    requestOptions
  );
  let scrollId = response._scroll_id;

  try {
    while (scrollId && response.hits.hits.length > 0) {
      for (const hit of response.hits.hits) {
        yield hit;
      }

      const successful = response._shards.successful ?? 0;
      const skipped = response._shards.skipped ?? 0;
      const total = response._shards.total ?? 0;
      if (successful + skipped < total) {
        const message = `Scroll request has only succeeded on ${successful} (+${skipped} skipped) shards out of ${total}.`;
        logger.warn({ scrollId, successful, skipped, total }, message);
        if (raiseOnError) {
          throw new ScanError(scrollId, message);
        }
      }

      response = await client.scroll<TDocument>(
        { ...options.scrollParams, body: { scroll_id: scrollId, scroll } },
        { clientMeta: [['h', 's']] }
      );
      scrollId = response._scroll_id;
    }
  } finally {
    if (scrollId && clearScroll) {
      await client.clearScroll({ body: { scroll_id: [scrollId] } }, { ignore: [404], clientMeta: [['h', 's']] });
    }
  }
}

export type ReindexOptions = {
  query?: Record<string, unknown>;
  targetClient?: BulkCapable;
  chunkSize?: number;
  scroll?: string;
  scanOptions?: Omit<ScanOptions, 'query' | 'scroll'>;
  bulkOptions?: Omit<BulkHelperOptions, 'statsOnly'>;
};

/**
 * Copies every document matching `query` from one index to another, optionally on
 * another cluster. Returns `[success, failed]` counts.
 */
export async function reindex(
  client: ScrollCapable & BulkCapable,
  sourceIndex: string | string[],
  targetIndex: string,
  options: ReindexOptions = {}
): Promise<[number, number]> {
  const target = options.targetClient ?? client;
  const hits = scan(client, {
    ...options.scanOptions,
    query: options.query,
    scroll: options.scroll ?? '5m',
    searchParams: { ...options.scanOptions?.searchParams, index: sourceIndex }
  });

  async function* retarget(): AsyncGenerator<Record<string, unknown>, void, undefined> {
    for await (const hit of hits) {
      const { fields, ...rest } = hit;
      const doc: Record<string, unknown> = { ...rest, _index: targetIndex };
      if (fields) {
        Object.assign(doc, fields);
      }
      yield doc;
    }
  }

  return bulk(target, retarget(), { chunkSize: options.chunkSize ?? 500, ...options.bulkOptions, statsOnly: true });
}
