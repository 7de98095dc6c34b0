export type GlobalParams = {
  pretty?: boolean;
  human?: boolean;
  error_trace?: boolean;
  format?: string;
  filter_path?: string | string[];
};

export type ShardStatistics = {
  total?: number;
  successful?: number;
  skipped?: number;
  failed?: number;
};

export type SearchHit<TDocument = unknown> = {
  _index: string;
  _id: string;
  _score?: number | null;
  _source?: TDocument;
  fields?: Record<string, unknown>;
  sort?: unknown[];
  [key: string]: unknown;
};

export type SearchResponse<TDocument = unknown> = {
  _scroll_id?: string;
  took?: number;
  timed_out?: boolean;
  _shards: ShardStatistics;
  hits: {
    total?: { value: number; relation: string } | number;
    max_score?: number | null;
    hits: SearchHit<TDocument>[];
  };
  aggregations?: Record<string, unknown>;
};

export type CountResponse = {
  count: number;
  _shards: ShardStatistics;
};

export type InfoResponse = {
  name: string;
  cluster_name: string;
  cluster_uuid: string;
  version: { number: string; build_flavor?: string; [key: string]: unknown };
  tagline: string;
};

export type WriteResponse = {
  _index: string;
  _id: string;
  _version?: number;
  result: string;
  _seq_no?: number;
  _primary_term?: number;
  _shards?: ShardStatistics;
};

export type GetResponse<TDocument = unknown> = {
  _index: string;
  _id: string;
  found: boolean;
  _version?: number;
  _source?: TDocument;
};

export type BulkResponseItem = {
  _index?: string;
  _id?: string;
  status?: number;
  error?: unknown;
  result?: string;
  [key: string]: unknown;
};

export type BulkResponse = {
  took?: number;
  errors: boolean;
  items: Array<Record<string, BulkResponseItem>>;
};

export type SearchParams = GlobalParams & {
  index?: string | string[];
  body?: Record<string, unknown>;
  q?: string;
  scroll?: string;
  size?: number;
  from?: number;
  sort?: string | string[];
  routing?: string | string[];
  track_total_hits?: boolean | number;
  request_cache?: boolean;
  search_type?: 'query_then_fetch' | 'dfs_query_then_fetch';
  preference?: string;
  timeout?: string;
  _source?: boolean | string | string[];
};

export type CountParams = GlobalParams & {
  index?: string | string[];
  body?: Record<string, unknown>;
  q?: string;
  routing?: string | string[];
  preference?: string;
};

export type IndexParams<TDocument = unknown> = GlobalParams & {
  index: string;
  body: TDocument;
  id?: string;
  op_type?: 'index' | 'create';
  refresh?: boolean | 'wait_for';
  routing?: string;
  pipeline?: string;
  if_seq_no?: number;
  if_primary_term?: number;
  version?: number;
  version_type?: 'internal' | 'external' | 'external_gte';
  timeout?: string;
  wait_for_active_shards?: string;
};

export type DocumentParams = GlobalParams & {
  index: string;
  id: string;
  routing?: string;
  preference?: string;
  realtime?: boolean;
  refresh?: boolean | 'wait_for';
  _source?: boolean | string | string[];
  _source_includes?: string | string[];
  _source_excludes?: string | string[];
  version?: number;
  version_type?: 'internal' | 'external' | 'external_gte';
};

export type DeleteParams = GlobalParams & {
  index: string;
  id: string;
  routing?: string;
  refresh?: boolean | 'wait_for';
  if_seq_no?: number;
  if_primary_term?: number;
  timeout?: string;
  version?: number;
  version_type?: 'internal' | 'external' | 'external_gte';
  wait_for_active_shards?: string;
};

export type BulkParams = GlobalParams & {
  body: string | unknown[];
  index?: string;
  pipeline?: string;
  refresh?: boolean | 'wait_for';
  routing?: string;
  timeout?: string;
  wait_for_active_shards?: string;
  require_alias?: boolean;
  _source?: boolean | string | string[];
};

export type ScrollParams = GlobalParams & {
  body?: Record<string, unknown>;
  scroll_id?: string;
  scroll?: string;
  rest_total_hits_as_int?: boolean;
};

export type ClearScrollParams = GlobalParams & {
  body?: Record<string, unknown>;
  scroll_id?: string | string[];
};
