import type { ApiKeyCredentials, BasicAuthCredentials } from './auth';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface NodeConfig {
  host: string;
  port?: number;
  scheme?: 'http' | 'https';
  urlPrefix?: string;
  headers?: Record<string, string>;
  apiKey?: ApiKeyCredentials;
  basicAuth?: BasicAuthCredentials;
  bearerAuth?: string;
  opaqueId?: string;
  timeoutMs?: number;
  compress?: boolean;
  cloudId?: string;
}

export type QueryValue = string | number | boolean;

export interface ConnectionRequest {
  query?: Record<string, QueryValue>;
  body?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  ignore?: readonly number[];
  signal?: AbortSignal;
}

export interface ConnectionResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface Connection {
  readonly config: NodeConfig;
  readonly baseUrl: string;
  performRequest(method: string, path: string, request?: ConnectionRequest): Promise<ConnectionResponse>;
  close(): Promise<void>;
}

export type ConnectionFactory = (config: NodeConfig) => Connection;
