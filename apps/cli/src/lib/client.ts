import { Client, type ClientOptions } from '@esforge/client';
import { createLogger, type EnvSource } from '@esforge/shared';
import { loadTransportConfig } from '@esforge/transport';

export type GlobalOptions = {
  node?: string;
  apiKey?: string;
  json?: boolean;
  logLevel?: string;
};

/** The part of `Client` the cluster commands use. */
export type CliClient = Pick<Client, 'info' | 'ping' | 'transport' | 'close'>;

export type ClientFactory = (options: GlobalOptions) => CliClient;

/**
 * Builds client options from the command line, falling back to the `ESFORGE_*`
 * environment for anything not given there.
 */
export function resolveClientOptions(options: GlobalOptions, env: EnvSource = process.env): ClientOptions {
  const config = loadTransportConfig(env);
  const nodes = options.node ? [options.node] : config.nodes;
  const apiKey = options.apiKey ?? config.apiKey;

  const clientOptions: ClientOptions = {
    maxRetries: config.maxRetries,
    retryOnTimeout: config.retryOnTimeout,
    sniffOnStart: config.sniffOnStart,
    logger: createLogger({ name: 'esforge-cli', level: options.logLevel, env })
  };
  if (nodes.length > 0) {
    clientOptions.nodes = nodes;
  } else if (config.cloudId) {
    clientOptions.cloudId = config.cloudId;
  }
  if (apiKey) {
    clientOptions.apiKey = apiKey;
  }
  if (config.requestTimeoutMs !== undefined) {
    clientOptions.requestTimeoutMs = config.requestTimeoutMs;
  }
  if (config.sniffIntervalMs !== undefined) {
    clientOptions.sniffIntervalMs = config.sniffIntervalMs;
  }
  return clientOptions;
}

export function createClient(options: GlobalOptions): CliClient {
  return new Client(resolveClientOptions(options));
}
