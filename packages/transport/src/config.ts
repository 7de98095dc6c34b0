import { z } from 'zod';
import { booleanVar, integerVar, loadEnvConfig, stringListVar, stringVar, type EnvSource } from '@esforge/shared';

const transportEnvSchema = z.object({
  ESFORGE_NODES: stringListVar({ description: 'ESFORGE_NODES', unique: true }),
  ESFORGE_CLOUD_ID: stringVar({ description: 'ESFORGE_CLOUD_ID' }),
  ESFORGE_API_KEY: stringVar({ description: 'ESFORGE_API_KEY' }),
  ESFORGE_MAX_RETRIES: integerVar({ description: 'ESFORGE_MAX_RETRIES', defaultValue: 3, min: 0, max: 100 }),
  ESFORGE_REQUEST_TIMEOUT_MS: integerVar({ description: 'ESFORGE_REQUEST_TIMEOUT_MS', min: 1 }),
  ESFORGE_SNIFF_ON_START: booleanVar({ description: 'ESFORGE_SNIFF_ON_START', defaultValue: false }),
  ESFORGE_SNIFF_INTERVAL_MS: integerVar({ description: 'ESFORGE_SNIFF_INTERVAL_MS', min: 1 }),
  ESFORGE_RETRY_ON_TIMEOUT: booleanVar({ description: 'ESFORGE_RETRY_ON_TIMEOUT', defaultValue: false })
});

export type TransportEnvConfig = {
  nodes: string[];
  cloudId?: string;
  apiKey?: string;
  maxRetries: number;
  requestTimeoutMs?: number;
  sniffOnStart: boolean;
  sniffIntervalMs?: number;
  retryOnTimeout: boolean;
};

export function loadTransportConfig(env?: EnvSource): TransportEnvConfig {
  const parsed = loadEnvConfig(transportEnvSchema, { env, context: 'esforge:transport' });
  return {
    nodes: parsed.ESFORGE_NODES,
    cloudId: parsed.ESFORGE_CLOUD_ID,
    apiKey: parsed.ESFORGE_API_KEY,
    maxRetries: parsed.ESFORGE_MAX_RETRIES ?? 3,
    requestTimeoutMs: parsed.ESFORGE_REQUEST_TIMEOUT_MS,
    sniffOnStart: parsed.ESFORGE_SNIFF_ON_START ?? false,
    sniffIntervalMs: parsed.ESFORGE_SNIFF_INTERVAL_MS,
    retryOnTimeout: parsed.ESFORGE_RETRY_ON_TIMEOUT ?? false
  };
}
