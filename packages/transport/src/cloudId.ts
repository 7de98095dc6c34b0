import { ImproperlyConfigured } from './errors';
import type { NodeConfig } from './types';

export type CloudEndpoint = {
  host: string;
  port: number;
  esUuid: string;
};

/**
 * Decodes an Elastic Cloud id of the form `name:base64(host[:port]$es_uuid$kibana_uuid)`.
 */
export function parseCloudId(cloudId: string): CloudEndpoint {
  const separator = cloudId.indexOf(':');
  const encoded = separator === -1 ? cloudId : cloudId.slice(separator + 1);
  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const [parentDomain, esUuid] = decoded.split('$');
  if (!parentDomain || !esUuid) {
    throw new ImproperlyConfigured("'cloudId' is not properly formatted");
  }

  const portSeparator = parentDomain.lastIndexOf(':');
  if (portSeparator === -1) {
    return { host: parentDomain, port: 443, esUuid };
  }
  const port = Number.parseInt(parentDomain.slice(portSeparator + 1), 10);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ImproperlyConfigured("'cloudId' is not properly formatted");
  }
  return { host: parentDomain.slice(0, portSeparator), port, esUuid };
}

export function nodeFromCloudId(cloudId: string, overrides: Omit<NodeConfig, 'host'> = {}): NodeConfig {
  const endpoint = parseCloudId(cloudId);
  return {
    ...overrides,
    host: `${endpoint.esUuid}.${endpoint.host}`,
    port: endpoint.port,
    scheme: 'https',
    compress: overrides.compress ?? true,
    cloudId
  };
}
