export type ApiKeyCredentials = string | { id: string; apiKey: string };

export type BasicAuthCredentials = { username: string; password: string };

export function apiKeyHeader(apiKey: ApiKeyCredentials): string {
  if (typeof apiKey === 'string') {
    return `ApiKey ${apiKey}`;
  }
  const encoded = Buffer.from(`${apiKey.id}:${apiKey.apiKey}`, 'utf8').toString('base64');
  return `ApiKey ${encoded}`;
}

export function basicAuthHeader(credentials: BasicAuthCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
  return `Basic ${encoded}`;
}
