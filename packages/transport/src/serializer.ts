import { ImproperlyConfigured, SerializationError } from './errors';

export interface Serializer {
  readonly mimetype: string;
  loads(text: string): unknown;
  dumps(data: unknown): string;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export class JsonSerializer implements Serializer {
  readonly mimetype: string = 'application/json';

  loads(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new SerializationError(`Unable to deserialize as JSON: ${text.slice(0, 200)}`, {
        data: text,
        cause: err
      });
    }
  }

  dumps(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    let serialized: string | undefined;
    try {
      serialized = JSON.stringify(data, jsonReplacer);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SerializationError(`Unable to serialize value: ${reason}`, {
        data,
        cause: err
      });
    }
    if (serialized === undefined) {
      throw new SerializationError(`Unable to serialize value of type ${typeof data}`, { data });
    }
    return serialized;
  }
}

export class TextSerializer implements Serializer {
  readonly mimetype: string = 'text/plain';

  loads(text: string): unknown {
    return text;
  }

  dumps(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    throw new SerializationError(`Cannot serialize ${String(data)} into text.`, { data });
  }
}

export class NdjsonSerializer implements Serializer {
  readonly mimetype: string = 'application/x-ndjson';
  private readonly json = new JsonSerializer();

  loads(text: string): unknown {
    return text
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => this.json.loads(line));
  }

  dumps(data: unknown): string {
    if (typeof data === 'string') {
      return data.endsWith('\n') ? data : `${data}\n`;
    }
    if (!Array.isArray(data)) {
      throw new SerializationError('NDJSON bodies must be a string or an array of items', { data });
    }
    return data.map((item) => `${this.json.dumps(item)}\n`).join('');
  }
}

export const COMPATIBILITY_MIMETYPE = 'application/vnd.elasticsearch+json';

export function defaultSerializers(): Map<string, Serializer> {
  const serializers: Serializer[] = [new JsonSerializer(), new TextSerializer(), new NdjsonSerializer()];
  return new Map(serializers.map((serializer) => [serializer.mimetype, serializer]));
}

export class Deserializer {
  private readonly serializers: Map<string, Serializer>;
  private readonly defaultSerializer: Serializer;

  constructor(serializers: Map<string, Serializer>, defaultMimetype = 'application/json') {
    const fallback = serializers.get(defaultMimetype);
    if (!fallback) {
      throw new ImproperlyConfigured(`Cannot find default serializer (${defaultMimetype})`);
    }
    this.serializers = serializers;
    this.defaultSerializer = fallback;
  }

  loads(text: string, mimetype?: string | null): unknown {
    if (!mimetype) {
      return this.defaultSerializer.loads(text);
    }
    let normalized = mimetype.split(';')[0]?.trim().toLowerCase() ?? '';
    if (normalized === COMPATIBILITY_MIMETYPE) {
      normalized = 'application/json';
    }
    const serializer = this.serializers.get(normalized);
    if (!serializer) {
      throw new SerializationError(`Unknown mimetype, unable to deserialize: ${normalized}`);
    }
    return serializer.loads(text);
  }
}
