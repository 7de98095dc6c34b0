import type { BodyDefinition, EndpointDefinition, EndpointPath, ParamDefinition } from './specReader';

export type UrlSegment = { kind: 'literal'; value: string } | { kind: 'part'; name: string };

export type PartEntry = ParamDefinition & {
  name: string;
  required: boolean;
};

export type ApiParam = {
  name: string;
  kind: 'part' | 'body' | 'query';
  required: boolean;
  tsType: string;
  description: string;
  options?: string[];
  defaultValue?: unknown;
};

const NUMERIC_TYPES = new Set(['number', 'int', 'integer', 'long', 'short', 'byte', 'double', 'float']);

export function camelCase(name: string): string {
  return name.replace(/[_.-]+([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());
}

export function pascalCase(name: string): string {
  const camel = camelCase(name);
  return camel.charAt(0).toUpperCase() + camel.slice(1);
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/** Maps a REST spec parameter type onto the TypeScript type of its value. */
export function tsType(param: Pick<ParamDefinition, 'type' | 'options'>): string {
  if (param.type === 'list') {
    return 'string | string[]';
  }
  if (param.type === 'boolean') {
    return 'boolean';
  }
  if (NUMERIC_TYPES.has(param.type)) {
    return 'number';
  }
  if (param.type === 'enum' && param.options && param.options.length > 0) {
    return param.options.map(quoteLiteral).join(' | ');
  }
  return 'string';
}

function countParts(path: string): number {
  return path.match(/\{[^}]+\}/g)?.length ?? 0;
}

function normalizeDocUrl(url: string): string {
  if (!url.startsWith('http')) {
    return '';
  }
  return url.replace(/^http:\/\//, 'https://');
}

export class ApiEndpoint {
  readonly namespace: string;
  readonly name: string;
  readonly definition: EndpointDefinition;
  readonly docUrl: string;
  readonly stability: string;
  description: string;

  constructor(namespace: string, name: string, definition: EndpointDefinition) {
    this.namespace = namespace;
    this.name = name;
    this.definition = definition;
    this.stability = definition.stability;
    if (typeof definition.documentation === 'string') {
      this.docUrl = normalizeDocUrl(definition.documentation);
      this.description = '';
    } else {
      this.docUrl = normalizeDocUrl(definition.documentation.url);
      this.description = definition.documentation.description.trim();
    }
  }

  get fullName(): string {
    return `${this.namespace}.${this.name}`;
  }

  get methodName(): string {
    return camelCase(this.name);
  }

  get paramsType(): string {
    const prefix = this.namespace === 'core' ? '' : pascalCase(this.namespace);
    return `${prefix}${pascalCase(this.name)}Params`;
  }

  /** The path with the most dynamic parts; ties go to the first one listed. */
  get path(): EndpointPath {
    let best = this.definition.url.paths[0];
    for (const candidate of this.definition.url.paths) {
      if (countParts(candidate.path) > countParts(best.path)) {
        best = candidate;
      }
    }
    return best;
  }

  get method(): string {
    const methods = this.path.methods;
    // bodies are not sent with GET when the endpoint takes POST
    if (this.body && methods[0] === 'GET' && methods.includes('POST')) {
      return 'POST';
    }
    return methods[0];
  }

  get urlParts(): string | UrlSegment[] {
    const { path } = this.path;
    if (!path.includes('{')) {
      return path;
    }
    return path
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment): UrlSegment =>
        segment.startsWith('{') ? { kind: 'part', name: segment.slice(1, -1) } : { kind: 'literal', value: segment }
      );
  }

  /**
   * Every part over all paths, in the order the chosen path uses them. A part is
   * required only when each path carries it.
   */
  get allParts(): PartEntry[] {
    const paths = this.definition.url.paths;
    const parts = new Map<string, ParamDefinition>();
    for (const { parts: pathParts } of paths) {
      for (const [name, definition] of Object.entries(pathParts)) {
        parts.set(name, definition);
      }
    }

    const urlParts = this.urlParts;
    const order: string[] =
      typeof urlParts === 'string'
        ? []
        : urlParts.flatMap((segment) => (segment.kind === 'part' ? [segment.name] : []));
    const position = (name: string) => {
      const index = order.indexOf(name);
      return index === -1 ? order.length : index;
    };

    return Array.from(parts.entries())
      .map(([name, definition]) => ({
        ...definition,
        name,
        required: paths.every((candidate) => name in candidate.parts)
      }))
      .sort((left, right) => position(left.name) - position(right.name));
  }

  get body(): BodyDefinition | undefined {
    return this.definition.body ?? undefined;
  }

  get isBulkBody(): boolean {
    return this.body?.serialize === 'bulk';
  }

  get requiredParts(): string[] {
    const required = this.allParts.filter((part) => part.required).map((part) => part.name);
    if (this.body?.required) {
      required.push('body');
    }
    return required;
  }

  get queryParams(): string[] {
    const partNames = new Set(this.allParts.map((part) => part.name));
    return Object.keys(this.definition.params)
      .filter((name) => !partNames.has(name))
      .sort();
  }

  /** Required parts, the body, optional parts, then query parameters by name. */
  get params(): ApiParam[] {
    const parts = this.allParts;
    const toParam = (part: PartEntry): ApiParam => ({
      name: part.name,
      kind: 'part',
      required: part.required,
      tsType: tsType(part),
      description: part.description,
      options: part.options,
      defaultValue: part.default
    });

    const params = parts.filter((part) => part.required).map(toParam);
    const body = this.body;
    if (body) {
      params.push({
        name: 'body',
        kind: 'body',
        required: body.required,
        tsType: this.isBulkBody ? 'string | unknown[]' : 'Record<string, unknown>',
        description: body.description
      });
    }
    params.push(...parts.filter((part) => !part.required).map(toParam));
    for (const name of this.queryParams) {
      const definition = this.definition.params[name];
      params.push({
        name,
        kind: 'query',
        required: definition.required ?? false,
        tsType: tsType(definition),
        description: definition.description,
        options: definition.options,
        defaultValue: definition.default
      });
    }
    return params;
  }
}
