import { promises as fs } from 'node:fs';
import path from 'node:path';
import Handlebars from 'handlebars';
import { isErrnoException } from './errors';
import { pascalCase, type ApiEndpoint, type ApiParam } from './model';

export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');

type TemplateName = 'header' | 'method' | 'params';
const PARTIALS = ['required', 'url'];

type HeaderContext = {
  className: string;
  isCore: boolean;
};

type FieldContext = {
  key: string;
  required: boolean;
  tsType: string;
  doc: string;
};

type EndpointContext = {
  methodName: string;
  paramsType: string;
  method: string;
  isHead: boolean;
  returnType: string;
  hasDoc: boolean;
  descriptionLines: string[];
  docUrl: string;
  stabilityTag: string;
  hasRequired: boolean;
  requiredParts: string[];
  staticPath: string;
  urlSegments: string[];
  queryParams: string[];
  bodyExpression: string;
  optionsExpression: string;
  fields: FieldContext[];
};

export type RenderedEndpoint = {
  method: string;
  params: string;
};

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : quoteLiteral(name);
}

function propertyAccess(object: string, name: string): string {
  return IDENTIFIER.test(name) ? `${object}.${name}` : `${object}[${quoteLiteral(name)}]`;
}

function escapeComment(text: string): string {
  return text.replace(/\*\//g, '*\\/');
}

/** Renders the trailing arguments of a helper call as a deduplicated list of string literals. */
function quotedList(...args: unknown[]): string {
  const values = args
    .slice(0, -1)
    .flatMap((arg: unknown) => (Array.isArray(arg) ? arg : [arg]))
    .filter((value): value is string => typeof value === 'string');
  return Array.from(new Set(values)).map(quoteLiteral).join(', ');
}

function describeField(param: ApiParam): string {
  const parts = [param.description.replace(/\s+/g, ' ').trim().replace(/\.$/, '')];
  if (param.options && param.options.length > 0) {
    parts.push(`Valid choices: ${param.options.join(', ')}`);
  }
  if (param.defaultValue !== undefined) {
    parts.push(`Default: ${String(param.defaultValue)}`);
  }
  return escapeComment(parts.filter((part) => part.length > 0).join('. '));
}

function stabilityTag(stability: string): string {
  if (stability === 'beta' || stability === 'experimental') {
    return stability;
  }
  return '';
}

export function endpointContext(api: ApiEndpoint): EndpointContext {
  const params = api.params;
  const urlParts = api.urlParts;
  const descriptionLines =
    api.description.length > 0 ? escapeComment(api.description).split('\n').map((line) => line.trimEnd()) : [];
  const stability = stabilityTag(api.stability);

  let optionsExpression = 'options';
  let bodyExpression = 'undefined';
  if (api.body) {
    bodyExpression = api.isBulkBody ? 'this.bulkBody(params.body)' : 'params.body';
    if (api.isBulkBody) {
      optionsExpression = "{ ...options, headers: { 'content-type': 'application/x-ndjson', ...options?.headers } }";
    }
  }

  return {
    methodName: api.methodName,
    paramsType: api.paramsType,
    method: api.method,
    isHead: api.method === 'HEAD',
    returnType: api.method === 'HEAD' ? 'boolean' : 'unknown',
    hasDoc: descriptionLines.length > 0 || api.docUrl.length > 0 || stability.length > 0,
    descriptionLines,
    docUrl: api.docUrl,
    stabilityTag: stability,
    hasRequired: params.some((param) => param.required),
    requiredParts: api.requiredParts,
    staticPath: typeof urlParts === 'string' ? urlParts : '',
    urlSegments:
      typeof urlParts === 'string'
        ? []
        : urlParts.map((segment) =>
            segment.kind === 'part' ? propertyAccess('params', segment.name) : quoteLiteral(segment.value)
          ),
    queryParams: api.queryParams,
    bodyExpression,
    optionsExpression,
    fields: params.map((param) => ({
      key: propertyKey(param.name),
      required: param.required,
      tsType: param.tsType,
      doc: describeField(param)
    }))
  };
}

export function className(namespace: string): string {
  return `${pascalCase(namespace)}Client`;
}

export class TemplateRenderer {
  private constructor(
    private readonly templates: {
      header: Handlebars.TemplateDelegate<HeaderContext>;
      method: Handlebars.TemplateDelegate<EndpointContext>;
      params: Handlebars.TemplateDelegate<EndpointContext>;
    },
    private readonly overrides: Map<string, Handlebars.TemplateDelegate>
  ) {}

  /**
   * Loads `header`, `method` and `params` plus the `required` and `url` partials from
   * `templatesDir`. Files under `overrides/` named `<namespace>.<endpoint>.hbs` replace
   * the request block of that endpoint.
   */
  static async load(templatesDir: string = DEFAULT_TEMPLATES_DIR): Promise<TemplateRenderer> {
    const env = Handlebars.create();
    env.registerHelper('quoted', quotedList);
    const read = (name: string) => fs.readFile(path.join(templatesDir, `${name}.hbs`), 'utf8');
    const compile = (source: string) => env.compile(source, { noEscape: true });

    for (const partial of PARTIALS) {
      env.registerPartial(partial, compile(await read(partial)));
    }

    const sources: Record<TemplateName, string> = {
      header: await read('header'),
      method: await read('method'),
      params: await read('params')
    };

    const overrides = new Map<string, Handlebars.TemplateDelegate>();
    const overridesDir = path.join(templatesDir, 'overrides');
    const entries = await fs.readdir(overridesDir).catch((err: unknown) => {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    });
    for (const entry of entries.sort()) {
      if (entry.endsWith('.hbs')) {
        const source = await fs.readFile(path.join(overridesDir, entry), 'utf8');
        overrides.set(entry.slice(0, -'.hbs'.length), compile(source));
      }
    }

    return new TemplateRenderer(
      {
        header: env.compile<HeaderContext>(sources.header, { noEscape: true }),
        method: env.compile<EndpointContext>(sources.method, { noEscape: true }),
        params: env.compile<EndpointContext>(sources.params, { noEscape: true })
      },
      overrides
    );
  }

  renderHeader(namespace: string): string {
    return this.templates.header({ className: className(namespace), isCore: namespace === 'core' });
  }

  renderEndpoint(api: ApiEndpoint): RenderedEndpoint {
    const context = endpointContext(api);
    const override = this.overrides.get(api.fullName);
    const runtime: Handlebars.RuntimeOptions = override ? { partials: { request: override } } : {};
    return {
      method: this.templates.method(context, runtime),
      params: this.templates.params(context, runtime)
    };
  }
}
