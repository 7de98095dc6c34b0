import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { ApiEndpoint } from '../src/model';
import { DEFAULT_TEMPLATES_DIR, TemplateRenderer, className, endpointContext } from '../src/renderer';
import { endpointDefinitionSchema, readApiSpecs } from '../src/specReader';

const FIXTURES = path.resolve(__dirname, 'fixtures', 'api');

async function endpoint(namespace: string, name: string): Promise<ApiEndpoint> {
  const specs = await readApiSpecs([FIXTURES]);
  const spec = specs.find((entry) => entry.namespace === namespace && entry.name === name);
  assert.ok(spec, `missing fixture ${namespace}.${name}`);
  return new ApiEndpoint(spec.namespace, spec.name, spec.definition);
}

test('className', () => {
  assert.equal(className('core'), 'CoreClient');
  assert.equal(className('search_application'), 'SearchApplicationClient');
});

test('renders a HEAD endpoint with required parts', async () => {
  const renderer = await TemplateRenderer.load();
  const rendered = renderer.renderEndpoint(await endpoint('indices', 'exists'));
  assert.equal(
    rendered.method,
    [
      '  /**',
      '   * Returns information about whether a particular index exists.',
      '   *',
      '   * @see https://example.com/docs/indices-exists.html',
      '   */',
      '  async exists(',
      '    params: IndicesExistsParams,',
      '    options?: RequestOptions',
      '  ): Promise<boolean> {',
      "    requireParams(params, ['index']);",
      '    const response = await this.performRequest(',
      "      'HEAD',",
      '      makePath(params.index),',
      "      pickQueryParams(params, ['expand_wildcards', 'local']),",
      '      undefined,',
      '      options',
      '    );',
      '    return response === true;',
      '  }',
      ''
    ].join('\n')
  );
  assert.equal(
    rendered.params,
    [
      'export type IndicesExistsParams = GlobalParams & {',
      '  /** A comma-separated list of index names */',
      '  index: string | string[];',
      '  /** Whether to expand wildcard expression to concrete indices. Valid choices: open, closed, all. Default: open */',
      "  expand_wildcards?: 'open' | 'closed' | 'all';",
      '  /** Return local information */',
      '  local?: boolean;',
      '};',
      ''
    ].join('\n')
  );
});

test('optional params default to an empty object and bodies are passed through', async () => {
  const renderer = await TemplateRenderer.load();
  const { method } = renderer.renderEndpoint(await endpoint('core', 'search'));
  const lines = method.split('\n');
  assert.ok(lines.includes('    params: SearchParams = {},'));
  assert.ok(lines.includes("      'POST',"));
  assert.ok(lines.includes("      makePath(params.index, '_search'),"));
  assert.ok(lines.includes("      pickQueryParams(params, ['q', 'scroll', 'search_type', 'size']),"));
  assert.ok(lines.includes('      params.body,'));
  assert.equal(
    lines.some((line) => line.includes('requireParams')),
    false
  );
});

test('bulk endpoints send ndjson', async () => {
  const renderer = await TemplateRenderer.load();
  const { method, params } = renderer.renderEndpoint(await endpoint('core', 'bulk'));
  const lines = method.split('\n');
  assert.ok(lines.includes("    requireParams(params, ['body']);"));
  assert.ok(lines.includes('      this.bulkBody(params.body),'));
  assert.ok(
    lines.includes(
      "      { ...options, headers: { 'content-type': 'application/x-ndjson', ...options?.headers } }"
    )
  );
  assert.ok(params.includes('  body: string | unknown[];\n'));
  assert.ok(params.includes("  refresh?: 'true' | 'false' | 'wait_for';\n"));
});

test('stability tags and endpoints without a description', async () => {
  const renderer = await TemplateRenderer.load();
  const { method } = renderer.renderEndpoint(await endpoint('indices', 'put_mapping'));
  assert.ok(
    method.startsWith(
      [
        '  /**',
        '   * @see https://example.com/docs/indices-put-mapping.html',
        '   * @beta',
        '   */',
        '  async putMapping(',
        ''
      ].join('\n')
    )
  );
});

test('endpoints without params render a plain params type', async () => {
  const renderer = await TemplateRenderer.load();
  const { params } = renderer.renderEndpoint(await endpoint('core', 'info'));
  assert.equal(params, 'export type InfoParams = GlobalParams;\n');
});

test('an override replaces the request block', async () => {
  const renderer = await TemplateRenderer.load();
  const { method } = renderer.renderEndpoint(await endpoint('core', 'ping'));
  assert.equal(
    method,
    [
      '  /**',
      '   * Returns whether the cluster is running.',
      '   *',
      '   * @see https://example.com/docs/ping.html',
      '   */',
      '  async ping(',
      '    params: PingParams = {},',
      '    options?: RequestOptions',
      '  ): Promise<boolean> {',
      '    try {',
      '      const response = await this.performRequest(',
      "        'HEAD',",
      "        '/',",
      '        pickQueryParams(params, []),',
      '        undefined,',
      '        options',
      '      );',
      '      return response === true;',
      '    } catch (err) {',
      '      if (err instanceof TransportError) {',
      '        return false;',
      '      }',
      '      throw err;',
      '    }',
      '  }',
      ''
    ].join('\n')
  );
});

test('overrides can add query parameters', async () => {
  const renderer = await TemplateRenderer.load();
  const { method } = renderer.renderEndpoint(await endpoint('core', 'scroll'));
  assert.ok(
    method.includes(
      "      pickQueryParams(isSkipped(body) ? query : { ...query, scroll_id: scrollId }, ['rest_total_hits_as_int', 'scroll', 'scroll_id']),\n"
    )
  );
});

test('a templates directory without overrides renders every endpoint from the defaults', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'esforge-templates-'));
  try {
    for (const name of ['header', 'method', 'params', 'required', 'url']) {
      await fs.copyFile(path.join(DEFAULT_TEMPLATES_DIR, `${name}.hbs`), path.join(dir, `${name}.hbs`));
    }
    const renderer = await TemplateRenderer.load(dir);
    const lines = renderer.renderEndpoint(await endpoint('core', 'ping')).method.split('\n');
    assert.ok(lines.includes("      '/',"));
    assert.ok(lines.includes('    return response === true;'));
    assert.equal(
      lines.some((line) => line.includes('catch')),
      false
    );
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('the core header imports the transport error', async () => {
  const renderer = await TemplateRenderer.load();
  const core = renderer.renderHeader('core');
  assert.ok(core.startsWith("import { TransportError } from '@esforge/transport';\nimport {\n  NamespacedClient,\n  isSkipped,\n"));
  const indices = renderer.renderHeader('indices');
  assert.ok(indices.startsWith('import {\n  NamespacedClient,\n  makePath,\n'));
  assert.ok(indices.endsWith('export class IndicesClient extends NamespacedClient {\n  // AUTO-GENERATED-API-DEFINITIONS //\n'));
});

test('field docs are comment safe and odd names are quoted', () => {
  const definition = endpointDefinitionSchema.parse({
    documentation: { url: 'https://example.com/docs/cat.html', description: 'Lists things.' },
    url: { paths: [{ path: '/_cat', methods: ['GET'] }] },
    params: {
      'filter-path': { type: 'list', description: 'Ends with */ marker.' }
    }
  });
  const context = endpointContext(new ApiEndpoint('cat', 'help', definition));
  assert.deepEqual(context.fields, [
    { key: "'filter-path'", required: false, tsType: 'string | string[]', doc: 'Ends with *\\/ marker' }
  ]);
  assert.equal(context.staticPath, '/_cat');
  assert.deepEqual(context.urlSegments, []);
  assert.equal(context.hasRequired, false);
});
