import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { generate, renderIndex } from '../src/generate';

const FIXTURES = path.resolve(__dirname, 'fixtures', 'api');

const INDICES_MODULE = [
  'import {',
  '  NamespacedClient,',
  '  makePath,',
  '  pickQueryParams,',
  '  requireParams,',
  '  type GlobalParams,',
  '  type RequestOptions',
  "} from '@esforge/client';",
  '',
  'export class IndicesClient extends NamespacedClient {',
  '  // AUTO-GENERATED-API-DEFINITIONS //',
  '',
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
  '',
  '  /**',
  '   * @see https://example.com/docs/indices-put-mapping.html',
  '   * @beta',
  '   */',
  '  async putMapping(',
  '    params: IndicesPutMappingParams,',
  '    options?: RequestOptions',
  '  ): Promise<unknown> {',
  "    requireParams(params, ['index', 'body']);",
  '    const response = await this.performRequest(',
  "      'PUT',",
  "      makePath(params.index, '_mapping'),",
  "      pickQueryParams(params, ['timeout', 'write_index_only']),",
  '      params.body,',
  '      options',
  '    );',
  '    return response;',
  '  }',
  '}',
  '',
  'export type IndicesExistsParams = GlobalParams & {',
  '  /** A comma-separated list of index names */',
  '  index: string | string[];',
  '  /** Whether to expand wildcard expression to concrete indices. Valid choices: open, closed, all. Default: open */',
  "  expand_wildcards?: 'open' | 'closed' | 'all';",
  '  /** Return local information */',
  '  local?: boolean;',
  '};',
  '',
  'export type IndicesPutMappingParams = GlobalParams & {',
  '  /** A comma-separated list of index names */',
  '  index: string | string[];',
  '  /** The mapping definition */',
  '  body: Record<string, unknown>;',
  '  /** Explicit operation timeout */',
  '  timeout?: string;',
  '  /** Only apply to the write index. Default: false */',
  '  write_index_only?: boolean;',
  '};',
  ''
].join('\n');

async function withOutDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'esforge-generate-'));
  try {
    await run(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('renderIndex re-exports every namespace module', () => {
  assert.equal(
    renderIndex(['indices', 'core', 'search_application']),
    "export * from './core';\nexport * from './indices';\nexport * from './searchApplication';\n"
  );
});

test('generate writes one module per namespace plus an index', async () => {
  await withOutDir(async (root) => {
    const outDir = path.join(root, 'api');
    const result = await generate({ specDirs: [FIXTURES], outDir });

    assert.deepEqual(result.namespaces, ['core', 'indices']);
    assert.deepEqual(result.files, [
      path.join(outDir, 'core.ts'),
      path.join(outDir, 'indices.ts'),
      path.join(outDir, 'index.ts')
    ]);
    assert.deepEqual(result.syncFiles, []);
    assert.equal(await fs.readFile(path.join(outDir, 'indices.ts'), 'utf8'), INDICES_MODULE);
    assert.equal(
      await fs.readFile(path.join(outDir, 'index.ts'), 'utf8'),
      "export * from './core';\nexport * from './indices';\n"
    );

    const core = await fs.readFile(path.join(outDir, 'core.ts'), 'utf8');
    assert.ok(core.startsWith("import { TransportError } from '@esforge/transport';\n"));
    assert.ok(core.includes('export class CoreClient extends NamespacedClient {\n'));
    assert.deepEqual(
      core.split('\n').filter((line) => line.startsWith('  async ')),
      ['  async bulk(', '  async clearScroll(', '  async info(', '  async ping(', '  async scroll(', '  async search(']
    );
  });
});

test('regenerating is byte-identical', async () => {
  await withOutDir(async (outDir) => {
    await generate({ specDirs: [FIXTURES], outDir });
    const first = await fs.readFile(path.join(outDir, 'core.ts'), 'utf8');
    await generate({ specDirs: [FIXTURES], outDir });
    assert.equal(await fs.readFile(path.join(outDir, 'core.ts'), 'utf8'), first);
    assert.equal(await fs.readFile(path.join(outDir, 'indices.ts'), 'utf8'), INDICES_MODULE);
  });
});

test('an existing module keeps its header, method order and descriptions', async () => {
  await withOutDir(async (outDir) => {
    await fs.writeFile(
      path.join(outDir, 'indices.ts'),
      [
        '// Index management helpers.',
        "import { NamespacedClient } from '@esforge/client';",
        '',
        'export class IndicesClient extends NamespacedClient {',
        '  // AUTO-GENERATED-API-DEFINITIONS //',
        '',
        '  /**',
        '   * Adds new fields to an existing mapping.',
        '   */',
        '  async putMapping(): Promise<void> {}',
        '',
        '  async exists(): Promise<void> {}',
        '}',
        ''
      ].join('\n'),
      'utf8'
    );

    await generate({ specDirs: [FIXTURES], outDir });
    const indices = await fs.readFile(path.join(outDir, 'indices.ts'), 'utf8');

    assert.ok(
      indices.startsWith(
        [
          '// Index management helpers.',
          "import { NamespacedClient } from '@esforge/client';",
          '',
          'export class IndicesClient extends NamespacedClient {',
          '  // AUTO-GENERATED-API-DEFINITIONS //',
          '',
          '  /**',
          '   * Adds new fields to an existing mapping.',
          '   *',
          '   * @see https://example.com/docs/indices-put-mapping.html',
          '   * @beta',
          '   */',
          '  async putMapping(',
          ''
        ].join('\n')
      )
    );
    assert.ok(indices.indexOf('  async putMapping(') < indices.indexOf('  async exists('));
    assert.ok(
      indices.indexOf('export type IndicesPutMappingParams') < indices.indexOf('export type IndicesExistsParams')
    );
  });
});

test('the sync flavour is written next to the async modules', async () => {
  await withOutDir(async (root) => {
    const outDir = path.join(root, 'api');
    const syncDir = path.join(root, 'sync');
    const result = await generate({ specDirs: [FIXTURES], outDir, sync: syncDir });

    assert.deepEqual(result.syncFiles, [
      path.join(syncDir, 'core.ts'),
      path.join(syncDir, 'index.ts'),
      path.join(syncDir, 'indices.ts')
    ]);
    const indices = await fs.readFile(path.join(syncDir, 'indices.ts'), 'utf8');
    const lines = indices.split('\n');
    assert.ok(lines.includes('  SyncNamespacedClient,'));
    assert.ok(lines.includes('export class IndicesClient extends SyncNamespacedClient {'));
    assert.ok(lines.includes('  exists('));
    assert.ok(lines.includes('  ): boolean {'));
    assert.ok(lines.includes('    const response = this.performRequest('));
    assert.equal(
      lines.some((line) => line.includes('async') || line.includes('await') || line.includes('Promise')),
      false
    );
  });
});
