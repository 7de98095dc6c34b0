import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { SpecError } from '../src/errors';
import { readApiSpecs, splitApiName } from '../src/specReader';

const FIXTURES = path.resolve(__dirname, 'fixtures', 'api');

async function withSpecDir(files: Record<string, string>, run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'esforge-specs-'));
  try {
    for (const [name, contents] of Object.entries(files)) {
      await fs.writeFile(path.join(dir, name), contents, 'utf8');
    }
    await run(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('splitApiName splits at the last dot', () => {
  assert.deepEqual(splitApiName('search'), { namespace: 'core', name: 'search' });
  assert.deepEqual(splitApiName('indices.put_mapping'), { namespace: 'indices', name: 'put_mapping' });
  assert.deepEqual(splitApiName('ml.data_frame.get'), { namespace: 'ml.data_frame', name: 'get' });
});

test('readApiSpecs reads definitions in file order and skips _common and non-json files', async () => {
  const specs = await readApiSpecs([FIXTURES]);
  assert.deepEqual(
    specs.map((spec) => `${spec.namespace}.${spec.name}`),
    [
      'core.bulk',
      'core.clear_scroll',
      'indices.exists',
      'indices.put_mapping',
      'core.info',
      'core.ping',
      'core.scroll',
      'core.search'
    ]
  );
  const putMapping = specs.find((spec) => spec.name === 'put_mapping');
  assert.ok(putMapping);
  assert.equal(putMapping.file, path.join(FIXTURES, 'indices.put_mapping.json'));
  assert.equal(putMapping.definition.stability, 'beta');
  assert.equal(putMapping.definition.params.write_index_only.default, false);
  assert.equal(putMapping.definition.params.timeout.type, 'time');
});

test('readApiSpecs fills in defaults', async () => {
  const spec = JSON.stringify({
    'cat.count': {
      documentation: { url: 'https://example.com/docs/cat-count.html' },
      url: { paths: [{ path: '/_cat/count', methods: ['GET'] }] }
    }
  });
  await withSpecDir({ 'cat.count.json': spec }, async (dir) => {
    const [count] = await readApiSpecs([dir]);
    assert.equal(count.namespace, 'cat');
    assert.equal(count.definition.stability, 'stable');
    assert.deepEqual(count.definition.params, {});
    assert.deepEqual(count.definition.url.paths[0].parts, {});
    assert.deepEqual(count.definition.documentation, { url: 'https://example.com/docs/cat-count.html', description: '' });
  });
});

test('a later spec directory replaces definitions of the same name', async () => {
  const spec = JSON.stringify({
    info: {
      documentation: { url: 'https://example.com/docs/info.html', description: 'Cluster banner.' },
      url: { paths: [{ path: '/', methods: ['GET'] }] }
    }
  });
  await withSpecDir({ 'info.json': spec }, async (dir) => {
    const specs = await readApiSpecs([FIXTURES, dir]);
    assert.equal(specs.length, 8);
    const info = specs.find((entry) => entry.name === 'info');
    assert.ok(info);
    assert.equal(info.file, path.join(dir, 'info.json'));
    assert.deepEqual(info.definition.documentation, {
      url: 'https://example.com/docs/info.html',
      description: 'Cluster banner.'
    });
  });
});

test('invalid JSON raises SpecError naming the file', async () => {
  await withSpecDir({ 'broken.json': '{' }, async (dir) => {
    const file = path.join(dir, 'broken.json');
    await assert.rejects(readApiSpecs([dir]), (err: unknown) => {
      assert.ok(err instanceof SpecError);
      assert.equal(err.file, file);
      assert.ok(err.message.startsWith(`${file}: invalid JSON (`));
      return true;
    });
  });
});

test('a document without its own key raises SpecError', async () => {
  const spec = JSON.stringify({ other: { documentation: 'x', url: { paths: [{ path: '/', methods: ['GET'] }] } } });
  await withSpecDir({ 'cat.json': spec }, async (dir) => {
    const file = path.join(dir, 'cat.json');
    await assert.rejects(readApiSpecs([dir]), {
      name: 'SpecError',
      message: `${file}: expected a definition keyed by 'cat'`
    });
  });
});

test('schema violations are reported with their path', async () => {
  const spec = JSON.stringify({ cat: { documentation: 'x', url: { paths: [] } } });
  await withSpecDir({ 'cat.json': spec }, async (dir) => {
    const file = path.join(dir, 'cat.json');
    await assert.rejects(readApiSpecs([dir]), {
      name: 'SpecError',
      message: `${file}: url.paths: Array must contain at least 1 element(s)`
    });
  });
});
