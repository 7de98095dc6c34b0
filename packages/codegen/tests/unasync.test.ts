import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { unasync, unasyncFiles } from '../src/unasync';

const CAT_CLIENT = [
  "import { NamespacedClient, type TransportLike } from '@esforge/client';",
  '',
  'export class CatClient extends NamespacedClient {',
  '  // await is kept in comments',
  '  async indices(params: CatParams = {}): Promise<unknown> {',
  "    const response = await this.performRequest('GET', '/_cat/indices');",
  '    return response;',
  '  }',
  '',
  '  private async counts(): Promise<Record<string, number>> {',
  "    return { total: await this.count('async await') };",
  '  }',
  '}',
  ''
].join('\n');

test('unasync strips async, await and Promise and renames identifiers', () => {
  assert.equal(
    unasync(CAT_CLIENT),
    [
      "import { SyncNamespacedClient, type SyncTransportLike } from '@esforge/client';",
      '',
      'export class CatClient extends SyncNamespacedClient {',
      '  // await is kept in comments',
      '  indices(params: CatParams = {}): unknown {',
      "    const response = this.performRequest('GET', '/_cat/indices');",
      '    return response;',
      '  }',
      '',
      '  private counts(): Record<string, number> {',
      "    return { total: this.count('async await') };",
      '  }',
      '}',
      ''
    ].join('\n')
  );
});

test('unasync leaves non-modifier uses alone', () => {
  const source = [
    'const async = 1;',
    'async();',
    'const run = async (value: number) => await value;',
    'const later = new Promise<void>((resolve) => resolve());',
    'const label = `${await run(async)} items`;',
    'const pattern = /async await/;',
    'state.await = true;',
    ''
  ].join('\n');
  assert.equal(
    unasync(source),
    [
      'const async = 1;',
      'async();',
      'const run = (value: number) => value;',
      'const later = new Promise<void>((resolve) => resolve());',
      'const label = `${run(async)} items`;',
      'const pattern = /async await/;',
      'state.await = true;',
      ''
    ].join('\n')
  );
});

test('custom replacements extend the defaults', () => {
  assert.equal(
    unasync('class CatClient extends NamespacedClient {}\n', { replacements: { CatClient: 'SyncCatClient' } }),
    'class SyncCatClient extends SyncNamespacedClient {}\n'
  );
});

test('unasyncFiles mirrors .ts files into the target directory', async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'esforge-unasync-'));
  try {
    const from = path.join(root, 'async');
    const to = path.join(root, 'sync');
    await fs.mkdir(path.join(from, 'nested'), { recursive: true });
    await fs.writeFile(path.join(from, 'a.ts'), 'export async function a(): Promise<number> {\n  return await b();\n}\n');
    await fs.writeFile(path.join(from, 'nested', 'b.ts'), 'export const b = async () => 1;\n');
    await fs.writeFile(path.join(from, 'notes.md'), 'async notes\n');

    const written = await unasyncFiles(from, to);

    assert.deepEqual(written, [path.join(to, 'a.ts'), path.join(to, 'nested', 'b.ts')]);
    assert.equal(
      await fs.readFile(path.join(to, 'a.ts'), 'utf8'),
      'export function a(): number {\n  return b();\n}\n'
    );
    assert.equal(await fs.readFile(path.join(to, 'nested', 'b.ts'), 'utf8'), 'export const b = () => 1;\n');
    await assert.rejects(fs.access(path.join(to, 'notes.md')));
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
});
