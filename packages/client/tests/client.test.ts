import assert from 'node:assert/strict';
import test from 'node:test';
import { ConnectionError, ImproperlyConfigured } from '@esforge/transport';
import { NamespacedClient } from '../src/base';
import { Client } from '../src/client';
import { makePath, pickQueryParams } from '../src/utils';
import { StubTransport } from './stubTransport';

test('search posts the body and accepted query parameters', async () => {
  const transport = new StubTransport(() => ({ _shards: {}, hits: { hits: [] } }));
  const client = new Client({ transport });

  await client.search({ index: 'logs', body: { query: { match_all: {} } }, size: 5 });

  assert.equal(transport.calls.length, 1);
  const [call] = transport.calls;
  assert.equal(call.method, 'POST');
  assert.equal(call.path, '/logs/_search');
  assert.deepEqual(call.options.query, { size: '5' });
  assert.deepEqual(call.options.body, { query: { match_all: {} } });
});

test('index uses PUT with an id and POST without one', async () => {
  const transport = new StubTransport(() => ({ result: 'created' }));
  const client = new Client({ transport });

  await client.index({ index: 'logs', id: '1', body: { a: 1 }, refresh: 'wait_for' });
  await client.index({ index: 'logs', body: { a: 2 } });

  assert.equal(transport.calls[0].method, 'PUT');
  assert.equal(transport.calls[0].path, '/logs/_doc/1');
  assert.deepEqual(transport.calls[0].options.query, { refresh: 'wait_for' });
  assert.equal(transport.calls[1].method, 'POST');
  assert.equal(transport.calls[1].path, '/logs/_doc');
});

test('required arguments are checked before any request', async () => {
  const transport = new StubTransport();
  const client = new Client({ transport });

  await assert.rejects(client.index({ index: 'logs', body: '' }), {
    name: 'TypeError',
    message: 'Empty value passed for a required argument.'
  });
  await assert.rejects(client.get({ index: 'logs', id: '' }), {
    name: 'TypeError',
    message: 'Empty value passed for a required argument.'
  });
  assert.equal(transport.calls.length, 0);
});

test('bulk sends newline-delimited JSON', async () => {
  const transport = new StubTransport(() => ({ errors: false, items: [] }));
  const client = new Client({ transport });

  await client.bulk({ index: 'logs', body: [{ index: { _id: '1' } }, { a: 1 }] });

  const [call] = transport.calls;
  assert.equal(call.path, '/logs/_bulk');
  assert.equal(call.options.body, '{"index":{"_id":"1"}}\n{"a":1}\n');
  assert.deepEqual(call.options.headers, { 'content-type': 'application/x-ndjson' });
});

test('ping resolves to false when the transport fails', async () => {
  const reachable = new Client({ transport: new StubTransport(() => true) });
  assert.equal(await reachable.ping(), true);

  const unreachable = new Client({
    transport: new StubTransport(() => {
      throw new ConnectionError('connection refused');
    })
  });
  assert.equal(await unreachable.ping(), false);
});

test('request options become transport options', async () => {
  const transport = new StubTransport(() => ({}));
  const client = new Client({ transport });

  await client.info({}, { opaqueId: 'req-1', ignore: 404, headers: { 'X-Trace': 'abc' } });

  const [call] = transport.calls;
  assert.equal(call.method, 'GET');
  assert.equal(call.path, '/');
  assert.deepEqual(call.options.headers, { 'x-trace': 'abc', 'x-opaque-id': 'req-1' });
  assert.deepEqual(call.options.ignore, [404]);
});

test('scroll needs a scroll id or a body', async () => {
  const transport = new StubTransport(() => ({ _shards: {}, hits: { hits: [] } }));
  const client = new Client({ transport });

  await assert.rejects(client.scroll(), { name: 'TypeError', message: 'You need to supply scroll_id or body.' });
  await client.scroll({ scroll_id: 'abc', scroll: '1m' });

  const [call] = transport.calls;
  assert.equal(call.path, '/_search/scroll');
  assert.deepEqual(call.options.body, { scroll_id: 'abc' });
  assert.deepEqual(call.options.query, { scroll: '1m' });
});

test('clearScroll wraps a single id in a list', async () => {
  const transport = new StubTransport(() => ({ succeeded: true }));
  const client = new Client({ transport });

  await client.clearScroll({ scroll_id: 'abc' });

  const [call] = transport.calls;
  assert.equal(call.method, 'DELETE');
  assert.deepEqual(call.options.body, { scroll_id: ['abc'] });
  assert.deepEqual(call.options.query, {});
});

test('namespaces share the client transport', async () => {
  const transport = new StubTransport(() => ({ features: {} }));
  const client = new Client({ transport });

  await client.xpack.usage({ master_timeout: '30s' });

  const [call] = transport.calls;
  assert.equal(call.method, 'GET');
  assert.equal(call.path, '/_xpack/usage');
  assert.deepEqual(call.options.query, { master_timeout: '30s' });
});

test('custom namespaces build their own paths', async () => {
  class CatClient extends NamespacedClient {
    async count(index?: string) {
      return this.performRequest('GET', makePath('_cat', 'count', index), pickQueryParams({ format: 'json' }, []));
    }
  }
  const transport = new StubTransport(() => [{ count: '3' }]);
  const cat = new CatClient(new Client({ transport }));

  assert.deepEqual(await cat.count('logs'), [{ count: '3' }]);
  assert.equal(transport.calls[0].path, '/_cat/count/logs');
  assert.deepEqual(transport.calls[0].options.query, { format: 'json' });
});

test('cloudId cannot be combined with explicit nodes', () => {
  assert.throws(
    () => new Client({ cloudId: 'cluster:ZXhhbXBsZS5jb20kYWJjJGRlZg==', node: 'http://localhost:9200' }),
    ImproperlyConfigured
  );
});

test('close closes the transport', async () => {
  const transport = new StubTransport();
  await new Client({ transport }).close();
  assert.equal(transport.closed, true);
});
