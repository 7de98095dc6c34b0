import assert from 'node:assert/strict';
import test from 'node:test';
import { computeExponentialBackoff, sleep } from '../src/retries/backoff';

test('doubles the delay per attempt until the cap', () => {
  const options = { baseMs: 100, factor: 2, maxMs: 1_000, jitterRatio: 0 };
  assert.equal(computeExponentialBackoff(1, options), 100);
  assert.equal(computeExponentialBackoff(2, options), 200);
  assert.equal(computeExponentialBackoff(4, options), 800);
  assert.equal(computeExponentialBackoff(5, options), 1_000);
});

test('treats attempts below one as the first attempt', () => {
  assert.equal(computeExponentialBackoff(0, { baseMs: 250, jitterRatio: 0 }), 250);
  assert.equal(computeExponentialBackoff(-3, { baseMs: 250, jitterRatio: 0 }), 250);
});

test('applies symmetric jitter from the injected random source', () => {
  const options = { baseMs: 1_000, factor: 2, maxMs: 10_000, jitterRatio: 0.5 };
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 1 }), 3_000);
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 0.5 }), 2_000);
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 0 }), 1_000);
});

test('sleep rejects when its signal aborts', async () => {
  const controller = new AbortController();
  const pending = sleep(10_000, controller.signal);
  controller.abort(new Error('stop'));
  await assert.rejects(pending, /stop/);
});
