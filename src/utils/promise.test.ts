import { strict as assert } from 'node:assert';
import test from 'node:test';
import { CancelledError } from '../models/errors';
import { throwIfAborted, yieldControl } from './promise';

test('throwIfAborted is a no-op without a signal or before abort', () => {
  throwIfAborted(undefined, 'tiling');
  throwIfAborted(new AbortController().signal, 'tiling');
});

test('throwIfAborted names the stage and keeps the abort reason', () => {
  const controller = new AbortController();
  const reason = new Error('user closed the dialog');
  controller.abort(reason);

  assert.throws(
    () => throwIfAborted(controller.signal, 'merging'),
    (error: unknown) => {
      assert.ok(error instanceof CancelledError);
      assert.equal(error.code, 'capture.cancelled');
      assert.equal(error.message, 'Capture was cancelled during merging');
      assert.equal(error.cause, reason);
      return true;
    },
  );
});

test('yieldControl lets queued callbacks run first', async () => {
  const order: string[] = [];
  setImmediate(() => order.push('queued'));

  await yieldControl(undefined, 'merging');
  order.push('resumed');

  assert.deepEqual(order, ['queued', 'resumed']);
});

test('yieldControl rejects once the signal is aborted', async () => {
  const controller = new AbortController();
  const pending = yieldControl(controller.signal, 'tiling');
  controller.abort();

  await assert.rejects(pending, CancelledError);
});
