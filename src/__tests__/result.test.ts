import test from 'node:test';
import assert from 'node:assert/strict';
import { Result, ResultKind, annotateResult } from '../result.js';

test('Result defaults to an empty description and no downstream args', () => {
  const result = new Result(ResultKind.Success);
  assert.equal(result.kind, 'success');
  assert.equal(result.description, '');
  assert.deepEqual(result.downstreamArgs, {});
});

test('Result.error() only exposes the description of Error results', () => {
  assert.equal(Result.error('boom').error(), 'boom');
  assert.equal(Result.failure('mismatch').error(), '');
  assert.equal(new Result(ResultKind.Stop, 'halted').error(), '');
});

test('Result instances are frozen', () => {
  const result = Result.repeat({ token: 'abc' });
  assert.ok(Object.isFrozen(result));
  assert.ok(Object.isFrozen(result.downstreamArgs));
});

test('Result copies downstream args on construction', () => {
  const args = { page: '1' };
  const result = Result.repeat(args);
  args.page = '2';
  assert.equal(result.downstreamArgs.page, '1');
});

test('annotateResult prefixes the description and keeps the kind', () => {
  const original = new Result(ResultKind.Failure, 'expected 200', { id: '7' });
  const annotated = annotateResult(original, 'assertion failed');
  assert.equal(annotated.kind, ResultKind.Failure);
  assert.equal(annotated.description, 'assertion failed: expected 200');
  assert.deepEqual(annotated.downstreamArgs, { id: '7' });
  assert.equal(original.description, 'expected 200');
});

test('isSuccess is true for Success only', () => {
  assert.equal(Result.success().isSuccess(), true);
  assert.equal(Result.noTest().isSuccess(), false);
  assert.equal(Result.skip().isSuccess(), false);
});
