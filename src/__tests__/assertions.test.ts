import test from 'node:test';
import assert from 'node:assert/strict';
import {
  type ResponseSnapshot,
  bodyIsEmpty,
  bodyIsJson,
  checkAssertions,
  createAssertion,
  statusCode,
} from '../assertions.js';
import { Result, ResultKind } from '../result.js';

const snapshot = (status: number, body = ''): ResponseSnapshot => ({
  status,
  headers: new Headers(),
  body: Buffer.from(body),
});

test('statusCode reports the expected and received codes', () => {
  assert.equal(statusCode(200)(snapshot(200)).kind, ResultKind.Success);
  const result = statusCode(200)(snapshot(500));
  assert.equal(result.kind, ResultKind.Failure);
  assert.equal(result.description, 'received unexpected status code, expected 200 but received 500');
});

test('bodyIsEmpty fails on any byte', () => {
  assert.equal(bodyIsEmpty()(snapshot(200)).kind, ResultKind.Success);
  const result = bodyIsEmpty()(snapshot(200, 'hello'));
  assert.equal(result.kind, ResultKind.Failure);
  assert.equal(result.description, 'received non empty body, body had length of: 5');
});

test('bodyIsJson accepts json and rejects text', () => {
  assert.equal(bodyIsJson()(snapshot(200, '{"key":"value"}')).kind, ResultKind.Success);
  const result = bodyIsJson()(snapshot(200, 'Non json response'));
  assert.equal(result.kind, ResultKind.Failure);
  assert.equal(result.description, "failed to parse the response body as json: 'Non json response'");
});

test('bodyIsJson treats an empty body as invalid', () => {
  assert.equal(bodyIsJson()(snapshot(204)).kind, ResultKind.Failure);
});

test('createAssertion maps kinds to assertions', () => {
  assert.equal(createAssertion('statusCode', 201)(snapshot(201)).kind, ResultKind.Success);
  assert.equal(createAssertion('statusCode', 201)(snapshot(200)).kind, ResultKind.Failure);
  assert.equal(createAssertion('bodyIsEmpty')(snapshot(200, 'x')).kind, ResultKind.Failure);
  assert.equal(createAssertion('bodyIsJson')(snapshot(200, '[]')).kind, ResultKind.Success);
});

test('createAssertion without a status value yields an error', () => {
  const result = createAssertion('statusCode', undefined)(snapshot(200));
  assert.equal(result.kind, ResultKind.Error);
  assert.equal(result.description, 'statusCode assertion requires a numeric value');
});

test('checkAssertions stops at the first non successful result', () => {
  const calls: string[] = [];
  const result = checkAssertions(
    [
      () => {
        calls.push('first');
        return Result.success();
      },
      () => {
        calls.push('second');
        return Result.failure('second failed');
      },
      () => {
        calls.push('third');
        return Result.success();
      },
    ],
    snapshot(200)
  );
  assert.deepEqual(calls, ['first', 'second']);
  assert.equal(result.description, 'second failed');
});

test('checkAssertions with no assertions is a success', () => {
  assert.equal(checkAssertions([], snapshot(200)).kind, ResultKind.Success);
});
