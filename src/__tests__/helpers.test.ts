import test from 'node:test';
import assert from 'node:assert/strict';
import type { ResponseSnapshot } from '../assertions.js';
import {
  composePostRequest,
  composePreRequest,
  repeatUntilStatus,
  skipUnlessStatus,
  withIterations,
  withSleep,
  withTimeout,
} from '../helpers.js';
import type { Transport, TransportRequest } from '../http-client.js';
import { get } from '../request.js';
import { Result, ResultKind } from '../result.js';

const snapshot = (status: number): ResponseSnapshot => ({
  status,
  headers: new Headers(),
  body: Buffer.alloc(0),
});

test('composePreRequest stops at the first non successful hook', async () => {
  const calls: string[] = [];
  const hook = composePreRequest(
    () => {
      calls.push('login');
      return Result.success();
    },
    async () => {
      calls.push('seed');
      return Result.failure('seed failed');
    },
    () => {
      calls.push('never');
      return Result.success();
    }
  );
  const result = await hook();
  assert.equal(result.description, 'seed failed');
  assert.deepEqual(calls, ['login', 'seed']);
});

test('composePostRequest passes the test result to every hook', async () => {
  const seen: string[] = [];
  const hook = composePostRequest(
    (r) => {
      seen.push(r.description);
      return Result.success();
    },
    (r) => {
      seen.push(r.kind);
      return Result.success();
    }
  );
  const result = await hook(Result.failure('bad'));
  assert.equal(result.kind, ResultKind.Success);
  assert.deepEqual(seen, ['bad', ResultKind.Failure]);
});

test('repeatUntilStatus repeats with the incoming args', () => {
  const fn = repeatUntilStatus(200);
  const ok = fn(snapshot(200));
  assert.ok(ok instanceof Result);
  assert.equal(ok.kind, ResultKind.Success);
  const repeated = fn(snapshot(503), { cursor: '4' });
  assert.ok(repeated instanceof Result);
  assert.equal(repeated.kind, ResultKind.Repeat);
  assert.deepEqual(repeated.downstreamArgs, { cursor: '4' });
  assert.equal(repeated.description, 'waiting for status 200, received 503');
});

test('skipUnlessStatus skips on any other status', () => {
  const fn = skipUnlessStatus(204);
  const skipped = fn(snapshot(404));
  assert.ok(skipped instanceof Result);
  assert.equal(skipped.kind, ResultKind.Skip);
  assert.equal(skipped.description, 'expected status 204 but received 404');
});

test('batch setters apply to every request', async () => {
  const seen: TransportRequest[] = [];
  const transport: Transport = {
    perform: async (req) => {
      seen.push(req);
      return { status: 500, headers: new Headers(), read: async () => Buffer.alloc(0) };
    },
  };
  const requests = [get('http://stub/a'), get('http://stub/b')].map((r) =>
    r.transport(transport).test(repeatUntilStatus(200))
  );
  withSleep(withTimeout(withIterations(requests, 2), 9), 0);
  const results: Result[] = [];
  for (const r of requests) {
    results.push(await r.run());
  }
  assert.deepEqual(
    results.map((r) => r.description),
    ['failed after running out of iterations', 'failed after running out of iterations']
  );
  assert.equal(seen.length, 4);
  assert.ok(seen.every((req) => req.timeout === 9));
});
