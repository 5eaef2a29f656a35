import { Result, ResultKind } from './result.js';

/** A fully drained response, as seen by assertions and test functions. */
export interface ResponseSnapshot {
  status: number;
  headers: Headers;
  body: Buffer;
}

export type Assertion = (response: ResponseSnapshot) => Result;

export type AssertionKind = 'statusCode' | 'bodyIsEmpty' | 'bodyIsJson';

export function statusCode(expected: number): Assertion {
  return (response) => {
    if (response.status !== expected) {
      return Result.failure(
        `received unexpected status code, expected ${expected} but received ${response.status}`
      );
    }
    return Result.success();
  };
}

export function bodyIsEmpty(): Assertion {
  return (response) => {
    if (response.body.length !== 0) {
      return Result.failure(`received non empty body, body had length of: ${response.body.length}`);
    }
    return Result.success();
  };
}

export function bodyIsJson(): Assertion {
  return (response) => {
    const text = response.body.toString('utf8');
    try {
      JSON.parse(text);
    } catch {
      return Result.failure(`failed to parse the response body as json: '${text}'`);
    }
    return Result.success();
  };
}

export function createAssertion(kind: 'statusCode', value: number): Assertion;
export function createAssertion(kind: 'bodyIsEmpty' | 'bodyIsJson'): Assertion;
export function createAssertion(kind: AssertionKind, value?: number): Assertion;
export function createAssertion(kind: AssertionKind, value?: number): Assertion {
  switch (kind) {
    case 'statusCode':
      if (typeof value !== 'number') {
        return () => Result.error('statusCode assertion requires a numeric value');
      }
      return statusCode(value);
    case 'bodyIsEmpty':
      return bodyIsEmpty();
    case 'bodyIsJson':
      return bodyIsJson();
    default:
      return () => Result.error(`unknown assertion kind ${String(kind)}`);
  }
}

/** Runs assertions in order and returns the first non successful result. */
export function checkAssertions(assertions: Assertion[], response: ResponseSnapshot): Result {
  for (const assertion of assertions) {
    const result = assertion(response);
    if (result.kind !== ResultKind.Success) {
      return result;
    }
  }
  return Result.success();
}
