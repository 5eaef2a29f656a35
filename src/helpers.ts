import type { PostRequestFunc, PreRequestFunc, Request, TestFunc } from './request.js';
import { Result, ResultKind } from './result.js';

function composePreRequest(...fns: PreRequestFunc[]): PreRequestFunc {
  return async () => {
    for (const fn of fns) {
      const result = await fn();
      if (result.kind !== ResultKind.Success) {
        return result;
      }
    }
    return Result.success();
  };
}

function composePostRequest(...fns: PostRequestFunc[]): PostRequestFunc {
  return async (testResult) => {
    for (const fn of fns) {
      const result = await fn(testResult);
      if (result.kind !== ResultKind.Success) {
        return result;
      }
    }
    return Result.success();
  };
}

function withIterations(requests: Request[], iterations: number): Request[] {
  requests.forEach((request) => {
    request.iterations(iterations);
  });
  return requests;
}

function withSleep(requests: Request[], ms: number): Request[] {
  requests.forEach((request) => {
    request.sleep(ms);
  });
  return requests;
}

function withTimeout(requests: Request[], seconds: number): Request[] {
  requests.forEach((request) => {
    request.timeout(seconds);
  });
  return requests;
}

/** Test function that asks for another attempt until the expected status arrives. */
function repeatUntilStatus(status: number): TestFunc {
  return (response, args) => {
    if (response.status === status) {
      return Result.success();
    }
    return Result.repeat(args, `waiting for status ${status}, received ${response.status}`);
  };
}

/** Test function that skips the rest of the group unless the expected status arrives. */
function skipUnlessStatus(status: number): TestFunc {
  return (response) => {
    if (response.status === status) {
      return Result.success();
    }
    return Result.skip(`expected status ${status} but received ${response.status}`);
  };
}

export {
  composePreRequest,
  composePostRequest,
  withIterations,
  withSleep,
  withTimeout,
  repeatUntilStatus,
  skipUnlessStatus,
};
