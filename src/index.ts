export { Result, ResultKind, annotateResult } from './result.js';
export type { DownstreamArgs } from './result.js';
export {
  Request,
  get,
  post,
  request,
  DEFAULT_ITERATIONS,
  DEFAULT_TIMEOUT,
  ASSERTION_PREFIX,
  PRE_REQUEST_PREFIX,
  POST_REQUEST_PREFIX,
} from './request.js';
export type { PreRequestFunc, PostRequestFunc, TestFunc } from './request.js';
export { RequestGroup } from './request-group.js';
export { bodyIsEmpty, bodyIsJson, checkAssertions, createAssertion, statusCode } from './assertions.js';
export type { Assertion, AssertionKind, ResponseSnapshot } from './assertions.js';
export { HttpClient } from './http-client.js';
export type { HeaderList, Transport, TransportRequest, TransportResponse } from './http-client.js';
export * from './helpers.js';
export { ConfigError, SuiteLoadError } from './errors.js';
export type { Plugin, ProbeContext } from './plugin-api.js';
export type { GroupRecord, RequestRecord, RunSummary } from './types.js';
