import { randomUUID } from 'node:crypto';

import {
  type Assertion,
  type AssertionKind,
  type ResponseSnapshot,
  bodyIsEmpty,
  bodyIsJson,
  checkAssertions,
  createAssertion,
  statusCode,
} from './assertions.js';
import { HttpClient, type HeaderList, type Transport, type TransportResponse } from './http-client.js';
import { type DownstreamArgs, Result, ResultKind, annotateResult, errorMessage } from './result.js';

export type PreRequestFunc = () => Promise<Result> | Result;
export type TestFunc = (response: ResponseSnapshot, args?: DownstreamArgs) => Promise<Result> | Result;
export type PostRequestFunc = (testResult: Result) => Promise<Result> | Result;

export const DEFAULT_TIMEOUT = 100;
export const DEFAULT_ITERATIONS = 1;

export const PRE_REQUEST_PREFIX = 'received non successful result from pre request func';
export const POST_REQUEST_PREFIX = 'received non successful result from post request func';
export const ASSERTION_PREFIX = 'assertion failed';

function payloadLength(body: Uint8Array | string | null): number {
  return body === null ? 0 : body.length;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * A single HTTP test case, configured through chained setters and executed
 * with {@link Request.run}.
 *
 * A Request must not be run concurrently with itself: hooks, test functions
 * and the transport are shared by every run.
 */
export class Request {
  private requestId: string = randomUUID();
  private requestUrl: string;
  private requestMethod: string;
  private requestBody: Uint8Array | string | null = null;
  private headers: HeaderList = [];
  private timeoutSeconds = DEFAULT_TIMEOUT;
  private iterationBudget = DEFAULT_ITERATIONS;
  private sleepMs = 0;
  private assertions: Assertion[] = [];
  private preRequestFunc?: PreRequestFunc;
  private testFunc?: TestFunc;
  private postRequestFunc?: PostRequestFunc;
  private client: Transport = new HttpClient();

  constructor(method: string, url: string) {
    this.requestMethod = method;
    this.requestUrl = url;
  }

  public getId(): string {
    return this.requestId;
  }

  public getMethod(): string {
    return this.requestMethod;
  }

  public getUrl(): string {
    return this.requestUrl;
  }

  public id(id: string): this {
    this.requestId = id;
    return this;
  }

  /**
   * Outgoing payload; `null` or an empty payload sends no body. GET and HEAD
   * requests cannot carry a body, and running one with a payload yields an
   * `Error` result without calling the transport.
   */
  public body(body: Uint8Array | string | null): this {
    this.requestBody = body;
    return this;
  }

  /** Appends a header value. Repeated keys keep every value. */
  public header(key: string, value: string): this {
    this.headers.push([key, value]);
    return this;
  }

  public basicAuth(username: string, password: string): this {
    const encoded = Buffer.from(`${username}:${password}`).toString('base64');
    return this.header('Authorization', `Basic ${encoded}`);
  }

  /**
   * Seconds before the transport call is aborted. A timeout yields an `Error`
   * result. Zero or less waits indefinitely.
   */
  public timeout(seconds: number): this {
    this.timeoutSeconds = seconds;
    return this;
  }

  /** Milliseconds to wait between a `Repeat` result and the next attempt. */
  public sleep(ms: number): this {
    this.sleepMs = ms;
    return this;
  }

  /**
   * Number of attempts allowed while the test function keeps returning
   * `Repeat`. Values below 1 are ignored.
   */
  public iterations(iterations: number): this {
    if (Number.isInteger(iterations) && iterations >= 1) {
      this.iterationBudget = iterations;
    }
    return this;
  }

  public assert(kind: 'statusCode', value: number): this;
  public assert(kind: 'bodyIsEmpty' | 'bodyIsJson'): this;
  public assert(kind: AssertionKind, value?: number): this {
    this.assertions.push(createAssertion(kind, value));
    return this;
  }

  public statusCode(expected: number): this {
    this.assertions.push(statusCode(expected));
    return this;
  }

  public bodyIsEmpty(): this {
    this.assertions.push(bodyIsEmpty());
    return this;
  }

  public bodyIsJson(): this {
    this.assertions.push(bodyIsJson());
    return this;
  }

  public test(testFunc: TestFunc): this {
    this.testFunc = testFunc;
    return this;
  }

  public preRequest(preRequestFunc: PreRequestFunc): this {
    this.preRequestFunc = preRequestFunc;
    return this;
  }

  public postRequest(postRequestFunc: PostRequestFunc): this {
    this.postRequestFunc = postRequestFunc;
    return this;
  }

  public transport(transport: Transport): this {
    this.client = transport;
    return this;
  }

  /**
   * Performs the request together with its hooks, assertions and test
   * function, repeating while the test function returns `Repeat` and the
   * iteration budget lasts. Never rejects.
   */
  public async run(args?: DownstreamArgs): Promise<Result> {
    if (this.requestUrl === '') {
      return Result.error('url is required');
    }
    if (this.requestMethod === '') {
      return Result.error('method is required');
    }
    const method = this.requestMethod.toUpperCase();
    if ((method === 'GET' || method === 'HEAD') && payloadLength(this.requestBody) > 0) {
      return Result.error(`a ${method} request cannot carry a body`);
    }

    let remaining = this.iterationBudget;
    let downstreamArgs = args;

    for (;;) {
      const attempt = await this.attempt(downstreamArgs);
      if (attempt.terminal) {
        return attempt.result;
      }
      if (attempt.result.kind !== ResultKind.Repeat) {
        return this.postRequestStage(attempt.result);
      }

      remaining -= 1;
      if (remaining === 0) {
        return Result.failure('failed after running out of iterations');
      }

      await wait(this.sleepMs);
      downstreamArgs = { ...attempt.result.downstreamArgs };
    }
  }

  private async attempt(args: DownstreamArgs | undefined): Promise<Attempt> {
    const { preRequestFunc } = this;
    if (preRequestFunc) {
      const preResult = await invoke(preRequestFunc, 'pre request func');
      if (preResult.kind !== ResultKind.Success) {
        return terminal(annotateResult(preResult, PRE_REQUEST_PREFIX));
      }
    }

    let response: TransportResponse;
    try {
      response = await this.client.perform({
        method: this.requestMethod,
        url: this.requestUrl,
        headers: this.headers,
        body: payloadLength(this.requestBody) > 0 ? this.requestBody : null,
        timeout: this.timeoutSeconds,
      });
    } catch (error) {
      return terminal(Result.error(`received an error while performing request: ${errorMessage(error)}`));
    }

    let body: Buffer;
    try {
      body = await response.read();
    } catch (error) {
      return terminal(Result.error(`received an error while reading response body: ${errorMessage(error)}`));
    }

    const snapshot: ResponseSnapshot = { status: response.status, headers: response.headers, body };

    let result = this.assertions.length > 0 ? Result.success() : Result.noTest();

    const assertion = await invoke(() => checkAssertions(this.assertions, snapshot), 'assertion');
    if (assertion.kind !== ResultKind.Success) {
      return terminal(annotateResult(assertion, ASSERTION_PREFIX));
    }

    const { testFunc } = this;
    if (testFunc) {
      let returned: unknown;
      try {
        returned = await testFunc(snapshot, args);
      } catch (error) {
        return terminal(Result.error(`received an error from test func: ${errorMessage(error)}`));
      }
      if (!(returned instanceof Result)) {
        return terminal(Result.error('received an error from test func: test func did not return a result'));
      }
      result = returned;
    }

    return pending(result);
  }

  private async postRequestStage(result: Result): Promise<Result> {
    const { postRequestFunc } = this;
    if (!postRequestFunc) {
      return result;
    }
    const postResult = await invoke(() => postRequestFunc(result), 'post request func');
    if (postResult.kind !== ResultKind.Success) {
      return annotateResult(postResult, POST_REQUEST_PREFIX);
    }
    return result;
  }
}

/** A terminal attempt ends the run as is, skipping retries and the post request func. */
interface Attempt {
  terminal: boolean;
  result: Result;
}

function terminal(result: Result): Attempt {
  return { terminal: true, result };
}

function pending(result: Result): Attempt {
  return { terminal: false, result };
}

/**
 * Calls a user supplied function, turning a thrown error or a value that is
 * not a `Result` into an `Error` result.
 */
async function invoke(fn: () => Promise<Result> | Result, label: string): Promise<Result> {
  let returned: unknown;
  try {
    returned = await fn();
  } catch (error) {
    return Result.error(errorMessage(error));
  }
  if (!(returned instanceof Result)) {
    return Result.error(`${label} did not return a result`);
  }
  return returned;
}

export function get(url: string): Request {
  return new Request('GET', url);
}

export function post(url: string): Request {
  return new Request('POST', url);
}

export function request(method: string, url: string): Request {
  return new Request(method, url);
}
