import type { PluginHost } from './plugin-host.js';

export type HeaderList = Array<[string, string]>;

export interface TransportRequest {
  method: string;
  url: string;
  headers: HeaderList;
  body: Uint8Array | string | null;
  /** Seconds before the call (including the body read) is aborted. Zero or less disables it. */
  timeout: number;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  read(): Promise<Buffer>;
}

export interface Transport {
  perform(request: TransportRequest): Promise<TransportResponse>;
}

/** Largest delay `setTimeout` accepts before firing immediately. */
const MAX_TIMER_MS = 2 ** 31 - 1;

function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const { cause } = error;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

export class HttpClient implements Transport {
  private pluginHost?: PluginHost;

  constructor(config: { pluginHost?: PluginHost } = {}) {
    this.pluginHost = config.pluginHost;
  }

  public async perform(options: TransportRequest): Promise<TransportResponse> {
    const headers = new Headers();
    for (const [key, value] of options.headers) {
      headers.append(key, value);
    }

    const initialRequest = new globalThis.Request(options.url, {
      method: options.method,
      headers,
      body: options.body,
    });

    const request = this.pluginHost
      ? await this.pluginHost.transformRequest(initialRequest)
      : initialRequest;

    const controller = new AbortController();
    const timeout =
      options.timeout > 0
        ? setTimeout(() => {
            controller.abort();
          }, Math.min(options.timeout * 1000, MAX_TIMER_MS))
        : undefined;

    const rethrow = (error: unknown): never => {
      if (controller.signal.aborted) {
        throw new Error(`request timed out after ${options.timeout}s`);
      }
      throw new Error(describeFetchError(error));
    };

    let response: Response;
    try {
      response = await fetch(request, { signal: controller.signal });
    } catch (error) {
      clearTimeout(timeout);
      return rethrow(error);
    }

    return {
      status: response.status,
      headers: response.headers,
      read: async () => {
        try {
          return Buffer.from(await response.arrayBuffer());
        } catch (error) {
          return rethrow(error);
        } finally {
          clearTimeout(timeout);
        }
      },
    };
  }
}
