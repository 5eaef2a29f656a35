import type { Transport } from './http-client.js';
import type { RequestGroup } from './request-group.js';
import type { Result } from './result.js';
import type { RequestRecord, RunSummary } from './types.js';

export type LoadCallback = (args: { path: string }) => Promise<{ groups: RequestGroup[] } | null>;

export interface ProbeContext {
  /** Shared fetch transport; applies the registered onFetch transforms. */
  transport: Transport;

  // Discovery Phase
  onLoad(options: { filter: RegExp }, callback: LoadCallback): void;

  // Preparation Phase: Modify/Filter groups before running
  onPrepare(callback: (groups: RequestGroup[]) => Promise<RequestGroup[]> | RequestGroup[]): void;

  // Network Phase: Transform the native fetch Request object before execution
  onFetch(callback: (req: globalThis.Request) => Promise<globalThis.Request> | globalThis.Request): void;

  // Execution Lifecycle
  onRunStart(callback: (groups: RequestGroup[]) => Promise<void> | void): void;
  onRunEnd(callback: (summary: RunSummary) => Promise<void> | void): void;

  // Request Granularity
  onRequestEnd(callback: (record: RequestRecord) => Promise<void> | void): void;
  onGroupEnd(callback: (group: RequestGroup, result: Result) => Promise<void> | void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: ProbeContext) => void | Promise<void>;
}
