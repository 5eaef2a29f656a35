import { HttpClient, type Transport } from './http-client.js';
import type { LoadCallback, Plugin, ProbeContext } from './plugin-api.js';
import type { RequestGroup } from './request-group.js';
import type { Result } from './result.js';
import type { RequestRecord, RunSummary } from './types.js';

type FetchTransform = (req: globalThis.Request) => Promise<globalThis.Request> | globalThis.Request;

export class PluginHost {
  private plugins: Plugin[] = [];

  // Callbacks
  private onLoadCbs: { filter: RegExp; callback: LoadCallback }[] = [];
  private onPrepareCbs: ((groups: RequestGroup[]) => Promise<RequestGroup[]> | RequestGroup[])[] = [];
  private onFetchCbs: FetchTransform[] = [];
  private onRunStartCbs: ((groups: RequestGroup[]) => Promise<void> | void)[] = [];
  private onRunEndCbs: ((summary: RunSummary) => Promise<void> | void)[] = [];
  private onRequestEndCbs: ((record: RequestRecord) => Promise<void> | void)[] = [];
  private onGroupEndCbs: ((group: RequestGroup, result: Result) => Promise<void> | void)[] = [];

  public readonly transport: Transport = new HttpClient({ pluginHost: this });

  public context: ProbeContext = {
    transport: this.transport,
    onLoad: (options, callback) => {
      this.onLoadCbs.push({ filter: options.filter, callback });
    },
    onPrepare: (callback) => {
      this.onPrepareCbs.push(callback);
    },
    onFetch: (callback) => {
      this.onFetchCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.onRunStartCbs.push(callback);
    },
    onRunEnd: (callback) => {
      this.onRunEndCbs.push(callback);
    },
    onRequestEnd: (callback) => {
      this.onRequestEndCbs.push(callback);
    },
    onGroupEnd: (callback) => {
      this.onGroupEndCbs.push(callback);
    },
  };

  constructor(plugins: Plugin[]) {
    this.plugins = plugins;
  }

  public async setup(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.setup(this.context);
    }
  }

  public async loadGroups(path: string): Promise<RequestGroup[]> {
    for (const { filter, callback } of this.onLoadCbs) {
      if (filter.test(path)) {
        const result = await callback({ path });
        return result?.groups || [];
      }
    }
    return [];
  }

  public async prepareGroups(groups: RequestGroup[]): Promise<RequestGroup[]> {
    let result = groups;
    for (const cb of this.onPrepareCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async transformRequest(req: globalThis.Request): Promise<globalThis.Request> {
    let result = req;
    for (const cb of this.onFetchCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatchRunStart(groups: RequestGroup[]): Promise<void> {
    for (const cb of this.onRunStartCbs) await cb(groups);
  }

  public async dispatchRequestEnd(record: RequestRecord): Promise<void> {
    for (const cb of this.onRequestEndCbs) await cb(record);
  }

  public async dispatchGroupEnd(group: RequestGroup, result: Result): Promise<void> {
    for (const cb of this.onGroupEndCbs) await cb(group, result);
  }

  public async dispatchRunEnd(summary: RunSummary): Promise<void> {
    for (const cb of this.onRunEndCbs) await cb(summary);
  }
}
