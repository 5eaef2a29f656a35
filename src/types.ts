import type { Request } from './request.js';
import type { RequestGroup } from './request-group.js';
import type { Result } from './result.js';

export interface RequestRecord {
  groupName: string;
  requestId: string;
  method: string;
  url: string;
  result: Result;
  /** Milliseconds from the start of the request until its final result */
  latency: number;
}

export interface GroupRecord {
  group: RequestGroup;
  result: Result;
}

export interface RunSummary {
  results: RequestRecord[];
  groups: GroupRecord[];
  /** Groups that ended early on a skip */
  skippedGroups: GroupRecord[];
  passed: boolean;
}

export type RequestObserver = (request: Request, result: Result) => Promise<void> | void;
