import { randomUUID } from 'node:crypto';

import type { Request } from './request.js';
import { Result, ResultKind } from './result.js';
import type { RequestObserver } from './types.js';

/**
 * An ordered batch of requests. Only a `Skip` result changes the outcome of
 * the group; failures and errors of its members are left to the observer.
 */
export class RequestGroup {
  private groupId: string = randomUUID();
  private groupName?: string;
  private requests: Request[] = [];

  public id(id: string): this {
    this.groupId = id;
    return this;
  }

  public name(name: string): this {
    this.groupName = name;
    return this;
  }

  public addRequest(request: Request): this {
    this.requests.push(request);
    return this;
  }

  public getId(): string {
    return this.groupId;
  }

  public getName(): string {
    return this.groupName || this.groupId;
  }

  public getRequests(): readonly Request[] {
    return this.requests;
  }

  public async run(onResult?: RequestObserver): Promise<Result> {
    for (const request of this.requests) {
      // eslint-disable-next-line no-await-in-loop
      const result = await request.run();
      if (onResult) {
        await onResult(request, result);
      }
      if (result.kind === ResultKind.Skip) {
        return Result.skip(`skipped caused by request ${request.getId()}`);
      }
    }

    return Result.success();
  }
}
