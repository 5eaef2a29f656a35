#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

import { type CliConfig, loadConfig } from './config.js';
import { loadGroups, resolveSuitePaths } from './loader.js';
import type { Plugin } from './plugin-api.js';
import { PluginHost } from './plugin-host.js';
import { consoleReporterPlugin } from './plugins/console-reporter.js';
import { coreFilterPlugin } from './plugins/core-filter.js';
import { coreLoaderPlugin } from './plugins/core-loader.js';
import { ResultKind } from './result.js';
import type { GroupRecord, RequestRecord, RunSummary } from './types.js';

export function defaultPlugins(cfg: CliConfig): Plugin[] {
  return [coreLoaderPlugin(cfg), coreFilterPlugin(cfg), consoleReporterPlugin(cfg)];
}

export async function runSuites(cfg: CliConfig, plugins: Plugin[] = defaultPlugins(cfg)): Promise<RunSummary> {
  const host = new PluginHost(plugins);
  await host.setup();

  const suitePaths = await resolveSuitePaths(cfg);
  const groups = await host.prepareGroups(await loadGroups(suitePaths, host));

  await host.dispatchRunStart(groups);

  const results: RequestRecord[] = [];
  const groupRecords: GroupRecord[] = [];

  for (const group of groups) {
    let startTime = Date.now();
    // eslint-disable-next-line no-await-in-loop
    const result = await group.run(async (request, requestResult) => {
      const record: RequestRecord = {
        groupName: group.getName(),
        requestId: request.getId(),
        method: request.getMethod(),
        url: request.getUrl(),
        result: requestResult,
        latency: Date.now() - startTime,
      };
      results.push(record);
      await host.dispatchRequestEnd(record);
      startTime = Date.now();
    });
    groupRecords.push({ group, result });
    // eslint-disable-next-line no-await-in-loop
    await host.dispatchGroupEnd(group, result);
  }

  const summary: RunSummary = {
    results,
    groups: groupRecords,
    skippedGroups: groupRecords.filter((g) => g.result.kind === ResultKind.Skip),
    passed: results.every(
      (r) => r.result.kind !== ResultKind.Failure && r.result.kind !== ResultKind.Error
    ),
  };

  await host.dispatchRunEnd(summary);
  return summary;
}

async function main(): Promise<void> {
  const cfg = await loadConfig(process.argv);
  const summary = await runSuites(cfg);
  process.exit(summary.passed ? 0 : 1);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main().catch((error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
