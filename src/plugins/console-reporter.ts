import type { CliConfig } from '../config.js';
import type { Plugin } from '../plugin-api.js';
import { type Result, ResultKind } from '../result.js';
import type { RequestRecord } from '../types.js';

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function green(text: string): string {
  return `\u001b[32m${text}\u001b[39m`;
}

function yellow(text: string): string {
  return `\u001b[33m${text}\u001b[39m`;
}

export function resultIcon(result: Result): string {
  switch (result.kind) {
    case ResultKind.Success:
      return '✅';
    case ResultKind.Failure:
      return '❌';
    case ResultKind.Error:
      return '💥';
    case ResultKind.Skip:
      return '⏭️';
    case ResultKind.NoTest:
      return '➖';
    default:
      return '❔';
  }
}

export function formatRecord(record: RequestRecord): string {
  return `  [${resultIcon(record.result)}] ${record.requestId} ${record.method} ${record.url} (${record.latency}ms)`;
}

export const consoleReporterPlugin = (cfg: Pick<CliConfig, 'baseUrl' | 'verbose'>): Plugin => ({
  name: 'console-reporter',
  setup(ctx) {
    let runStartTime = 0;

    ctx.onRunStart((groups) => {
      console.log(`🚀 Probing ${groups.length} groups against ${cfg.baseUrl}`);
      console.log('='.repeat(50));
      runStartTime = Date.now();
    });

    ctx.onRequestEnd((record) => {
      if (cfg.verbose) {
        console.log(formatRecord(record));
      }
    });

    ctx.onRunEnd((summary) => {
      const { results, skippedGroups } = summary;

      const resultsByGroup: Record<string, RequestRecord[]> = {};
      results.forEach((r) => {
        if (!resultsByGroup[r.groupName]) {
          resultsByGroup[r.groupName] = [];
        }
        resultsByGroup[r.groupName].push(r);
      });

      console.log('\n📊 Summary:');
      Object.entries(resultsByGroup).forEach(([group, groupResults]) => {
        console.log(`\n🗂️  Group: ${group}`);
        groupResults.forEach((record) => {
          console.log(formatRecord(record));
          const { kind, description } = record.result;
          if (kind === ResultKind.Failure || kind === ResultKind.Error) {
            console.log(red(`    Reason: ${description}`));
          } else if (kind === ResultKind.NoTest) {
            console.log(yellow('    No assertion or test configured'));
          }
        });
      });

      if (skippedGroups.length > 0) {
        console.log(`\n⏭️  Skipped ${skippedGroups.length} groups:`);
        skippedGroups.forEach(({ group, result }) => {
          console.log(`  - ${group.getName()}: ${result.description}`);
        });
      }

      const passed = results.filter((r) => r.result.kind === ResultKind.Success).length;
      console.log('\n' + '='.repeat(50));
      const tally = `✨ Requests completed: ${passed}/${results.length} passed`;
      console.log(summary.passed ? green(tally) : red(tally));

      const totalTime = Date.now() - runStartTime;
      console.log(`⏱️  Run time: ${(totalTime / 1000).toFixed(2)}s`);
    });
  },
});
