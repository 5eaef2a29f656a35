import { readdir } from 'fs/promises';
import path from 'path';
import type { CliConfig } from './config.js';
import { SuiteLoadError } from './errors.js';
import type { PluginHost } from './plugin-host.js';
import type { RequestGroup } from './request-group.js';

export async function resolveSuitePaths(
  cfg: Pick<CliConfig, 'projectRoot' | 'suiteFile' | 'testDir' | 'filePattern'>
): Promise<string[]> {
  if (cfg.suiteFile) {
    return [path.resolve(cfg.projectRoot, cfg.suiteFile)];
  }

  const testDir = path.resolve(cfg.projectRoot, cfg.testDir);
  let files: string[];
  try {
    files = await readdir(testDir);
  } catch (error) {
    throw new SuiteLoadError(testDir, 'cannot list test directory', { cause: error });
  }
  const pattern = new RegExp(cfg.filePattern);
  return files
    .filter((f) => pattern.test(f))
    .sort()
    .map((f) => path.join(testDir, f));
}

export async function loadGroups(paths: string[], host: PluginHost): Promise<RequestGroup[]> {
  const groups: RequestGroup[] = [];
  for (const p of paths) {
    // eslint-disable-next-line no-await-in-loop
    const loaded = await host.loadGroups(p);
    groups.push(...loaded);
  }
  return groups;
}
