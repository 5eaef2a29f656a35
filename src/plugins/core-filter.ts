import type { CliConfig } from '../config.js';
import type { Plugin } from '../plugin-api.js';
import type { RequestGroup } from '../request-group.js';

export function filterGroupsByName(groups: RequestGroup[], pattern?: string): RequestGroup[] {
  if (!pattern) {
    return groups;
  }
  const regex = new RegExp(pattern, 'i');
  return groups.filter((group) => regex.test(group.getName()));
}

export const coreFilterPlugin = (cfg: Pick<CliConfig, 'filter'>): Plugin => ({
  name: 'core-filter',
  setup(ctx) {
    ctx.onPrepare((groups) => filterGroupsByName(groups, cfg.filter));
  },
});
