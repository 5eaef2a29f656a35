import test from 'node:test';
import assert from 'node:assert/strict';
import { PluginHost } from '../plugin-host.js';
import { coreFilterPlugin, filterGroupsByName } from '../plugins/core-filter.js';
import { RequestGroup } from '../request-group.js';

const groups = () => ['Auth flow', 'health', 'billing'].map((name) => new RequestGroup().name(name));

test('filterGroupsByName keeps everything without a pattern', () => {
  assert.equal(filterGroupsByName(groups(), '').length, 3);
  assert.equal(filterGroupsByName(groups()).length, 3);
});

test('filterGroupsByName matches case-insensitively', () => {
  assert.deepEqual(
    filterGroupsByName(groups(), '^auth|bill').map((g) => g.getName()),
    ['Auth flow', 'billing']
  );
});

test('coreFilterPlugin filters during preparation', async () => {
  const host = new PluginHost([coreFilterPlugin({ filter: 'HEALTH' })]);
  await host.setup();
  const prepared = await host.prepareGroups(groups());
  assert.deepEqual(
    prepared.map((g) => g.getName()),
    ['health']
  );
});
