import { readFile } from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import { load as parseYaml } from 'js-yaml';
import type { CliConfig } from '../config.js';
import { SuiteLoadError } from '../errors.js';
import { repeatUntilStatus, skipUnlessStatus } from '../helpers.js';
import type { Transport } from '../http-client.js';
import type { Plugin } from '../plugin-api.js';
import { request as createRequest, type Request } from '../request.js';
import { RequestGroup } from '../request-group.js';
import { type RequestEntry, formatZodError, suiteSchema } from '../suite-schema.js';

export const SUITE_FILE_FILTER = /\.(suite|probe)\.(js|mjs|ts|json|yaml|yml)$/;

export type RequestDefaults = Pick<CliConfig, 'baseUrl' | 'timeout' | 'iterations' | 'sleep'>;

function suiteNameFromPath(filePath: string): string {
  const parsed = path.parse(path.basename(filePath));
  return parsed.name.replace(/\.(suite|probe)$/, '');
}

function resolveUrl(filePath: string, url: string, baseUrl: string): string {
  if (url === '') return url;
  try {
    return new URL(url, baseUrl).toString();
  } catch (error) {
    throw new SuiteLoadError(filePath, `cannot resolve url ${url} against ${baseUrl}`, { cause: error });
  }
}

export function buildRequest(
  filePath: string,
  entry: RequestEntry,
  defaults: RequestDefaults,
  transport: Transport
): Request {
  const req = createRequest(entry.method.toUpperCase(), resolveUrl(filePath, entry.url, defaults.baseUrl))
    .transport(transport)
    .timeout(entry.timeout ?? defaults.timeout)
    .iterations(entry.iterations ?? defaults.iterations)
    .sleep(entry.sleep ?? defaults.sleep);

  if (entry.id) req.id(entry.id);

  for (const [key, value] of Object.entries(entry.headers || {})) {
    const values = Array.isArray(value) ? value : [value];
    values.forEach((v) => req.header(key, v));
  }

  if (entry.basicAuth) {
    req.basicAuth(entry.basicAuth.username, entry.basicAuth.password);
  }

  if (typeof entry.body === 'string') {
    req.body(entry.body);
  } else if (entry.body) {
    req.body(JSON.stringify(entry.body.json ?? null));
    if (!Object.keys(entry.headers || {}).some((h) => h.toLowerCase() === 'content-type')) {
      req.header('Content-Type', 'application/json');
    }
  }

  if (entry.expect?.status !== undefined) req.statusCode(entry.expect.status);
  if (entry.expect?.body === 'empty') req.bodyIsEmpty();
  if (entry.expect?.body === 'json') req.bodyIsJson();

  if (entry.until) req.test(repeatUntilStatus(entry.until.status));
  if (entry.skipGroupUnless) req.test(skipUnlessStatus(entry.skipGroupUnless.status));

  return req;
}

async function readDocument(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new SuiteLoadError(filePath, 'cannot read suite file', { cause: error });
  }
  try {
    return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SuiteLoadError(filePath, `cannot parse suite file: ${reason}`, { cause: error });
  }
}

async function loadDeclarativeSuite(
  filePath: string,
  defaults: RequestDefaults,
  transport: Transport
): Promise<RequestGroup> {
  const data = await readDocument(filePath);
  const parsed = suiteSchema.safeParse(Array.isArray(data) ? { requests: data } : data);
  if (!parsed.success) {
    throw new SuiteLoadError(filePath, formatZodError(parsed.error));
  }

  const suite = parsed.data;
  const group = new RequestGroup().name(suite.name || suiteNameFromPath(filePath));
  if (suite.id) group.id(suite.id);
  suite.requests.forEach((entry) => {
    group.addRequest(buildRequest(filePath, entry, defaults, transport));
  });
  return group;
}

async function loadScriptSuite(filePath: string): Promise<RequestGroup[]> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(filePath).href);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SuiteLoadError(filePath, `cannot import suite module: ${reason}`, { cause: error });
  }
  const exported =
    typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
  const candidates: unknown[] = Array.isArray(exported) ? exported : [exported];
  const groups = candidates.filter((c): c is RequestGroup => c instanceof RequestGroup);
  if (groups.length === 0 || groups.length !== candidates.length) {
    throw new SuiteLoadError(filePath, 'default export must be a RequestGroup or an array of them');
  }
  groups.forEach((group) => {
    if (group.getName() === group.getId()) group.name(suiteNameFromPath(filePath));
  });
  return groups;
}

export const coreLoaderPlugin = (cfg: RequestDefaults): Plugin => ({
  name: 'core-loader',
  setup(ctx) {
    ctx.onLoad({ filter: SUITE_FILE_FILTER }, async ({ path: filePath }) => {
      if (/\.(js|mjs|ts)$/.test(filePath)) {
        return { groups: await loadScriptSuite(filePath) };
      }
      const group = await loadDeclarativeSuite(filePath, cfg, ctx.transport);
      return { groups: [group] };
    });
  },
});
