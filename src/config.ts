import path from 'path';
import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import defaultConfig from './default.config.js';
import { ConfigError } from './errors.js';
import { formatZodError } from './suite-schema.js';

export interface CliConfig {
  configFile?: string;
  baseUrl: string;
  testDir: string;
  filePattern: string;
  timeout: number;
  iterations: number;
  sleep: number;
  filter: string;
  verbose: boolean;
  suiteFile?: string;
  projectRoot: string;
}

export const PROJECT_CONFIG_FILE = 'httpprobe.config.js';

const configModuleSchema = z
  .object({
    baseUrl: z.string().url(),
    testDir: z.string(),
    filePattern: z.string(),
    timeout: z.number().positive(),
    iterations: z.number().int().positive(),
    sleep: z.number().nonnegative(),
    filter: z.string(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

type ConfigOverrides = z.infer<typeof configModuleSchema>;

function parseNumber(key: string, value: string | undefined): number {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${key} expects a number, received ${value ?? 'nothing'}`);
  }
  return parsed;
}

function parseBounded(key: string, value: string | undefined, schema: z.ZodNumber, expected: string): number {
  const parsed = parseNumber(key, value);
  if (!schema.safeParse(parsed).success) {
    throw new ConfigError(`--${key} expects ${expected}, received ${value ?? 'nothing'}`);
  }
  return parsed;
}

function parseBoolean(key: string, value: string | undefined): boolean {
  if (value === undefined || value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigError(`--${key} expects true or false, received ${value}`);
}

export function parseArgs(argv: string[]): Partial<CliConfig> {
  const args = argv.slice(2);
  const raw: Partial<CliConfig> = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      let [key, value] = arg.slice(2).split('=');
      if (typeof value === 'undefined' && key !== 'verbose') {
        const next = args[i + 1];
        if (next && !next.startsWith('--')) {
          value = next;
          i += 1;
        }
      }
      switch (key) {
        case 'config':
          raw.configFile = value;
          break;
        case 'base-url':
          raw.baseUrl = value;
          break;
        case 'test-dir':
          raw.testDir = value;
          break;
        case 'file-pattern':
          raw.filePattern = value;
          break;
        case 'timeout':
          raw.timeout = parseBounded(key, value, configModuleSchema.shape.timeout.unwrap(), 'a positive number');
          break;
        case 'iterations':
          raw.iterations = parseBounded(key, value, configModuleSchema.shape.iterations.unwrap(), 'a positive integer');
          break;
        case 'sleep':
          raw.sleep = parseBounded(key, value, configModuleSchema.shape.sleep.unwrap(), 'a non negative number');
          break;
        case 'filter':
          raw.filter = value;
          break;
        case 'verbose':
          raw.verbose = parseBoolean(key, value);
          break;
        default:
          throw new ConfigError(`unknown option --${key}`);
      }
    } else if (!raw.suiteFile) {
      raw.suiteFile = arg;
    }
    i += 1;
  }

  const cleaned: Partial<CliConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined) Object.assign(cleaned, { [key]: value });
  }

  return cleaned;
}

async function loadConfigModule(file: string): Promise<ConfigOverrides> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(file).href);
  } catch (error) {
    throw new ConfigError(`failed to load config module ${file}`, { cause: error });
  }
  const exported =
    typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const parsed = configModuleSchema.safeParse(exported);
  if (!parsed.success) {
    throw new ConfigError(`invalid config module ${file}: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfig(argv = process.argv, projectRoot = process.cwd()): Promise<CliConfig> {
  const cliOpts = parseArgs(argv);
  // first load default config.
  let cfg: CliConfig = { ...defaultConfig, projectRoot };

  // then load project config.
  const projectCfgPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
  if (existsSync(projectCfgPath)) {
    cfg = { ...cfg, ...(await loadConfigModule(projectCfgPath)) };
  }

  // then load invocation-time project config.
  if (cliOpts.configFile) {
    cfg = { ...cfg, ...(await loadConfigModule(path.resolve(projectRoot, cliOpts.configFile))) };
  }

  // then apply cli options over the configs.
  cfg = { ...cfg, ...cliOpts, projectRoot };

  return cfg;
}
