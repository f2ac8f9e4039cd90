import { availableParallelism } from 'node:os';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';

import { ExportError } from './errors.js';
import type { FilterAction, FilterOp, FilterScope } from './types/index.js';

/** Oldest desktop release whose API serves paginated chats and messages. */
export const MIN_DESKTOP_VERSION = '4.1.244';

const DEFAULT_API_URL = 'http://localhost:23373';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Everything a run needs, resolved once at startup and passed by
 * reference to the components that read it.
 */
export interface ExportConfig {
  apiBaseUrl: string;
  accessToken: string;
  outputDir: string;
  /** Ordered include/exclude steps; empty selects every chat. */
  filters: FilterOp[];
  /** Maximum hydrate calls in flight per chat. Infinity means all at once. */
  hydrateConcurrency: number;
  thumbnailWorkers: number;
  requestTimeoutMs: number;
  /** IANA zone used for the visible message timestamp. */
  timeZone: string;
  checkVersion: boolean;
  minVersion: string;
}

export const USAGE = `Usage: chat-archive <output-dir> [options]

Options:
  --include-account <id>      select every chat of an account
  --exclude-account <id>      drop every chat of an account
  --include-chat <id>         select one chat
  --exclude-chat <id>         drop one chat
  --hydrate-concurrency <n>   cap concurrent attachment downloads per chat
  --thumbnail-workers <n>     thumbnail worker pool size
  --request-timeout <ms>      per-request timeout for the Desktop API
  --time-zone <zone>          IANA zone for displayed timestamps
  --skip-version-check        do not check the desktop version
  -h, --help                  show this help

Environment:
  BEEPER_ACCESS_TOKEN         Desktop API access token (required)
  BEEPER_API_URL              Desktop API base URL (default ${DEFAULT_API_URL})
  LOG_LEVEL                   Pino log level (default: "info")`;

const FILTER_FLAGS: Record<string, { action: FilterAction; scope: FilterScope }> = {
  'include-account': { action: 'include', scope: 'account' },
  'exclude-account': { action: 'exclude', scope: 'account' },
  'include-chat': { action: 'include', scope: 'chat' },
  'exclude-chat': { action: 'exclude', scope: 'chat' },
};

/** Parsed command line, before the environment is consulted. */
export interface CommandLine {
  help: boolean;
  outputDir?: string;
  filters: FilterOp[];
  hydrateConcurrency?: string;
  thumbnailWorkers?: string;
  requestTimeout?: string;
  timeZone?: string;
  skipVersionCheck: boolean;
}

function parseTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    tokens: true,
    options: {
      'include-account': { type: 'string', multiple: true },
      'exclude-account': { type: 'string', multiple: true },
      'include-chat': { type: 'string', multiple: true },
      'exclude-chat': { type: 'string', multiple: true },
      'hydrate-concurrency': { type: 'string' },
      'thumbnail-workers': { type: 'string' },
      'request-timeout': { type: 'string' },
      'time-zone': { type: 'string' },
      'skip-version-check': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

export function parseCommandLine(argv: string[]): CommandLine {
  let parsed: ReturnType<typeof parseTokens>;
  try {
    parsed = parseTokens(argv);
  } catch (err) {
    throw new ExportError('CONFIG_INVALID', err instanceof Error ? err.message : String(err), { cause: err });
  }

  // Filter order matters, so read the tokens rather than the grouped values
  const filters: FilterOp[] = [];
  for (const token of parsed.tokens) {
    if (token.kind !== 'option') continue;
    const flag = FILTER_FLAGS[token.name];
    if (flag && token.value !== undefined) {
      filters.push({ ...flag, value: token.value });
    }
  }

  if (parsed.positionals.length > 1) {
    throw new ExportError('CONFIG_INVALID', `Expected one output directory, got ${parsed.positionals.length} arguments`);
  }

  const { values } = parsed;
  return {
    help: values.help === true,
    outputDir: parsed.positionals[0],
    filters,
    hydrateConcurrency: values['hydrate-concurrency'],
    thumbnailWorkers: values['thumbnail-workers'],
    requestTimeout: values['request-timeout'],
    timeZone: values['time-zone'],
    skipVersionCheck: values['skip-version-check'] === true,
  };
}

function positiveInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ExportError('CONFIG_INVALID', `--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function validTimeZone(zone: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
  } catch (err) {
    throw new ExportError('CONFIG_INVALID', `Unknown time zone "${zone}"`, { cause: err });
  }
  return zone;
}

/**
 * Build the run configuration. Fails with CONFIG_MISSING before anything
 * touches the network when the token or output directory is absent.
 */
export function buildConfig(cli: CommandLine, env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const accessToken = env.BEEPER_ACCESS_TOKEN?.trim();
  if (!accessToken) {
    throw new ExportError('CONFIG_MISSING', 'BEEPER_ACCESS_TOKEN is not set. Create a token in the Desktop API settings.');
  }
  if (!cli.outputDir) {
    throw new ExportError('CONFIG_MISSING', 'No output directory given.');
  }

  return {
    apiBaseUrl: (env.BEEPER_API_URL?.trim() || DEFAULT_API_URL).replace(/\/+$/, ''),
    accessToken,
    outputDir: resolve(cli.outputDir),
    filters: cli.filters,
    hydrateConcurrency: positiveInteger('hydrate-concurrency', cli.hydrateConcurrency, Infinity),
    thumbnailWorkers: positiveInteger('thumbnail-workers', cli.thumbnailWorkers, Math.min(4, availableParallelism())),
    requestTimeoutMs: positiveInteger('request-timeout', cli.requestTimeout, DEFAULT_REQUEST_TIMEOUT_MS),
    timeZone: validTimeZone(cli.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone),
    checkVersion: !cli.skipVersionCheck,
    minVersion: MIN_DESKTOP_VERSION,
  };
}
