import { parseArgs } from 'node:util';
import { MultiPingConfig } from './types';

const DEFAULT_TIMEOUT_SECONDS = 1;
const DEFAULT_COUNT = 4;
const DEFAULT_SLOW_THRESHOLD_MS = 500;
const DEFAULT_ASN_TIMEOUT_MS = 3_000;
const DEFAULT_ASN_FAILURE_TTL_MS = 300_000;
const DEFAULT_ASN_WORKERS = 2;

export const USAGE = `Usage: multiping [options] [hosts...]

Ping multiple hosts concurrently and show a live reachability timeline.

Options:
  -t, --timeout <seconds>       Timeout in seconds for each ping (default: 1)
  -c, --count <n>               Number of ping attempts per host (default: 4)
  -s, --slow-threshold <ms>     Replies at or above this round-trip time are slow (default: 500)
  -v, --verbose                 Print one line per reply instead of the live view
  -f, --input <path>            Input file containing list of hosts (one per line)
  -a, --asn                     Look up the autonomous system of each host
  -h, --help                    Show this help`;

export type ConfigResult =
  | { ok: true; config: MultiPingConfig; help: boolean }
  | { ok: false; error: string };

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function readNumberFlag(
  name: string,
  value: string | undefined,
  fallback: number
): { value: number } | { error: string } {
  if (value === undefined) {
    return { value: fallback };
  }
  const parsed = toNumber(value);
  if (parsed === undefined) {
    return { error: `Invalid value for --${name}: '${value}'` };
  }
  return { value: parsed };
}

const FLAG_OPTIONS = {
  timeout: { type: 'string', short: 't' },
  count: { type: 'string', short: 'c' },
  'slow-threshold': { type: 'string', short: 's' },
  verbose: { type: 'boolean', short: 'v', default: false },
  input: { type: 'string', short: 'f' },
  asn: { type: 'boolean', short: 'a', default: false },
  help: { type: 'boolean', short: 'h', default: false }
} as const;

function parseFlags(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: FLAG_OPTIONS });
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ConfigResult {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;

  const timeout = readNumberFlag('timeout', values.timeout, DEFAULT_TIMEOUT_SECONDS);
  if ('error' in timeout) {
    return { ok: false, error: timeout.error };
  }
  const count = readNumberFlag('count', values.count, DEFAULT_COUNT);
  if ('error' in count) {
    return { ok: false, error: count.error };
  }
  const slowThreshold = readNumberFlag(
    'slow-threshold',
    values['slow-threshold'],
    DEFAULT_SLOW_THRESHOLD_MS
  );
  if ('error' in slowThreshold) {
    return { ok: false, error: slowThreshold.error };
  }

  if (!Number.isInteger(count.value) || count.value <= 0) {
    return { ok: false, error: 'Count must be a positive number.' };
  }
  if (timeout.value <= 0) {
    return { ok: false, error: 'Timeout must be a positive number.' };
  }
  if (slowThreshold.value < 0) {
    return { ok: false, error: 'Slow threshold must not be negative.' };
  }

  return {
    ok: true,
    help: values.help ?? false,
    config: {
      hosts: positionals,
      inputFile: values.input,
      timeoutMs: timeout.value * 1000,
      count: count.value,
      slowThresholdMs: slowThreshold.value,
      verbose: values.verbose ?? false,
      asn: values.asn ?? false,
      pingCommand: env.MULTIPING_PING_BIN || 'ping',
      asnTimeoutMs: toNumber(env.MULTIPING_ASN_TIMEOUT_MS) ?? DEFAULT_ASN_TIMEOUT_MS,
      asnFailureTtlMs: toNumber(env.MULTIPING_ASN_FAILURE_TTL_MS) ?? DEFAULT_ASN_FAILURE_TTL_MS,
      asnWorkers: Math.max(1, Math.floor(toNumber(env.MULTIPING_ASN_WORKERS) ?? DEFAULT_ASN_WORKERS))
    }
  };
}
