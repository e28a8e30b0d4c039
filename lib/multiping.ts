import { AsnLookup, AsnResolver, resolveHostAddress } from './asn';
import { Channel } from './channel';
import { HostFileResult, readHostFile } from './hosts';
import { KeyReader } from './keys';
import { probeHosts } from './orchestrator';
import { HEADER_LINES, RenderState, formatHeader } from './renderState';
import {
  HostEntry,
  HostSummary,
  MultiPingConfig,
  ProbeMessage,
  ProbeObservation,
  Prober
} from './types';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;
const KEY_POLL_MS = 50;
const SUMMARY_RULE = '='.repeat(60);

export const NO_HOSTS_ERROR =
  'No hosts specified. Provide hosts as arguments or use -f/--input option.';

export interface TerminalOutput {
  write(chunk: string): unknown;
  columns?: number;
  rows?: number;
}

export interface MultiPingDeps {
  prober: Prober;
  output: TerminalOutput;
  readHosts?: (path: string) => HostFileResult;
  resolveAddress?: (host: string) => Promise<string | null>;
  asnLookup?: AsnLookup;
  asnPollMs?: number;
  keys?: KeyReader;
  now?: () => number;
  logError?: (message: string) => void;
}

export type MultiPingResult =
  | { ok: true; summaries: HostSummary[] }
  | { ok: false; error: string };

export function collectHosts(
  config: MultiPingConfig,
  readHosts: (path: string) => HostFileResult,
  logError: (message: string) => void
): string[] {
  const hosts = [...config.hosts];
  if (config.inputFile) {
    const file = readHosts(config.inputFile);
    if (file.error) {
      logError(`Error: ${file.error}`);
    }
    hosts.push(...file.hosts);
  }
  return hosts;
}

export function formatObservation(observation: ProbeObservation): string {
  const seq = `seq=${observation.sequence}`;
  if (observation.status === 'fail') {
    return `No reply from ${observation.host}: ${seq}`;
  }
  const prefix = observation.status === 'slow' ? 'Slow reply' : 'Reply';
  return `${prefix} from ${observation.host}: ${seq} time=${observation.rttMs} ms`;
}

export function summarizeHosts(entries: HostEntry[], state: RenderState): HostSummary[] {
  return entries.map((entry) => {
    const stats = state.stats(entry.index) ?? { success: 0, slow: 0, fail: 0, total: 0 };
    const replies = stats.success + stats.slow;
    return {
      host: entry.host,
      asn: state.asn(entry.index),
      stats,
      percentage: stats.total > 0 ? (replies / stats.total) * 100 : 0,
      ok: replies > 0
    };
  });
}

export function formatSummary(summaries: HostSummary[]): string {
  const lines = ['', SUMMARY_RULE, 'SUMMARY', SUMMARY_RULE];
  for (const summary of summaries) {
    const { stats } = summary;
    const replies = stats.success + stats.slow;
    const asn = summary.asn ? ` ${summary.asn}` : '';
    lines.push(
      `${summary.host.padEnd(30)} ${replies}/${stats.total} replies (${summary.percentage.toFixed(1)}%)` +
        ` success=${stats.success} slow=${stats.slow} fail=${stats.fail}` +
        ` [${summary.ok ? 'OK' : 'FAILED'}]${asn}`
    );
  }
  return `${lines.join('\n')}\n`;
}

export async function runMultiPing(
  config: MultiPingConfig,
  deps: MultiPingDeps
): Promise<MultiPingResult> {
  const logError = deps.logError ?? ((message: string) => console.error(message));
  const now = deps.now ?? Date.now;
  const output = deps.output;

  if (config.count <= 0) {
    return { ok: false, error: 'Count must be a positive number.' };
  }

  const hosts = collectHosts(config, deps.readHosts ?? readHostFile, logError);
  if (hosts.length === 0) {
    return { ok: false, error: NO_HOSTS_ERROR };
  }

  const entries: HostEntry[] = hosts.map((host, index) => ({ index, host }));
  const state = new RenderState(entries, { timeoutMs: config.timeoutMs, count: config.count });
  const channel = new Channel<ProbeMessage>();
  const addresses = new Map<number, string>();

  const resolver = config.asn
    ? new AsnResolver({
        workers: config.asnWorkers,
        timeoutMs: config.asnTimeoutMs,
        failureTtlMs: config.asnFailureTtlMs,
        pollMs: deps.asnPollMs,
        lookup: deps.asnLookup
      })
    : null;

  const requestAsn = (entry: HostEntry): void => {
    const ip = addresses.get(entry.index);
    if (!resolver || !ip || state.asn(entry.index)) {
      return;
    }
    resolver.request(entry.host, ip, now());
  };

  const applyAsnResults = (): void => {
    if (!resolver) {
      return;
    }
    for (const result of resolver.drain(now())) {
      if (!result.asn) {
        continue;
      }
      for (const entry of entries) {
        if (addresses.get(entry.index) === result.ip) {
          state.setAsn(entry.index, result.asn);
        }
      }
    }
  };

  const rows = (): number => output.rows ?? DEFAULT_ROWS;
  const draw = (): void => {
    if (config.verbose) {
      return;
    }
    output.write(state.render(output.columns ?? DEFAULT_COLUMNS, rows()));
  };

  const pollKeys = async (): Promise<boolean> => {
    if (!deps.keys) {
      return false;
    }
    let moved = false;
    let key = await deps.keys.readKey();
    while (key !== null) {
      const before = state.scrollOffset;
      const visible = Math.max(1, rows() - HEADER_LINES);
      if (key === 'arrow_up') {
        state.scroll(-1, visible);
      } else if (key === 'arrow_down') {
        state.scroll(1, visible);
      }
      moved = moved || state.scrollOffset !== before;
      key = await deps.keys.readKey();
    }
    return moved;
  };

  let addressesReady: Promise<void> = Promise.resolve();
  if (resolver) {
    resolver.start();
    const resolveAddress = deps.resolveAddress ?? resolveHostAddress;
    addressesReady = Promise.all(
      entries.map(async (entry) => {
        const ip = await resolveAddress(entry.host).catch(() => null);
        if (ip) {
          addresses.set(entry.index, ip);
          requestAsn(entry);
        }
      })
    ).then(() => undefined);
  }

  const probing = probeHosts(
    {
      hosts: entries,
      prober: deps.prober,
      timeoutMs: config.timeoutMs,
      count: config.count,
      slowThresholdMs: config.slowThresholdMs
    },
    channel
  );

  if (config.verbose) {
    const header = formatHeader(entries.length, { timeoutMs: config.timeoutMs, count: config.count });
    output.write(`${header.join('\n')}\n`);
  }
  draw();

  const finished = new Set<number>();
  while (finished.size < entries.length) {
    const message = await channel.receive(deps.keys ? KEY_POLL_MS : undefined);
    if (await pollKeys()) {
      draw();
    }
    if (!message) {
      continue;
    }
    if (message.type === 'done') {
      finished.add(message.index);
      continue;
    }

    state.apply(message);
    if (config.verbose) {
      output.write(`${formatObservation(message)}\n`);
    }
    applyAsnResults();
    requestAsn(entries[message.index]);
    draw();
  }

  await probing;
  if (resolver) {
    await addressesReady;
    await resolver.stop();
    applyAsnResults();
  }

  draw();
  const summaries = summarizeHosts(entries, state);
  output.write(formatSummary(summaries));
  return { ok: true, summaries };
}
