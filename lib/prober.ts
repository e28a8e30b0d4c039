import { spawn } from 'node:child_process';
import { ProbeReply, Prober } from './types';

const KILL_GRACE_MS = 1_000;

export interface PingProberOptions {
  command?: string;
}

export function parseLatencyMs(text: string): number | undefined {
  const match = text.match(/time[=<]\s*([0-9]+(?:\.[0-9]+)?)\s*(ms|µs|μs|us)\b/i);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  if (!Number.isFinite(value)) {
    return undefined;
  }

  const unit = match[2].toLowerCase();
  const valueMs = unit === 'ms' ? Number(value.toFixed(2)) : Number((value / 1000).toFixed(3));
  return Number.isFinite(valueMs) ? valueMs : undefined;
}

function buildPingArgs(host: string, timeoutMs: number): string[] {
  const waitSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ['-n', '-c', '1', '-W', String(waitSeconds), host];
}

export function createPingProber(options: PingProberOptions = {}): Prober {
  const command = options.command || 'ping';

  return (host: string, timeoutMs: number) =>
    new Promise<ProbeReply | null>((resolve) => {
      const startedAt = Date.now();
      let stdout = '';
      let settled = false;

      const child = spawn(command, buildPingArgs(host, timeoutMs), {
        shell: false,
        stdio: ['ignore', 'pipe', 'ignore'],
        env: process.env
      });

      const timer = setTimeout(() => {
        child.kill('SIGTERM');
        finish(null);
      }, timeoutMs + KILL_GRACE_MS);

      const finish = (reply: ProbeReply | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(reply);
      };

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf8');
      });

      child.on('error', () => {
        finish(null);
      });

      child.on('close', (code: number | null) => {
        if (code !== 0) {
          finish(null);
          return;
        }
        const rttMs = parseLatencyMs(stdout) ?? Date.now() - startedAt;
        // -W only takes whole seconds, so a reply can land past the attempt timeout.
        finish(rttMs > timeoutMs ? null : { rttMs });
      });
    });
}
