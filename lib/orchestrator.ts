import { Channel } from './channel';
import { HostEntry, ProbeMessage, ProbeReply, ProbeStatus, Prober } from './types';

const MAX_CONCURRENT_HOSTS = 10;

export interface ProbeHostsOptions {
  hosts: HostEntry[];
  prober: Prober;
  timeoutMs: number;
  count: number;
  slowThresholdMs: number;
  concurrency?: number;
}

export function classifyReply(reply: ProbeReply | null, slowThresholdMs: number): ProbeStatus {
  if (!reply) {
    return 'fail';
  }
  return reply.rttMs >= slowThresholdMs ? 'slow' : 'success';
}

async function probeOnce(prober: Prober, host: string, timeoutMs: number): Promise<ProbeReply | null> {
  try {
    return await prober(host, timeoutMs);
  } catch {
    // transport failures count as a missed reply for this attempt only
    return null;
  }
}

async function probeHost(
  entry: HostEntry,
  options: ProbeHostsOptions,
  channel: Channel<ProbeMessage>
): Promise<void> {
  for (let sequence = 1; sequence <= options.count; sequence += 1) {
    const reply = await probeOnce(options.prober, entry.host, options.timeoutMs);
    const status = classifyReply(reply, options.slowThresholdMs);
    channel.send({
      type: 'observation',
      index: entry.index,
      host: entry.host,
      sequence,
      status,
      rttMs: status === 'fail' || !reply ? undefined : reply.rttMs
    });
  }
  channel.send({ type: 'done', index: entry.index, host: entry.host });
}

export async function probeHosts(
  options: ProbeHostsOptions,
  channel: Channel<ProbeMessage>
): Promise<void> {
  const limit = Math.min(options.concurrency ?? MAX_CONCURRENT_HOSTS, MAX_CONCURRENT_HOSTS);
  const workerCount = Math.max(1, Math.min(limit, options.hosts.length));
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < options.hosts.length) {
      const entry = options.hosts[cursor];
      cursor += 1;
      await probeHost(entry, options, channel);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i += 1) {
    workers.push(worker());
  }
  await Promise.all(workers);
}
