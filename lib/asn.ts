import { lookup as dnsLookup } from 'node:dns/promises';
import { connect, isIP } from 'node:net';
import { Channel } from './channel';
import { AsnCache, AsnRequest, AsnResult } from './types';

const WHOIS_HOST = 'whois.cymru.com';
const WHOIS_PORT = 43;

const DEFAULT_TIMEOUT_MS = 3_000;
const DEFAULT_MAX_BYTES = 65_536;
const DEFAULT_POLL_MS = 100;

export type AsnLookup = (ip: string, options: ResolveAsnOptions) => Promise<string | null>;

export interface ResolveAsnOptions {
  timeoutMs?: number;
  maxBytes?: number;
}

export interface AsnWorkerOptions {
  timeoutMs: number;
  pollMs?: number;
  lookup?: AsnLookup;
}

export interface AsnResolverOptions {
  workers: number;
  timeoutMs: number;
  failureTtlMs: number;
  pollMs?: number;
  lookup?: AsnLookup;
}

export function parseAsnResponse(text: string): string | null {
  const lines = text.split(/\r?\n/).filter((line) => line.trim());
  if (lines.length < 2) {
    return null;
  }
  const [first] = lines[1].split('|').map((part) => part.trim());
  const asn = (first ?? '').replace(/AS/g, '').trim();
  if (!asn || asn.toUpperCase() === 'NA') {
    return null;
  }
  return `AS${asn}`;
}

export function resolveAsn(ip: string, options: ResolveAsnOptions = {}): Promise<string | null> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  return new Promise<string | null>((resolve) => {
    const chunks: Buffer[] = [];
    let totalRead = 0;
    let settled = false;

    const socket = connect({ host: WHOIS_HOST, port: WHOIS_PORT });

    const finish = (value: string | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      resolve(value);
    };

    const finishWithResponse = (): void => {
      finish(parseAsnResponse(Buffer.concat(chunks).toString('utf8')));
    };

    socket.setTimeout(timeoutMs, () => {
      finish(null);
    });

    socket.on('connect', () => {
      socket.write(` -v ${ip}\n`);
    });

    socket.on('data', (chunk: Buffer) => {
      const slice = chunk.subarray(0, maxBytes - totalRead);
      chunks.push(slice);
      totalRead += slice.length;
      if (totalRead >= maxBytes) {
        finishWithResponse();
      }
    });

    socket.on('error', () => {
      finish(null);
    });

    socket.on('end', finishWithResponse);
    socket.on('close', finishWithResponse);
  });
}

export async function resolveHostAddress(host: string): Promise<string | null> {
  if (isIP(host)) {
    return host;
  }
  try {
    const { address } = await dnsLookup(host);
    return address;
  } catch {
    return null;
  }
}

export function shouldRetryAsn(
  ip: string,
  cache: AsnCache,
  now: number,
  failureTtlMs: number
): boolean {
  const cached = cache.get(ip);
  if (!cached) {
    return true;
  }
  return cached.value === null && now - cached.fetchedAt >= failureTtlMs;
}

export async function runAsnWorker(
  requests: Channel<AsnRequest | null>,
  results: Channel<AsnResult>,
  signal: AbortSignal,
  options: AsnWorkerOptions
): Promise<void> {
  const lookup = options.lookup ?? resolveAsn;
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS;

  while (!signal.aborted) {
    const item = await requests.receive(pollMs);
    if (item === undefined) {
      continue;
    }
    if (item === null) {
      break;
    }
    const asn = await lookup(item.ip, { timeoutMs: options.timeoutMs });
    results.send({ host: item.host, ip: item.ip, asn });
  }
}

export class AsnResolver {
  readonly cache: AsnCache = new Map();
  private readonly requests = new Channel<AsnRequest | null>();
  private readonly results = new Channel<AsnResult>();
  private readonly inFlight = new Set<string>();
  private readonly controller = new AbortController();
  private workers: Promise<void>[] = [];

  constructor(private readonly options: AsnResolverOptions) {}

  start(): void {
    if (this.workers.length > 0) {
      return;
    }
    const count = Math.max(1, this.options.workers);
    for (let i = 0; i < count; i += 1) {
      this.workers.push(
        runAsnWorker(this.requests, this.results, this.controller.signal, {
          timeoutMs: this.options.timeoutMs,
          pollMs: this.options.pollMs,
          lookup: this.options.lookup
        })
      );
    }
  }

  request(host: string, ip: string, now: number): boolean {
    if (this.inFlight.has(ip)) {
      return false;
    }
    if (!shouldRetryAsn(ip, this.cache, now, this.options.failureTtlMs)) {
      return false;
    }
    this.inFlight.add(ip);
    this.requests.send({ host, ip });
    return true;
  }

  // Only drain() writes the cache, so every update happens on the caller's turn.
  drain(now: number): AsnResult[] {
    const drained: AsnResult[] = [];
    let result = this.results.tryReceive();
    while (result) {
      this.cache.set(result.ip, { value: result.asn, fetchedAt: now });
      this.inFlight.delete(result.ip);
      drained.push(result);
      result = this.results.tryReceive();
    }
    return drained;
  }

  async stop(): Promise<void> {
    this.controller.abort();
    for (let i = 0; i < this.workers.length; i += 1) {
      this.requests.send(null);
    }
    await Promise.all(this.workers);
    this.workers = [];
  }
}
