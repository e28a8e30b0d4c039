export type ProbeStatus = 'success' | 'slow' | 'fail';

export type ArrowKey = 'arrow_up' | 'arrow_down' | 'arrow_left' | 'arrow_right';

export type KeyEvent = ArrowKey | string;

export interface ProbeReply {
  rttMs: number;
}

export type Prober = (host: string, timeoutMs: number) => Promise<ProbeReply | null>;

export interface HostEntry {
  index: number;
  host: string;
}

export interface ProbeObservation {
  type: 'observation';
  index: number;
  host: string;
  sequence: number;
  status: ProbeStatus;
  rttMs?: number;
}

export interface ProbeDone {
  type: 'done';
  index: number;
  host: string;
}

export type ProbeMessage = ProbeObservation | ProbeDone;

export interface HostStats {
  success: number;
  slow: number;
  fail: number;
  total: number;
}

export interface AsnCacheEntry {
  value: string | null;
  fetchedAt: number;
}

export type AsnCache = Map<string, AsnCacheEntry>;

export interface AsnRequest {
  host: string;
  ip: string;
}

export interface AsnResult {
  host: string;
  ip: string;
  asn: string | null;
}

export interface Layout {
  labelWidth: number;
  timelineWidth: number;
  visibleHostCount: number;
}

export interface MultiPingConfig {
  hosts: string[];
  inputFile?: string;
  timeoutMs: number;
  count: number;
  slowThresholdMs: number;
  verbose: boolean;
  asn: boolean;
  pingCommand: string;
  asnTimeoutMs: number;
  asnFailureTtlMs: number;
  asnWorkers: number;
}

export interface HostSummary {
  host: string;
  asn?: string;
  stats: HostStats;
  percentage: number;
  ok: boolean;
}
