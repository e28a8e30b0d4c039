import { RingBuffer } from './ringBuffer';
import { HostEntry, HostStats, Layout, ProbeObservation, ProbeStatus } from './types';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';
export const HEADER_LINES = 2;

const MIN_LABEL_WIDTH = 10;
const SEPARATOR_WIDTH = 3;

const STATUS_SYMBOLS: Record<ProbeStatus, string> = {
  success: '.',
  slow: '!',
  fail: 'x'
};

const STATUSES: ProbeStatus[] = ['success', 'slow', 'fail'];

type HostBuffer = {
  host: string;
  asn?: string;
  timeline: RingBuffer<string>;
  sequences: Record<ProbeStatus, RingBuffer<number>>;
  stats: HostStats;
};

export interface RenderHeader {
  timeoutMs: number;
  count: number;
}

export function formatHeader(hostCount: number, header: RenderHeader, width = 60): string[] {
  return [
    `MultiPing - Pinging ${hostCount} host(s) with timeout=${header.timeoutMs / 1000}s, count=${header.count}`,
    '-'.repeat(Math.min(60, width))
  ];
}

export function computeLayout(
  hostNames: string[],
  terminalWidth: number,
  terminalHeight: number,
  headerLines: number
): Layout {
  const longest = hostNames.reduce((max, host) => Math.max(max, host.length), 0);
  const labelWidth = Math.min(longest, Math.max(MIN_LABEL_WIDTH, Math.floor(terminalWidth / 3)));
  const timelineWidth = Math.max(1, terminalWidth - labelWidth - SEPARATOR_WIDTH);
  const visibleHostCount = Math.max(1, terminalHeight - headerLines);
  return { labelWidth, timelineWidth, visibleHostCount };
}

// The ASN only shows when it fits in the column sized for host names.
function formatLabel(buffer: HostBuffer, width: number): string {
  const withAsn = buffer.asn ? `${buffer.host} ${buffer.asn}` : buffer.host;
  const text = withAsn.length <= width ? withAsn : buffer.host;
  return text.slice(0, width).padEnd(width);
}

function emptyStats(): HostStats {
  return { success: 0, slow: 0, fail: 0, total: 0 };
}

export class RenderState {
  private readonly buffers: HostBuffer[];
  private offset = 0;

  constructor(
    hosts: HostEntry[],
    private readonly header: RenderHeader,
    initialWidth = 1
  ) {
    this.buffers = hosts.map((entry) => ({
      host: entry.host,
      timeline: new RingBuffer<string>(initialWidth),
      sequences: {
        success: new RingBuffer<number>(initialWidth),
        slow: new RingBuffer<number>(initialWidth),
        fail: new RingBuffer<number>(initialWidth)
      },
      stats: emptyStats()
    }));
  }

  get scrollOffset(): number {
    return this.offset;
  }

  hostNames(): string[] {
    return this.buffers.map((buffer) => buffer.host);
  }

  apply(observation: ProbeObservation): void {
    const buffer = this.buffers[observation.index];
    if (!buffer) {
      return;
    }
    buffer.timeline.push(STATUS_SYMBOLS[observation.status]);
    buffer.sequences[observation.status].push(observation.sequence);
    buffer.stats[observation.status] += 1;
    buffer.stats.total += 1;
  }

  setAsn(index: number, asn: string): void {
    const buffer = this.buffers[index];
    if (buffer) {
      buffer.asn = asn;
    }
  }

  stats(index: number): HostStats | undefined {
    const buffer = this.buffers[index];
    return buffer ? { ...buffer.stats } : undefined;
  }

  asn(index: number): string | undefined {
    return this.buffers[index]?.asn;
  }

  timeline(index: number): string {
    return this.buffers[index]?.timeline.toArray().join('') ?? '';
  }

  sequences(index: number, status: ProbeStatus): number[] {
    return this.buffers[index]?.sequences[status].toArray() ?? [];
  }

  capacities(index: number): number[] {
    const buffer = this.buffers[index];
    if (!buffer) {
      return [];
    }
    return [buffer.timeline.capacity, ...STATUSES.map((status) => buffer.sequences[status].capacity)];
  }

  resizeBuffers(timelineWidth: number): void {
    for (const buffer of this.buffers) {
      if (buffer.timeline.capacity !== timelineWidth) {
        buffer.timeline.resize(timelineWidth);
      }
      for (const status of STATUSES) {
        if (buffer.sequences[status].capacity !== timelineWidth) {
          buffer.sequences[status].resize(timelineWidth);
        }
      }
    }
  }

  scroll(delta: number, visibleHostCount = 1): void {
    const maxOffset = Math.max(0, this.buffers.length - visibleHostCount);
    this.offset = Math.min(maxOffset, Math.max(0, this.offset + delta));
  }

  render(terminalWidth: number, terminalHeight: number): string {
    const layout = computeLayout(this.hostNames(), terminalWidth, terminalHeight, HEADER_LINES);
    this.resizeBuffers(layout.timelineWidth);
    this.scroll(0, layout.visibleHostCount);

    const lines = formatHeader(this.buffers.length, this.header, terminalWidth);

    const visible = this.buffers.slice(this.offset, this.offset + layout.visibleHostCount);
    for (const buffer of visible) {
      const label = formatLabel(buffer, layout.labelWidth);
      const timeline = buffer.timeline.toArray().join('').padStart(layout.timelineWidth);
      lines.push(`${label} | ${timeline}`);
    }

    const hidden = this.buffers.length - visible.length;
    if (hidden > 0) {
      lines.push(`(${hidden} more not shown)`);
    }

    return `${CLEAR_SCREEN}${lines.join('\n')}\n`;
  }
}
