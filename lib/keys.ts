import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { ArrowKey, KeyEvent } from './types';

export const ESC = '\x1b';
export const INTER_BYTE_TIMEOUT_MS = 50;
export const ESCAPE_SEQUENCE_HARD_CAP_MS = 500;

const ARROW_TERMINATORS = new Map<string, ArrowKey>([
  ['A', 'arrow_up'],
  ['B', 'arrow_down'],
  ['C', 'arrow_right'],
  ['D', 'arrow_left']
]);

const EXACT_SEQUENCES = new Map<string, ArrowKey>([
  ['[A', 'arrow_up'],
  ['OA', 'arrow_up'],
  ['[B', 'arrow_down'],
  ['OB', 'arrow_down'],
  ['[C', 'arrow_right'],
  ['OC', 'arrow_right'],
  ['[D', 'arrow_left'],
  ['OD', 'arrow_left']
]);

export interface TimedChar {
  char: string;
  at: number;
}

export type EscapeDecodeResult =
  | { state: 'collecting'; waitMs: number }
  | { state: 'done'; key: ArrowKey | null; consumed: number };

export function parseEscapeSequence(seq: string): ArrowKey | null {
  if (!seq) {
    return null;
  }
  const exact = EXACT_SEQUENCES.get(seq);
  if (exact) {
    return exact;
  }
  const first = seq[0];
  if (first !== '[' && first !== 'O') {
    return null;
  }
  return ARROW_TERMINATORS.get(seq[seq.length - 1]) ?? null;
}

function isCompleteArrow(seq: string): boolean {
  return seq.length >= 2 && (seq[0] === '[' || seq[0] === 'O') && ARROW_TERMINATORS.has(seq[seq.length - 1]);
}

/**
 * Decides what an escape sequence that started at `escAt` has become by `now`.
 *
 * `history` holds the characters that followed ESC with their arrival times.
 * A character only joins the sequence when it arrived within the inter-byte
 * timeout of the previous one and before the hard cap; everything after the
 * first late character is left for the next read.
 */
export function decodeEscape(history: TimedChar[], escAt: number, now: number): EscapeDecodeResult {
  const deadline = escAt + ESCAPE_SEQUENCE_HARD_CAP_MS;
  let lastAt = escAt;
  let seq = '';
  let consumed = 0;

  for (const item of history) {
    const at = Math.max(item.at, lastAt);
    if (at >= deadline || at - lastAt > INTER_BYTE_TIMEOUT_MS) {
      return { state: 'done', key: parseEscapeSequence(seq), consumed };
    }
    seq += item.char;
    consumed += 1;
    lastAt = at;
    if (isCompleteArrow(seq)) {
      return { state: 'done', key: parseEscapeSequence(seq), consumed };
    }
  }

  const waitMs = Math.min(INTER_BYTE_TIMEOUT_MS - (now - lastAt), deadline - now);
  if (waitMs <= 0) {
    return { state: 'done', key: parseEscapeSequence(seq), consumed };
  }
  return { state: 'collecting', waitMs };
}

export class KeyReader {
  private readonly pending: TimedChar[] = [];
  private readonly decoder = new StringDecoder('utf8');
  private notify: (() => void) | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    const at = this.now();
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    for (const char of Array.from(text)) {
      this.pending.push({ char, at });
    }
    const notify = this.notify;
    this.notify = null;
    notify?.();
  };

  constructor(
    private readonly input: Readable,
    private readonly now: () => number = Date.now
  ) {
    input.on('data', this.onData);
  }

  close(): void {
    this.input.off('data', this.onData);
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }

  // Never waits when nothing is buffered; only an ESC makes it wait for the rest of a sequence.
  async readKey(): Promise<KeyEvent | null> {
    const first = this.pending.shift();
    if (!first) {
      return null;
    }
    if (first.char !== ESC) {
      return first.char;
    }

    const escAt = this.now();
    for (;;) {
      const result = decodeEscape(this.pending, escAt, this.now());
      if (result.state === 'done') {
        this.pending.splice(0, result.consumed);
        return result.key ?? ESC;
      }
      await this.waitForData(result.waitMs);
    }
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.notify = null;
        resolve();
      }, timeoutMs);
      this.notify = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
