import { describe, expect, it } from '@jest/globals';
import { CLEAR_SCREEN, HEADER_LINES, RenderState, computeLayout } from './renderState';
import { HostEntry, ProbeStatus } from './types';

const HEADER = { timeoutMs: 1000, count: 4 };

function entries(...hosts: string[]): HostEntry[] {
  return hosts.map((host, index) => ({ index, host }));
}

function observe(state: RenderState, index: number, statuses: ProbeStatus[]): void {
  statuses.forEach((status, i) => {
    state.apply({
      type: 'observation',
      index,
      host: `host-${index}`,
      sequence: i + 1,
      status,
      rttMs: status === 'fail' ? undefined : 10
    });
  });
}

describe('computeLayout', () => {
  it('caps the label column at the longest host name', () => {
    expect(computeLayout(['a.test', 'host-07'], 80, 24, 2)).toEqual({
      labelWidth: 7,
      timelineWidth: 70,
      visibleHostCount: 22
    });
  });

  it('caps long names at a third of the terminal width', () => {
    expect(computeLayout(['x'.repeat(40)], 90, 10, 2)).toEqual({
      labelWidth: 30,
      timelineWidth: 57,
      visibleHostCount: 8
    });
  });

  it('keeps at least one timeline column and one row', () => {
    expect(computeLayout(['abcdefghij'], 12, 2, 2)).toEqual({
      labelWidth: 10,
      timelineWidth: 1,
      visibleHostCount: 1
    });
  });
});

describe('RenderState', () => {
  it('keeps counters consistent with every applied observation', () => {
    const state = new RenderState(entries('a.test'), HEADER, 10);

    observe(state, 0, ['success', 'slow', 'fail', 'success']);

    expect(state.stats(0)).toEqual({ success: 2, slow: 1, fail: 1, total: 4 });
    expect(state.timeline(0)).toBe('.!x.');
    expect(state.sequences(0, 'success')).toEqual([1, 4]);
    expect(state.sequences(0, 'slow')).toEqual([2]);
    expect(state.sequences(0, 'fail')).toEqual([3]);
  });

  it('resizes every ring to the timeline width and keeps the newest entries', () => {
    const state = new RenderState(entries('a.test', 'b.test'), HEADER, 5);
    observe(state, 0, ['success', 'success', 'fail', 'slow', 'success']);

    state.resizeBuffers(3);

    expect(state.capacities(0)).toEqual([3, 3, 3, 3]);
    expect(state.capacities(1)).toEqual([3, 3, 3, 3]);
    expect(state.timeline(0)).toBe('x!.');
    expect(state.sequences(0, 'success')).toEqual([1, 2, 5]);

    state.resizeBuffers(8);

    expect(state.capacities(0)).toEqual([8, 8, 8, 8]);
    expect(state.timeline(0)).toBe('x!.');
  });

  it('renders a cleared frame with a padded label and right-justified timeline', () => {
    const state = new RenderState(entries('alpha', 'beta'), HEADER);
    state.render(20, 24);
    observe(state, 0, ['success', 'fail']);

    expect(state.render(20, 24)).toBe(
      CLEAR_SCREEN +
        'MultiPing - Pinging 2 host(s) with timeout=1s, count=4\n' +
        `${'-'.repeat(20)}\n` +
        `alpha | ${'.x'.padStart(12)}\n` +
        `beta  | ${' '.repeat(12)}\n`
    );
  });

  it('reports hosts that do not fit and scrolls within the host list', () => {
    const state = new RenderState(entries('h1', 'h2', 'h3'), HEADER);

    const frame = state.render(30, HEADER_LINES + 2).split('\n');
    expect(frame[2].startsWith('h1 |')).toBe(true);
    expect(frame[3].startsWith('h2 |')).toBe(true);
    expect(frame[4]).toBe('(1 more not shown)');

    state.scroll(5, 2);
    expect(state.scrollOffset).toBe(1);
    const scrolled = state.render(30, HEADER_LINES + 2).split('\n');
    expect(scrolled[2].startsWith('h2 |')).toBe(true);
    expect(scrolled[3].startsWith('h3 |')).toBe(true);

    state.scroll(-3, 2);
    expect(state.scrollOffset).toBe(0);
  });

  it('sizes the label column from host names and drops an ASN that does not fit', () => {
    const state = new RenderState(entries('dns.example.test'), HEADER);
    state.setAsn(0, 'AS64500');

    const frame = state.render(36, 10).split('\n');

    expect(state.hostNames()).toEqual(['dns.example.test']);
    expect(frame[2]).toBe(`dns.example. | ${' '.repeat(21)}`);
  });

  it('shows the ASN after the host when it fits in the column', () => {
    const state = new RenderState(entries('a.test', 'long-name.test'), HEADER);
    state.setAsn(0, 'AS64500');

    const frame = state.render(60, 10).split('\n');

    expect(frame[2]).toBe(`a.test AS64500 | ${' '.repeat(43)}`);
    expect(frame[3]).toBe(`long-name.test | ${' '.repeat(43)}`);
  });

  it('keeps the timeline width and history when an ASN arrives', () => {
    const state = new RenderState(entries('a.test'), HEADER);
    state.render(80, 24);
    observe(state, 0, Array.from({ length: 74 }, (): ProbeStatus => 'success'));

    state.render(80, 24);
    state.setAsn(0, 'AS64500');
    const frame = state.render(80, 24).split('\n');

    expect(state.capacities(0)).toEqual([71, 71, 71, 71]);
    expect(state.timeline(0)).toBe('.'.repeat(71));
    expect(frame[2]).toBe(`a.test | ${'.'.repeat(71)}`);
  });
});
