import { describe, expect, it } from '@jest/globals';
import { loadConfig, toNumber } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const result = loadConfig(['example.test'], {});

    expect(result).toEqual({
      ok: true,
      help: false,
      config: {
        hosts: ['example.test'],
        inputFile: undefined,
        timeoutMs: 1000,
        count: 4,
        slowThresholdMs: 500,
        verbose: false,
        asn: false,
        pingCommand: 'ping',
        asnTimeoutMs: 3000,
        asnFailureTtlMs: 300000,
        asnWorkers: 2
      }
    });
  });

  it('reads flags and environment overrides', () => {
    const result = loadConfig(
      ['-t', '2.5', '-c', '10', '-s', '150', '-v', '-a', '-f', 'hosts.txt', 'a.test', 'b.test'],
      {
        MULTIPING_PING_BIN: '/usr/bin/ping',
        MULTIPING_ASN_TIMEOUT_MS: '1500',
        MULTIPING_ASN_FAILURE_TTL_MS: 'soon',
        MULTIPING_ASN_WORKERS: '4'
      }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.config).toEqual({
      hosts: ['a.test', 'b.test'],
      inputFile: 'hosts.txt',
      timeoutMs: 2500,
      count: 10,
      slowThresholdMs: 150,
      verbose: true,
      asn: true,
      pingCommand: '/usr/bin/ping',
      asnTimeoutMs: 1500,
      asnFailureTtlMs: 300000,
      asnWorkers: 4
    });
  });

  it('rejects a non-positive count before anything runs', () => {
    expect(loadConfig(['-c', '0', 'a.test'], {})).toEqual({
      ok: false,
      error: 'Count must be a positive number.'
    });
    expect(loadConfig(['--count=-3', 'a.test'], {})).toEqual({
      ok: false,
      error: 'Count must be a positive number.'
    });
  });

  it('rejects non-numeric values and unknown flags', () => {
    expect(loadConfig(['--timeout', 'fast'], {})).toEqual({
      ok: false,
      error: "Invalid value for --timeout: 'fast'"
    });
    expect(loadConfig(['--bogus'], {}).ok).toBe(false);
  });

  it('flags help', () => {
    const result = loadConfig(['-h'], {});

    expect(result.ok && result.help).toBe(true);
  });
});

describe('toNumber', () => {
  it('accepts finite numbers and numeric strings only', () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber('42')).toBe(42);
    expect(toNumber('')).toBeUndefined();
    expect(toNumber('abc')).toBeUndefined();
    expect(toNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});
