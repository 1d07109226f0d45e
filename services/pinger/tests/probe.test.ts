import { describe, it, expect, beforeEach, vi } from 'vitest';

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ execFile: execFileMock }));

import { buildPingArgs, classifyFailure, createIcmpProbe, parseRoundTrip } from '../src/probe';
import type { Target } from '../src/types';

type ExecCallback = (error: Error | null, result?: { stdout: string; stderr: string }) => void;

const target: Target = { name: 'lan-gw', host: '192.0.2.10', intervalMs: 5000, timeoutMs: 1000 };

const REPLY = [
  'PING 192.0.2.10 (192.0.2.10) 56(84) bytes of data.',
  '64 bytes from 192.0.2.10: icmp_seq=1 ttl=64 time=3.41 ms',
  '',
  '--- 192.0.2.10 ping statistics ---',
  '1 packets transmitted, 1 received, 0% packet loss, time 0ms',
].join('\n');

function execFailure(fields: { code?: number | string; killed?: boolean; stdout?: string; stderr?: string }) {
  return Object.assign(new Error('Command failed: ping'), fields);
}

describe('parseRoundTrip', () => {
  it('should read the reply time', () => {
    expect(parseRoundTrip(REPLY)).toBe(3.41);
  });

  it('should read sub-millisecond replies', () => {
    expect(parseRoundTrip('Reply from 192.0.2.10: bytes=32 time<1ms TTL=128')).toBe(1);
  });

  it('should return undefined without a reply line', () => {
    expect(parseRoundTrip('1 packets transmitted, 0 received, 100% packet loss')).toBeUndefined();
  });
});

describe('classifyFailure', () => {
  it('should detect resolution failures', () => {
    expect(classifyFailure('ping: nohost.invalid: Name or service not known', false)).toBe(
      'host_resolution_failed'
    );
    expect(classifyFailure('ping: cannot resolve nohost.invalid: Unknown host', false)).toBe(
      'host_resolution_failed'
    );
  });

  it('should detect unreachable hosts before treating silence as a timeout', () => {
    expect(classifyFailure('From 192.0.2.1 icmp_seq=1 Destination Host Unreachable', true)).toBe(
      'unreachable'
    );
    expect(classifyFailure('connect: Network is unreachable', false)).toBe('unreachable');
  });

  it('should treat total packet loss as a timeout', () => {
    expect(classifyFailure('1 packets transmitted, 0 received, 100% packet loss', false)).toBe('timeout');
    expect(classifyFailure('1 packets transmitted, 0 packets received, 100.0% packet loss', false)).toBe(
      'timeout'
    );
    expect(classifyFailure('', true)).toBe('timeout');
  });

  it('should fall back to unreachable', () => {
    expect(classifyFailure('ping: socket: Operation not permitted', false)).toBe('unreachable');
  });
});

describe('buildPingArgs', () => {
  it('should send a single echo with the timeout in whole seconds', () => {
    expect(buildPingArgs({ ...target, timeoutMs: 2500 })).toEqual([
      '-n',
      '-c',
      '1',
      '-W',
      '3',
      '192.0.2.10',
    ]);
  });

  it('should wait at least one second', () => {
    expect(buildPingArgs({ ...target, timeoutMs: 200 })[4]).toBe('1');
  });
});

describe('createIcmpProbe', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('should run ping and report the measured time', async () => {
    execFileMock.mockImplementation(
      (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
        callback(null, { stdout: REPLY, stderr: '' });
      }
    );

    const signal = new AbortController().signal;
    const outcome = await createIcmpProbe()(target, signal);

    expect(outcome).toEqual({ success: true, responseTimeMs: 3.41 });
    expect(execFileMock).toHaveBeenCalledWith(
      'ping',
      ['-n', '-c', '1', '-W', '1', '192.0.2.10'],
      { timeout: 1500, signal },
      expect.any(Function)
    );
  });

  it('should report a timeout when ping exits with status 1', async () => {
    execFileMock.mockImplementation(
      (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
        callback(
          execFailure({
            code: 1,
            killed: false,
            stdout: '1 packets transmitted, 0 received, 100% packet loss',
            stderr: '',
          })
        );
      }
    );

    const outcome = await createIcmpProbe()(target, new AbortController().signal);
    expect(outcome).toEqual({
      success: false,
      errorKind: 'timeout',
      message: 'Command failed: ping',
    });
  });

  it('should report resolution failures with the ping error text', async () => {
    execFileMock.mockImplementation(
      (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
        callback(
          execFailure({
            code: 2,
            stdout: '',
            stderr: 'ping: nohost.invalid: Name or service not known\n',
          })
        );
      }
    );

    const outcome = await createIcmpProbe()(target, new AbortController().signal);
    expect(outcome).toEqual({
      success: false,
      errorKind: 'host_resolution_failed',
      message: 'ping: nohost.invalid: Name or service not known',
    });
  });

  it('should report a missing binary as unreachable', async () => {
    execFileMock.mockImplementation(
      (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
        callback(execFailure({ code: 'ENOENT' }));
      }
    );

    const outcome = await createIcmpProbe('/opt/missing/ping')(target, new AbortController().signal);
    expect(outcome.success).toBe(false);
    expect(outcome.errorKind).toBe('unreachable');
    expect(execFileMock.mock.calls[0][0]).toBe('/opt/missing/ping');
  });

  it('should not read process output from an error that carries none', async () => {
    execFileMock.mockImplementation(
      (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
        callback(new Error('spawn failed: 100% packet loss'));
      }
    );

    const outcome = await createIcmpProbe()(target, new AbortController().signal);
    expect(outcome).toEqual({
      success: false,
      errorKind: 'unreachable',
      message: 'spawn failed: 100% packet loss',
    });
  });
});
