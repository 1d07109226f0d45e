import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ProbeErrorKind, Target } from './types';

const execFileAsync = promisify(execFile);

// Extra time the ping process gets beyond its own -W deadline before it is killed
const PROCESS_GRACE_MS = 500;

export interface ProbeOutcome {
  success: boolean;
  responseTimeMs?: number;
  errorKind?: ProbeErrorKind;
  message?: string;
}

export type Probe = (target: Target, signal: AbortSignal) => Promise<ProbeOutcome>;

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
  message: string;
  name: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && ('code' in error || 'stdout' in error);
}

const RESOLUTION_PATTERNS = [
  /unknown host/i,
  /name or service not known/i,
  /temporary failure in name resolution/i,
  /cannot resolve/i,
  /no address associated with hostname/i,
  /nodename nor servname provided/i,
];

const UNREACHABLE_PATTERNS = [
  /destination host unreachable/i,
  /destination net unreachable/i,
  /network is unreachable/i,
  /no route to host/i,
];

/**
 * Extract the round-trip time from ping output (`time=12.3 ms`).
 */
export function parseRoundTrip(output: string): number | undefined {
  const match = output.match(/time[=<]\s*([\d.]+)\s*ms/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

export function classifyFailure(output: string, timedOut: boolean): ProbeErrorKind {
  if (RESOLUTION_PATTERNS.some((pattern) => pattern.test(output))) {
    return 'host_resolution_failed';
  }
  if (UNREACHABLE_PATTERNS.some((pattern) => pattern.test(output))) {
    return 'unreachable';
  }
  if (timedOut || /100(\.0)?% packet loss/i.test(output)) {
    return 'timeout';
  }
  return 'unreachable';
}

export function buildPingArgs(target: Target): string[] {
  const waitSeconds = Math.max(1, Math.ceil(target.timeoutMs / 1000));
  return ['-n', '-c', '1', '-W', String(waitSeconds), target.host];
}

/**
 * ICMP echo probe using the system ping binary.
 */
export function createIcmpProbe(binary: string = 'ping'): Probe {
  return async (target, signal) => {
    const startedAt = Date.now();

    try {
      const { stdout } = await execFileAsync(binary, buildPingArgs(target), {
        timeout: target.timeoutMs + PROCESS_GRACE_MS,
        signal,
      });

      const measured = parseRoundTrip(stdout);
      return {
        success: true,
        responseTimeMs: measured ?? Date.now() - startedAt,
      };
    } catch (error) {
      if (!isExecFailure(error)) {
        const message = error instanceof Error ? error.message : String(error);
        return { success: false, errorKind: 'unreachable', message };
      }

      const output = `${error.stdout ?? ''}\n${error.stderr ?? ''}`;
      // Exit code 1 means the host did not answer within the deadline
      const timedOut = error.killed === true || error.name === 'AbortError' || error.code === 1;
      const kind = classifyFailure(output, timedOut);

      const detail = (error.stderr ?? '').trim() || error.message;
      return { success: false, errorKind: kind, message: detail };
    }
  };
}
