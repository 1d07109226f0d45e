/**
 * Target Registry
 *
 * Loads the target list from a JSON file and exposes it as a frozen
 * snapshot. A configuration change is applied by loading a new snapshot
 * and handing it to the engine, never by mutating the current one.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { Target } from './types';

const DEFAULT_INTERVAL_SECONDS = 60;
const DEFAULT_TIMEOUT_SECONDS = 5;
const DEFAULT_REPORT_EVERY = 10;

const hostSchema = z
  .string()
  .trim()
  .min(1, 'host must not be empty')
  .refine((host) => !host.startsWith('-'), 'host must not start with "-"')
  .refine((host) => !/\s/.test(host), 'host must not contain whitespace');

const targetSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  host: hostSchema,
  interval: z.number().positive().optional(),
  timeout: z.number().positive().optional(),
});

const targetsFileSchema = z.object({
  ping: z
    .object({
      interval: z.number().positive().default(DEFAULT_INTERVAL_SECONDS),
      timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
    })
    .default({}),
  reporting: z
    .object({
      interval: z.number().int().positive().default(DEFAULT_REPORT_EVERY),
    })
    .default({}),
  targets: z.array(targetSchema).min(1, 'at least one target is required'),
});

export interface TargetRegistry {
  readonly targets: readonly Target[];
  /** Stats snapshot cadence, in probe cycles */
  readonly reportEvery: number;
  get(name: string): Target | undefined;
  names(): string[];
}

export function createTargetRegistry(targets: Target[], reportEvery: number): TargetRegistry {
  const byName = new Map<string, Target>();
  for (const target of targets) {
    if (byName.has(target.name)) {
      throw new ConfigError(`Duplicate target name: ${target.name}`);
    }
    byName.set(target.name, Object.freeze({ ...target }));
  }

  const frozen = Object.freeze([...byName.values()]);

  return Object.freeze({
    targets: frozen,
    reportEvery,
    get: (name: string) => byName.get(name),
    names: () => frozen.map((t) => t.name),
  });
}

/**
 * Validate a parsed targets document. Durations are seconds in the file
 * and milliseconds in memory.
 */
export function parseTargetsFile(raw: unknown): TargetRegistry {
  const parsed = targetsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`Invalid targets file: ${path}${issue.message}`);
  }

  const { ping, reporting, targets } = parsed.data;

  const resolved = targets.map((entry): Target => {
    const intervalMs = Math.round((entry.interval ?? ping.interval) * 1000);
    const timeoutMs = Math.round((entry.timeout ?? ping.timeout) * 1000);

    if (timeoutMs > intervalMs) {
      throw new ConfigError(
        `Target ${entry.name}: timeout (${timeoutMs}ms) exceeds interval (${intervalMs}ms)`
      );
    }

    return { name: entry.name, host: entry.host, intervalMs, timeoutMs };
  });

  return createTargetRegistry(resolved, reporting.interval);
}

export async function loadTargetRegistry(path: string): Promise<TargetRegistry> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read targets file ${path}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Targets file ${path} is not valid JSON: ${reason}`);
  }

  return parseTargetsFile(raw);
}

export interface RegistryDiff {
  added: Target[];
  removed: Target[];
  changed: Target[];
  unchanged: Target[];
}

function sameTarget(a: Target, b: Target): boolean {
  return a.host === b.host && a.intervalMs === b.intervalMs && a.timeoutMs === b.timeoutMs;
}

export function diffRegistries(prev: TargetRegistry, next: TargetRegistry): RegistryDiff {
  const diff: RegistryDiff = { added: [], removed: [], changed: [], unchanged: [] };

  for (const target of next.targets) {
    const before = prev.get(target.name);
    if (!before) {
      diff.added.push(target);
    } else if (sameTarget(before, target)) {
      diff.unchanged.push(target);
    } else {
      diff.changed.push(target);
    }
  }

  for (const target of prev.targets) {
    if (!next.get(target.name)) {
      diff.removed.push(target);
    }
  }

  return diff;
}
