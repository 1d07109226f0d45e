import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../src/errors';
import {
  createTargetRegistry,
  diffRegistries,
  loadTargetRegistry,
  parseTargetsFile,
} from '../src/targets';
import type { Target } from '../src/types';

describe('parseTargetsFile', () => {
  it('should convert seconds to milliseconds and apply per-target overrides', () => {
    const registry = parseTargetsFile({
      ping: { interval: 10, timeout: 2 },
      reporting: { interval: 5 },
      targets: [
        { name: 'router', host: '192.0.2.1' },
        { name: 'api', host: 'api.example.test', interval: 0.5, timeout: 0.25 },
      ],
    });

    expect(registry.targets).toEqual([
      { name: 'router', host: '192.0.2.1', intervalMs: 10000, timeoutMs: 2000 },
      { name: 'api', host: 'api.example.test', intervalMs: 500, timeoutMs: 250 },
    ]);
    expect(registry.reportEvery).toBe(5);
  });

  it('should fall back to default ping and reporting settings', () => {
    const registry = parseTargetsFile({ targets: [{ name: 'router', host: '192.0.2.1' }] });

    expect(registry.targets[0]).toEqual({
      name: 'router',
      host: '192.0.2.1',
      intervalMs: 60000,
      timeoutMs: 5000,
    });
    expect(registry.reportEvery).toBe(10);
  });

  it('should trim names and hosts', () => {
    const registry = parseTargetsFile({ targets: [{ name: ' router ', host: ' 192.0.2.1 ' }] });
    expect(registry.names()).toEqual(['router']);
    expect(registry.get('router')?.host).toBe('192.0.2.1');
  });

  it('should reject an empty target list', () => {
    expect(() => parseTargetsFile({ targets: [] })).toThrow(
      'Invalid targets file: targets: at least one target is required'
    );
  });

  it('should reject hosts that look like command-line options', () => {
    expect(() => parseTargetsFile({ targets: [{ name: 'bad', host: '-c' }] })).toThrow(
      'Invalid targets file: targets.0.host: host must not start with "-"'
    );
  });

  it('should reject hosts containing whitespace', () => {
    expect(() => parseTargetsFile({ targets: [{ name: 'bad', host: 'a b' }] })).toThrow(
      'Invalid targets file: targets.0.host: host must not contain whitespace'
    );
  });

  it('should reject a timeout longer than the interval', () => {
    expect(() =>
      parseTargetsFile({ targets: [{ name: 'slow', host: '192.0.2.9', interval: 1, timeout: 2 }] })
    ).toThrow('Target slow: timeout (2000ms) exceeds interval (1000ms)');
  });

  it('should reject duplicate names', () => {
    expect(() =>
      parseTargetsFile({
        targets: [
          { name: 'router', host: '192.0.2.1' },
          { name: 'router', host: '192.0.2.2' },
        ],
      })
    ).toThrow(ConfigError);
  });
});

describe('createTargetRegistry', () => {
  it('should return a frozen snapshot', () => {
    const source: Target[] = [{ name: 'a', host: '192.0.2.1', intervalMs: 1000, timeoutMs: 500 }];
    const registry = createTargetRegistry(source, 3);

    source[0].host = '192.0.2.99';
    expect(registry.get('a')?.host).toBe('192.0.2.1');
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.targets)).toBe(true);
    expect(Object.isFrozen(registry.targets[0])).toBe(true);
  });

  it('should name the duplicate', () => {
    const target: Target = { name: 'a', host: '192.0.2.1', intervalMs: 1000, timeoutMs: 500 };
    expect(() => createTargetRegistry([target, target], 1)).toThrow('Duplicate target name: a');
  });
});

describe('loadTargetRegistry', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pingit-targets-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a targets file from disk', async () => {
    const file = path.join(dir, 'targets.json');
    await fs.writeFile(
      file,
      JSON.stringify({ ping: { interval: 30 }, targets: [{ name: 'dns', host: '192.0.2.53' }] })
    );

    const registry = await loadTargetRegistry(file);
    expect(registry.targets).toEqual([
      { name: 'dns', host: '192.0.2.53', intervalMs: 30000, timeoutMs: 5000 },
    ]);
  });

  it('should fail with a config error when the file is missing', async () => {
    const file = path.join(dir, 'missing.json');
    await expect(loadTargetRegistry(file)).rejects.toThrow(`Cannot read targets file ${file}`);
  });

  it('should fail with a config error on malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "targets": [');

    await expect(loadTargetRegistry(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadTargetRegistry(file)).rejects.toThrow(`Targets file ${file} is not valid JSON`);
  });
});

describe('diffRegistries', () => {
  it('should split targets into added, removed, changed and unchanged', () => {
    const prev = createTargetRegistry(
      [
        { name: 'a', host: '192.0.2.1', intervalMs: 1000, timeoutMs: 500 },
        { name: 'b', host: '192.0.2.2', intervalMs: 1000, timeoutMs: 500 },
        { name: 'c', host: '192.0.2.3', intervalMs: 1000, timeoutMs: 500 },
      ],
      10
    );
    const next = createTargetRegistry(
      [
        { name: 'a', host: '192.0.2.1', intervalMs: 1000, timeoutMs: 500 },
        { name: 'b', host: '192.0.2.2', intervalMs: 2000, timeoutMs: 500 },
        { name: 'd', host: '192.0.2.4', intervalMs: 1000, timeoutMs: 500 },
      ],
      10
    );

    const diff = diffRegistries(prev, next);
    expect(diff.added.map((t) => t.name)).toEqual(['d']);
    expect(diff.removed.map((t) => t.name)).toEqual(['c']);
    expect(diff.changed.map((t) => t.name)).toEqual(['b']);
    expect(diff.unchanged.map((t) => t.name)).toEqual(['a']);
  });
});
