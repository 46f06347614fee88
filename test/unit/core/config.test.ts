import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    globalDir = mkdtempSync(join(tmpdir(), 'ledgersched-global-'));
    projectDir = mkdtempSync(join(tmpdir(), 'ledgersched-project-'));
  });

  afterEach(() => {
    rmSync(globalDir, { recursive: true, force: true });
    rmSync(projectDir, { recursive: true, force: true });
  });

  function manager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager(projectDir, { globalDir, env });
  }

  it('loads defaults when no files or env vars exist', () => {
    const config = manager().load();
    expect(config.vm.capacity).toEqual({ cpu: 500, mem: 250, io: 300, bw: 20 });
    expect(config.vm.count).toBe(4);
    expect(config.blockchain).toEqual({
      alpha: 0.7,
      beta: 0.3,
      epsilon: 1e-6,
      historyWindow: 10,
      blockSize: 5,
    });
    expect(config.ui.verbose).toBe(false);
  });

  it('layers project config over global config', () => {
    writeFileSync(join(globalDir, 'config.yaml'), 'blockchain:\n  blockSize: 8\n  alpha: 0.5\n');
    writeFileSync(join(projectDir, '.ledgersched.yaml'), 'blockchain:\n  blockSize: 3\n');

    const config = manager().load();
    expect(config.blockchain.blockSize).toBe(3);
    expect(config.blockchain.alpha).toBe(0.5);
    expect(config.blockchain.beta).toBe(0.3);
  });

  it('applies environment variables over files', () => {
    writeFileSync(join(projectDir, '.ledgersched.yaml'), 'blockchain:\n  blockSize: 3\n');

    const config = manager({ LEDGERSCHED_BLOCK_SIZE: '7', LEDGERSCHED_BETA: '0.1' }).load();
    expect(config.blockchain.blockSize).toBe(7);
    expect(config.blockchain.beta).toBe(0.1);
  });

  it('applies explicit overrides last', () => {
    const config = manager({ LEDGERSCHED_BLOCK_SIZE: '7' }).load({
      blockchain: { blockSize: 2 },
      vm: { capacity: { cpu: 16 } },
    });
    expect(config.blockchain.blockSize).toBe(2);
    expect(config.vm.capacity).toEqual({ cpu: 16, mem: 250, io: 300, bw: 20 });
  });

  it('caches the loaded config in get()', () => {
    const m = manager();
    const first = m.load({ vm: { count: 2 } });
    expect(m.get()).toBe(first);
  });

  it('throws ConfigError for unparseable YAML', () => {
    writeFileSync(join(projectDir, '.ledgersched.yaml'), 'blockchain: [unclosed\n');
    expect(() => manager().load()).toThrow(ConfigError);
    expect(() => manager().load()).toThrow(/Failed to parse project config/);
  });

  it('throws ConfigError naming the invalid field', () => {
    writeFileSync(join(projectDir, '.ledgersched.yaml'), 'blockchain:\n  blockSize: 0\n');
    expect(() => manager().load()).toThrow(/blockchain\.blockSize/);
  });

  it('rejects non-numeric environment values', () => {
    expect(() => manager({ LEDGERSCHED_ALPHA: 'high' }).load()).toThrow(
      'Environment variable LEDGERSCHED_ALPHA must be numeric, got "high"',
    );
  });

  it('rejects non-positive capacities', () => {
    expect(() => manager().load({ vm: { capacity: { io: 0 } } })).toThrow(/vm\.capacity\.io/);
  });
});
