/**
 * Unit tests for environment configuration and the file logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function stubValidEnv(): void {
  vi.stubEnv('LOG_LEVEL', 'info');
  vi.stubEnv('Q2S_RANDOM_RUNS', '10');
  vi.stubEnv('Q2S_RANDOM_SEED', '42');
  vi.stubEnv('Q2S_DISTANCE_PRECISION', '3');
  vi.stubEnv('Q2S_MARGIN_PRECISION', '4');
}

describe('config', () => {
  beforeEach(() => {
    vi.resetModules();
    stubValidEnv();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads sweep defaults from the environment', async () => {
    vi.stubEnv('Q2S_RANDOM_RUNS', '25');

    const config = await import('../../../src/shared/config.js');

    expect(config.Q2S_RANDOM_RUNS).toBe(25);
    expect(config.LOG_LEVEL).toBe('INFO');
    expect(config.validateConfig()).toEqual({ valid: true, errors: [] });
  });

  it('reports every invalid setting', async () => {
    vi.stubEnv('Q2S_RANDOM_RUNS', '0');
    vi.stubEnv('Q2S_MARGIN_PRECISION', '12');
    vi.stubEnv('LOG_LEVEL', 'trace');

    const config = await import('../../../src/shared/config.js');

    expect(config.validateConfig()).toEqual({
      valid: false,
      errors: [
        'Q2S_RANDOM_RUNS must be an integer >= 1, got 0',
        'Q2S_MARGIN_PRECISION must be an integer between 0 and 10, got 12',
        "LOG_LEVEL must be 'INFO' or 'DEBUG', got 'TRACE'"
      ]
    });
  });

  it('rejects a non-numeric seed', async () => {
    vi.stubEnv('Q2S_RANDOM_SEED', 'abc');

    const config = await import('../../../src/shared/config.js');

    expect(config.validateConfig().errors).toEqual(['Q2S_RANDOM_SEED must be an integer, got abc']);
  });
});

describe('Q2SLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'q2s-log-'));
    vi.resetModules();
    vi.stubEnv('LOG_PATH', path.join(dir, 'q2s.log'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends timestamped lines to LOG_PATH', async () => {
    const { Q2SLogger } = await import('../../../src/shared/logger.js');
    Q2SLogger.setEnabled(true);

    Q2SLogger.sweepStarted(3, 10, 42);
    Q2SLogger.diagnostics('scenario 2', [{ code: 'empty-candidate-set', message: 'No valid plans for scenario 2' }]);

    const lines = fs.readFileSync(path.join(dir, 'q2s.log'), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Q2S:INFO\] 🚀 SWEEP started scenarios=3 random_runs=10 seed=42$/);
    expect(lines[1]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\] \[Q2S:WARN\] ⚠️ \[scenario 2\] empty-candidate-set: No valid plans for scenario 2$/
    );
  });

  it('writes debug lines only at LOG_LEVEL=DEBUG', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('SUPPRESS_TEST_LOGS', 'false');
    const { Q2SLogger } = await import('../../../src/shared/logger.js');
    Q2SLogger.setEnabled(true);

    Q2SLogger.info('prepared');
    Q2SLogger.debug('#1 score=Plan0');

    const lines = fs.readFileSync(path.join(dir, 'q2s.log'), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Q2S:INFO\] prepared$/);
    expect(lines[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Q2S:DEBUG\] #1 score=Plan0$/);
  });

  it('skips info lines when test logs are suppressed and debug lines at INFO', async () => {
    vi.stubEnv('LOG_LEVEL', 'INFO');
    vi.stubEnv('SUPPRESS_TEST_LOGS', 'true');
    const { Q2SLogger } = await import('../../../src/shared/logger.js');
    Q2SLogger.setEnabled(true);

    Q2SLogger.info('prepared');
    Q2SLogger.debug('#1 score=Plan0');

    expect(fs.existsSync(path.join(dir, 'q2s.log'))).toBe(false);
  });

  it('writes nothing while disabled', async () => {
    const { Q2SLogger } = await import('../../../src/shared/logger.js');
    Q2SLogger.setEnabled(false);

    Q2SLogger.error('boom', new Error('detail'));

    expect(Q2SLogger.isEnabled()).toBe(false);
    expect(fs.existsSync(path.join(dir, 'q2s.log'))).toBe(false);
  });
});
