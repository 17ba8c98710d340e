/**
 * Tests for logger configuration and file output
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, loggerConfigFromEnvironment } from '../../src/lib/logger.js';
import { loadEnvironmentFile } from '../../src/services/configuration-service.js';

describe('loggerConfigFromEnvironment', () => {
  it('reads the log directory and console level', () => {
    expect(loggerConfigFromEnvironment({ LOG_LEVEL: 'debug', VECTOR_PIPELINE_LOG_DIR: '/var/log/pipeline' })).toEqual({
      logDir: '/var/log/pipeline',
      consoleLevel: 'debug',
    });
  });

  it('ignores unknown levels and empty values', () => {
    expect(loggerConfigFromEnvironment({ LOG_LEVEL: 'loud', VECTOR_PIPELINE_LOG_DIR: '' })).toEqual({
      logDir: undefined,
      consoleLevel: undefined,
    });
  });
});

describe('Logger.configure', () => {
  let dir: string;
  const saved = { LOG_LEVEL: process.env.LOG_LEVEL, VECTOR_PIPELINE_LOG_DIR: process.env.VECTOR_PIPELINE_LOG_DIR };

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.VECTOR_PIPELINE_LOG_DIR;
    dir = mkdtempSync(join(tmpdir(), 'vector-pipeline-logger-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('starts writing files once a log directory is set', () => {
    const log = new Logger({ console: false });
    log.info('before');

    log.configure({ logDir: join(dir, 'logs') });
    log.info('after', { runId: 'run-1' });

    const lines = readFileSync(join(dir, 'logs', 'general.jsonl'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'info',
      type: 'general',
      message: 'after',
      context: { runId: 'run-1' },
    });
  });

  it('keeps settings that are not given', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger({ consoleLevel: 'debug' });

    log.configure({ logDir: undefined, consoleLevel: undefined });
    log.debug('still shown');

    expect(consoleLog).toHaveBeenCalledTimes(1);
  });

  it('applies settings loaded from a .env file', () => {
    const envPath = join(dir, '.env');
    writeFileSync(envPath, `LOG_LEVEL=debug\nVECTOR_PIPELINE_LOG_DIR=${join(dir, 'env-logs')}\n`);
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger();

    expect(loadEnvironmentFile(envPath).isOk()).toBe(true);
    log.configure(loggerConfigFromEnvironment());
    log.debug('from env');

    expect(consoleLog).toHaveBeenCalledTimes(1);
    const written = readFileSync(join(dir, 'env-logs', 'general.jsonl'), 'utf8');
    expect(JSON.parse(written.trim())).toMatchObject({ level: 'debug', message: 'from env' });
  });
});
