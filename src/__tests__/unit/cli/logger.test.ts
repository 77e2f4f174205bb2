/**
 * CLI logger tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { CLILogger } from '../../../cli/lib/logger.js';

describe('CLILogger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('drops lines below the configured level', () => {
    const logger = new CLILogger({ level: 'warn', json: true }, (line) => lines.push(line));

    logger.debug('Rules selected');
    logger.info('Validating feed');

    expect(lines).toEqual([]);
  });

  it('writes one JSON object per line', () => {
    const logger = new CLILogger({ level: 'info', json: true }, (line) => lines.push(line));

    logger.warn('Cache stale', { file: 'country-us.csv' });

    expect(lines).toEqual([
      '{"timestamp":"2026-03-01T12:00:00.000Z","level":"warn","message":"Cache stale","service":"feed-validator","file":"country-us.csv"}',
    ]);
  });

  it('tags lines with the running command', () => {
    const logger = new CLILogger({ level: 'debug', json: true }, (line) => lines.push(line));

    logger.commandStart('validate');
    vi.advanceTimersByTime(250);
    logger.commandEnd(false, { exitCode: 2 });

    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      {
        timestamp: '2026-03-01T12:00:00.000Z',
        level: 'debug',
        message: 'Starting validate',
        service: 'feed-validator',
        command: 'validate',
      },
      {
        timestamp: '2026-03-01T12:00:00.250Z',
        level: 'error',
        message: 'Command failed',
        service: 'feed-validator',
        command: 'validate',
        duration_ms: 250,
        exitCode: 2,
      },
    ]);
  });

  it('colours human-readable lines', () => {
    const logger = new CLILogger({ level: 'info', json: false }, (line) => lines.push(line));

    logger.warn('Cache stale', { file: 'country-us.csv' });

    expect(lines).toEqual([
      '\x1b[2m2026-03-01T12:00:00.000Z\x1b[0m \x1b[33mWARN \x1b[0m Cache stale \x1b[2m(\x1b[36mfile\x1b[0m=country-us.csv)\x1b[0m',
    ]);
  });
});
