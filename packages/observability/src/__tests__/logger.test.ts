/**
 * Tests for the logger factory
 * Verifies output shape, level handling and error serialization
 */

import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../logger.js';

function captureStream() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  return { logs, stream };
}

describe('createLogger', () => {
  describe('Base Fields', () => {
    it('should tag every entry with the service name', () => {
      const { logs, stream } = captureStream();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ transactionId: 7 }, 'Transaction added');

      expect(logs[0]).toBeDefined();
      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.service).toBe('tally');
      expect(logEntry.transactionId).toBe(7);
      expect(logEntry.msg).toBe('Transaction added');
      expect(logEntry.level).toBe(30);
    });

    it('should let options override the base fields', () => {
      const { logs, stream } = captureStream();
      const logger = createLogger({ level: 'info', base: { service: 'tally-cli' } }, stream);

      logger.info('hello');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.service).toBe('tally-cli');
    });
  });

  describe('Level Handling', () => {
    it('should drop entries below the configured level', () => {
      const { logs, stream } = captureStream();
      const logger = createLogger({ level: 'warn' }, stream);

      logger.info('ignored');
      logger.warn('kept');

      expect(logs).toHaveLength(1);
      expect(JSON.parse(logs[0]!).msg).toBe('kept');
    });

    it('should write nothing from the silent logger', () => {
      expect(silentLogger.level).toBe('silent');
      expect(silentLogger.isLevelEnabled('error')).toBe(false);
    });
  });

  describe('Error Serialization', () => {
    it('should serialize errors under err', () => {
      const { logs, stream } = captureStream();
      const logger = createLogger({ level: 'info' }, stream);

      logger.error({ err: new TypeError('bad amount') }, 'Add failed');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.err.type).toBe('TypeError');
      expect(logEntry.err.message).toBe('bad amount');
      expect(typeof logEntry.err.stack).toBe('string');
    });
  });

  describe('Timestamp Format', () => {
    it('should format timestamps as ISO 8601', () => {
      const { logs, stream } = captureStream();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ msg: 'test' });

      const logEntry = JSON.parse(logs[0]!);
      expect(typeof logEntry.time).toBe('string');
      expect(logEntry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });
});
