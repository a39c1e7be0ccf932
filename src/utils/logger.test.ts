import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    return JSON.parse(getOutput(index).trim()) as Record<string, unknown>;
  }

  describe('unserializable data', () => {
    it('should replace circular data with a serialization error', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      const circular: Record<string, unknown> = { name: 'prod' };
      circular.self = circular;

      expect(() => {
        logger.info('profile_selected', circular);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('ProfileResolver');
      expect(parsed.event).toBe('profile_selected');
      expect(parsed.data).toBeUndefined();
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      logger.warn('bigint_value', { value: BigInt(42) });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should still emit exactly one JSON line', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      const circular: Record<string, unknown> = {};
      circular.ref = circular;
      logger.error('circular', circular);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
    });
  });

  describe('normal logging', () => {
    it('should log info messages with data', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      logger.info('profile_selected', { source: 'single' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.event).toBe('profile_selected');
      expect(parsed.data).toEqual({ source: 'single' });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should omit the data field when none is given', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      logger.error('lookup_failed');

      expect(Object.keys(parseOutput(0)).sort()).toEqual([
        'component',
        'event',
        'level',
        'timestamp',
      ]);
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'ProfileResolver' });

      logger.debug('profile_skipped', { configPath: '/tmp/x' });

      expect(capturedOutput.length).toBe(0);
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'ProfileResolver', debugMode: true });

      logger.debug('profile_skipped', { configPath: '/tmp/x' });

      expect(parseOutput(0).level).toBe('debug');
    });

    it('should write one parsable line for any JSON payload (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (payload) => {
          capturedOutput = [];
          logger.info('fuzz', payload);

          expect(capturedOutput.length).toBe(1);
          const parsed = JSON.parse(getOutput(0).trim()) as Record<string, unknown>;
          expect(parsed.event).toBe('fuzz');
          expect(parsed.serializationError).toBeUndefined();
        })
      );
    });
  });
});
