import { describe, it, expect } from 'vitest';
import {
  defaultConfig,
  getConfigSummary,
  IN_MEMORY_DATA_DIR,
  loadConfig,
  validateConfig,
} from '../../src/core/config';
import { parseEnum, parseIntWithValidation } from '../../src/core/config.utils';

describe('Configuration', () => {
  describe('Default Values', () => {
    it('should use defaults when the environment is empty', () => {
      const config = loadConfig({});

      expect(config).toEqual(defaultConfig);
      expect(config.CONFLICT_RETRIES).toBe(3);
      expect(config.CONFLICT_RETRY_BASE_MS).toBe(5);
      expect(config.FS_RETRY_TIMES).toBe(2);
      expect(config.FS_RETRY_BASE_MS).toBe(50);
      expect(config.MAX_LINE_QUANTITY).toBe(1000);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(loadConfig({}))).toBe(true);
    });
  });

  describe('Environment Variable Parsing', () => {
    it('should read every key from the environment', () => {
      const config = loadConfig({
        PORT: '8080',
        LOG_LEVEL: 'debug',
        DATA_DIR: ' /var/lib/ledger ',
        FS_RETRY_TIMES: '0',
        FS_RETRY_BASE_MS: '10',
        CONFLICT_RETRIES: '5',
        CONFLICT_RETRY_BASE_MS: '0',
        MAX_LINE_QUANTITY: '50',
      });

      expect(config).toEqual({
        PORT: 8080,
        LOG_LEVEL: 'debug',
        DATA_DIR: '/var/lib/ledger',
        FS_RETRY_TIMES: 0,
        FS_RETRY_BASE_MS: 10,
        CONFLICT_RETRIES: 5,
        CONFLICT_RETRY_BASE_MS: 0,
        MAX_LINE_QUANTITY: 50,
      });
    });

    it('should fall back to defaults for invalid values', () => {
      const config = loadConfig({
        PORT: 'not-a-port',
        LOG_LEVEL: 'chatty',
        CONFLICT_RETRIES: '-1',
        MAX_LINE_QUANTITY: '0',
        FS_RETRY_BASE_MS: '1.5',
      });

      expect(config.PORT).toBe(3000);
      expect(config.LOG_LEVEL).toBe('info');
      expect(config.CONFLICT_RETRIES).toBe(3);
      expect(config.MAX_LINE_QUANTITY).toBe(1000);
      expect(config.FS_RETRY_BASE_MS).toBe(50);
    });

    it('should treat empty strings as unset', () => {
      expect(loadConfig({ PORT: '' }).PORT).toBe(3000);
    });

    it('should apply explicit overrides last', () => {
      const config = loadConfig({ DATA_DIR: 'data' }, { DATA_DIR: IN_MEMORY_DATA_DIR });
      expect(config.DATA_DIR).toBe(':memory:');
    });
  });

  describe('Parsers', () => {
    it('should enforce integer bounds', () => {
      expect(parseIntWithValidation(' 42 ', 0, 100)).toBe(42);
      expect(() => parseIntWithValidation('4.2')).toThrow('Invalid integer: 4.2');
      expect(() => parseIntWithValidation('-1', 0)).toThrow('Value -1 is below minimum 0');
      expect(() => parseIntWithValidation('101', 0, 100)).toThrow('Value 101 is above maximum 100');
    });

    it('should accept only listed enum values', () => {
      const colors = ['red', 'green'] as const;
      expect(parseEnum({ COLOR: 'green' }, 'COLOR', colors, 'red')).toBe('green');
      expect(parseEnum({ COLOR: 'blue' }, 'COLOR', colors, 'red')).toBe('red');
    });
  });

  describe('Validation', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(defaultConfig)).toEqual([]);
    });

    it('should report each problem', () => {
      const issues = validateConfig({ ...defaultConfig, PORT: 70000, DATA_DIR: '' });
      expect(issues).toEqual([
        'PORT must be between 1 and 65535',
        'DATA_DIR must not be empty',
      ]);
    });
  });

  describe('Summary', () => {
    it('should group settings for logging', () => {
      const summary = getConfigSummary(loadConfig({}, { DATA_DIR: IN_MEMORY_DATA_DIR }));
      expect(summary).toEqual({
        port: 3000,
        logLevel: 'info',
        persistence: { dataDir: ':memory:', inMemory: true, retryTimes: 2 },
        conflicts: { retries: 3, baseMs: 5 },
        maxLineQuantity: 1000,
      });
    });
  });
});
