import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigurationManager,
  DEFAULT_ORCHESTRATOR_CONFIG,
} from '../../../src/config/configuration-manager';
import { ConfigurationError } from '../../../src/errors/orchestrator-error';
import { ErrorCode } from '../../../src/errors/error-codes';

describe('ConfigurationManager', () => {
  let manager: ConfigurationManager;
  let tempDir: string;

  beforeEach(() => {
    manager = new ConfigurationManager();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dag-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeSettings(content: string): string {
    const file = path.join(tempDir, 'settings.json');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  describe('load', () => {
    it('should return defaults without a path', () => {
      assert.deepEqual(manager.load(), DEFAULT_ORCHESTRATOR_CONFIG);
    });

    it('should merge a partial section over the defaults', () => {
      const file = writeSettings(JSON.stringify({ dispatch: { mode: 'sequential' }, complexity_weights: { complex: 60 } }));
      const config = manager.load(file);
      assert.equal(config.dispatch.mode, 'sequential');
      assert.equal(config.dispatch.max_concurrency, 4);
      assert.equal(config.complexity_weights.complex, 60);
      assert.equal(config.complexity_weights.simple, 5);
    });

    it('should return a frozen config', () => {
      assert.ok(Object.isFrozen(manager.load()));
    });

    it('should fail with E101 for a missing file', () => {
      assert.throws(
        () => manager.load(path.join(tempDir, 'absent.json')),
        (err: unknown) => err instanceof ConfigurationError && err.code === ErrorCode.E101_CONFIG_FILE_NOT_FOUND
      );
    });

    it('should fail with E102 for malformed JSON', () => {
      const file = writeSettings('{ "dispatch": ');
      assert.throws(
        () => manager.load(file),
        (err: unknown) => err instanceof ConfigurationError && err.code === ErrorCode.E102_CONFIG_PARSE_FAILURE
      );
    });

    it('should fail with E102 when the document is not an object', () => {
      const file = writeSettings('[1, 2, 3]');
      assert.throws(
        () => manager.load(file),
        (err: unknown) => err instanceof ConfigurationError && err.code === ErrorCode.E102_CONFIG_PARSE_FAILURE
      );
    });
  });

  describe('resolve', () => {
    it('should reject values outside their range', () => {
      assert.throws(
        () => manager.resolve({ dispatch: { max_concurrency: 0 } }),
        (err: unknown) =>
          err instanceof ConfigurationError &&
          err.code === ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE &&
          err.message ===
            '[E103] Configuration value out of range: dispatch.max_concurrency must be an integer between 1 and 64, got 0'
      );
    });

    it('should reject non-integer values', () => {
      assert.throws(() => manager.resolve({ decomposition: { max_depth: 1.5 } }), ConfigurationError);
    });

    it('should reject an unknown dispatch mode', () => {
      assert.throws(() => manager.resolve({ dispatch: { mode: 'eager' } }), /dispatch\.mode/);
    });

    it('should reject an unknown log level', () => {
      assert.throws(() => manager.resolve({ logging: { level: 'trace' } }), /logging\.level/);
    });

    it('should reject a section that is not an object', () => {
      assert.throws(() => manager.resolve({ event_bus: 5 }), /event_bus must be an object/);
    });

    it('should accept boundary values', () => {
      const config = manager.resolve({ decomposition: { max_depth: 0 }, event_bus: { history_limit: 100000 } });
      assert.equal(config.decomposition.max_depth, 0);
      assert.equal(config.event_bus.history_limit, 100000);
    });
  });

  it('getDefaults should return an independent copy', () => {
    const defaults = manager.getDefaults();
    defaults.dispatch.max_concurrency = 99;
    assert.equal(DEFAULT_ORCHESTRATOR_CONFIG.dispatch.max_concurrency, 4);
  });
});
