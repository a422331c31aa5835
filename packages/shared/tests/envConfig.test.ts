import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { z } from 'zod';
import { EnvConfigError, booleanVar, integerVar, loadEnvConfig, pathVar, stringVar } from '../src/envConfig';

const schema = z
  .object({
    FLAG: booleanVar({ defaultValue: false }),
    ATTEMPTS: integerVar({ defaultValue: 5, min: 1 }),
    LEVEL: stringVar({ defaultValue: 'info', lowercase: true, allowed: ['debug', 'info', 'warn'] }),
    HOME_DIR: pathVar()
  })
  .passthrough();

test('loadEnvConfig applies defaults for missing values', () => {
  const config = loadEnvConfig(schema, { env: {} });
  assert.equal(config.FLAG, false);
  assert.equal(config.ATTEMPTS, 5);
  assert.equal(config.LEVEL, 'info');
  assert.equal(config.HOME_DIR, undefined);
});

test('loadEnvConfig parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: { FLAG: 'Yes', ATTEMPTS: ' 3 ', LEVEL: 'DEBUG', HOME_DIR: '~/work' }
  });
  assert.equal(config.FLAG, true);
  assert.equal(config.ATTEMPTS, 3);
  assert.equal(config.LEVEL, 'debug');
  assert.equal(config.HOME_DIR, path.join(os.homedir(), 'work'));
});

test('loadEnvConfig reports every invalid variable', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { FLAG: 'maybe', ATTEMPTS: '0', LEVEL: 'trace' }, context: 'test' }),
    (err: unknown) => {
      assert.ok(err instanceof EnvConfigError);
      const lines = err.message.split('\n');
      assert.equal(lines[0], '[test] Invalid environment configuration');
      assert.equal(lines.length, 4);
      assert.equal(lines[2], '  • ATTEMPTS: ATTEMPTS must be >= 1');
      assert.equal(lines[3], '  • LEVEL: Invalid LEVEL "trace". Allowed values: debug, info, warn');
      return true;
    }
  );
});
