import assert from 'node:assert/strict';
import path from 'node:path';
import { access, readFile } from 'node:fs/promises';
import type { NetworkInterfaceInfo } from 'node:os';
import { test } from 'node:test';
import { setEnv, useLabflowHome, useTempDir, writeText } from './helpers';
import {
  AppConfig,
  USER_LIST_FILES,
  appConfigFile,
  formatTimestamp,
  generateUserId,
  setupAppConfig
} from '../src/lib/appConfig';
import { ConfigMissingError, ConfigTypeError } from '../src/lib/errors';

test('AppConfig.load generates the configuration under LABFLOW_HOME', { concurrency: false }, async (t) => {
  const home = await useLabflowHome(t);
  const app = await AppConfig.load();

  assert.equal(app.filePath, path.join(home, 'config', 'labflow.yaml'));
  assert.equal(appConfigFile(), app.filePath);
  assert.equal(app.appConfigHome(), home);
  assert.match(app.userId(), /^u\d+$/);
  assert.ok(app.timezone().length > 0);
  assert.deepEqual(app.airflowWorkspaces(), []);
  assert.equal(app.dagsFolder(), path.join(home, 'workspace', 'dags'));
  assert.equal(app.dockerComposeFile(), path.join(home, 'config', 'docker-compose-CeleryExecutor.yml'));
  assert.equal(app.settings.jupyter.docker_image.allow_apt_repository, false);
  assert.equal(app.settings.jupyter.docker_image.allow_requirements, true);
  for (const name of USER_LIST_FILES) {
    await access(path.join(home, 'config', name));
  }
});

test('AppConfig.load generates a readable file for homes with backslashes and quotes', { concurrency: false }, async (t) => {
  const root = await useTempDir(t);
  const home = path.join(root, 'C:\\Users\\me "lab"');
  setEnv(t, 'LABFLOW_HOME', home);

  const app = await AppConfig.load();

  assert.equal(app.filePath, path.join(home, 'config', 'labflow.yaml'));
  assert.equal(app.appConfigHome(), home);
  assert.equal(app.dagsFolder(), path.join(home, 'workspace', 'dags'));
});

test('formatTimestamp renders the wall clock of the timezone', () => {
  const instant = new Date('2024-03-05T10:04:09Z');
  assert.equal(formatTimestamp(instant, 'UTC'), '20240305100409');
  assert.equal(formatTimestamp(instant, 'Asia/Tokyo'), '20240305190409');
});

test('generateUserId uses the first external hardware address', () => {
  const loopback: NetworkInterfaceInfo = {
    address: '127.0.0.1',
    netmask: '255.0.0.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal: true,
    cidr: '127.0.0.1/8'
  };
  const ethernet: NetworkInterfaceInfo = {
    address: '10.0.0.2',
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac: '00:00:00:00:01:00',
    internal: false,
    cidr: '10.0.0.2/24'
  };
  assert.equal(generateUserId({ lo: [loopback], eth0: [ethernet] }), 'u256');
  assert.match(generateUserId({ lo: [loopback] }), /^u\d+$/);
});

test('redefinitions are written back to the configuration file', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  const other = await useTempDir(t);
  const app = await AppConfig.load();

  await app.redefineAppConfigHome(other);
  await app.redefineAirflowWorkspaces([path.join(other, 'ws1'), path.join(other, 'ws2')]);

  const reloaded = await AppConfig.load(app.filePath);
  assert.equal(reloaded.appConfigHome(), other);
  assert.deepEqual(reloaded.airflowWorkspaces(), [path.join(other, 'ws1'), path.join(other, 'ws2')]);
  const content = await readFile(app.filePath, 'utf8');
  assert.ok(content.startsWith('# Global labflow configuration, generated by `labflow setup`.\n'));
});

test('userEnvFiles merges job entries and ends with the user env file', { concurrency: false }, async (t) => {
  const home = await useLabflowHome(t);
  const jobDir = await useTempDir(t);
  await writeText(path.join(jobDir, 'job.env'), 'A=1');
  const app = await AppConfig.load();

  const files = await app.userEnvFiles([{ B: 2 }, 'job.env', 'missing.env'], jobDir);

  assert.equal(files.length, 2);
  assert.equal(files[1], path.join(home, 'config', '.env'));
  assert.equal(path.basename(files[0]), 'job.env');
  assert.ok(path.basename(path.dirname(files[0])).startsWith('labflow_'));
  assert.equal(await readFile(files[0], 'utf8'), 'B=2\nA=1\n');

  assert.deepEqual(await app.userEnvFiles(), [path.join(home, 'config', '.env')]);
});

test('AppConfig.load reports missing keys', { concurrency: false }, async (t) => {
  const dir = await useTempDir(t);
  const file = await writeText(path.join(dir, 'labflow.yaml'), 'labflow:\n  timezone: UTC\n  metadata:\n    user: {}\n');

  await assert.rejects(AppConfig.load(file), (err: unknown) => {
    assert.ok(err instanceof ConfigMissingError);
    assert.equal(err.message, 'In global application configuration: missing definition of labflow.metadata.user.id');
    return true;
  });
});

test('AppConfig.load reports mistyped keys', { concurrency: false }, async (t) => {
  const dir = await useTempDir(t);
  const file = await writeText(
    path.join(dir, 'labflow.yaml'),
    'labflow:\n  timezone: 42\n  metadata:\n    user:\n      id: u1\n'
  );

  await assert.rejects(AppConfig.load(file), (err: unknown) => {
    assert.ok(err instanceof ConfigTypeError);
    assert.equal(
      err.message,
      'In global application configuration: type mismatch for labflow.timezone: Expected string, received number'
    );
    return true;
  });
});

test('AppConfig.load rejects an unknown timezone', { concurrency: false }, async (t) => {
  const dir = await useTempDir(t);
  const file = await writeText(
    path.join(dir, 'labflow.yaml'),
    'labflow:\n  timezone: Mars/Olympus\n  metadata:\n    user:\n      id: u1\n'
  );

  await assert.rejects(AppConfig.load(file), (err: unknown) => {
    assert.ok(err instanceof ConfigTypeError);
    assert.equal(
      err.message,
      'In global application configuration: type mismatch for labflow.timezone: Unknown IANA timezone Mars/Olympus'
    );
    return true;
  });
});

test('setupAppConfig keeps an existing file unless forced', { concurrency: false }, async (t) => {
  const home = await useLabflowHome(t);
  const file = path.join(home, 'config', 'labflow.yaml');

  assert.deepEqual(await setupAppConfig(), { file, created: true });
  assert.deepEqual(await setupAppConfig(), { file, created: false });
  assert.deepEqual(await setupAppConfig({ force: true }), { file, created: true });
});
