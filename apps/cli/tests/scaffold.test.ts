import assert from 'node:assert/strict';
import path from 'node:path';
import { readFile } from 'node:fs/promises';
import { test } from 'node:test';
import { useLabflowHome, useTempDir } from './helpers';
import { AppConfig } from '../src/lib/appConfig';
import { UsageError } from '../src/lib/errors';
import { JobConfig } from '../src/lib/jobConfig';
import { assertJobName, findExistingJobConfig, writeJobConfig } from '../src/lib/scaffold';

test('job names that read as numbers or null stay selectable', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  const dir = await useTempDir(t);
  const app = await AppConfig.load();

  for (const name of ['1.10', '010', 'null', 'true']) {
    const stepFile = await writeJobConfig('step.yaml', path.join(dir, 'steps'), name, 'yaml');
    const step = await JobConfig.load(stepFile, { step: name }, app);
    assert.equal(step.step?.name, name);
    assert.equal(step.requireStep().settings.task.code_path, `notebook/${name}.ipynb`);

    const dagFile = await writeJobConfig('dag.yaml', path.join(dir, 'dags'), name, 'json');
    const dag = await JobConfig.load(dagFile, { dag: name }, app);
    assert.equal(dag.dag?.name, name);
  }
});

test('writeJobConfig quotes the job key and findExistingJobConfig finds the file', async (t) => {
  const dir = await useTempDir(t);

  const file = await writeJobConfig('step.yaml', dir, '010', 'yaml');

  assert.equal(file, path.join(dir, '010', '010.yaml'));
  const lines = (await readFile(file, 'utf8')).split('\n');
  assert.deepEqual(lines.slice(0, 2), ['steps:', '  "010":']);
  assert.equal(await findExistingJobConfig(dir, '010'), file);
  assert.equal(await findExistingJobConfig(dir, 'other'), null);
});

test('assertJobName rejects names with spaces or a leading separator', () => {
  assert.doesNotThrow(() => assertJobName('daily.report_v2'));
  assert.throws(() => assertJobName('bad name'), UsageError);
  assert.throws(() => assertJobName('.hidden'), UsageError);
});
