import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import { useLabflowHome, useTempDir, writeText } from './helpers';
import { AppConfig } from '../src/lib/appConfig';
import { ConfigMissingError, ConfigTypeError } from '../src/lib/errors';
import { JobConfig, findConfigTree, selectConfig } from '../src/lib/jobConfig';

const JOB_CONFIG = `steps:
  demo:
    prepare:
      task:
        type: jupyter
        code_path: notebook/prepare.ipynb
        parameters:
          - alpha: 0.5
          - label: first
      docker_image:
        input_docker_src: jupyter-spark
    train:
      task:
        type: jupyter
        code_path: notebook/train.ipynb
dags:
  nightly.report:
    definition:
      code_path: code/report.ipynb
`;

const TREE = {
  steps: {
    demo: { prepare: { task: {} }, train: { task: {} } },
    other: { task: {} },
    notes: 'ignored'
  }
};

test('findConfigTree names candidates by their dotted path', () => {
  assert.deepEqual(
    findConfigTree(TREE.steps, 'task').map((candidate) => candidate.name),
    ['demo.prepare', 'demo.train', 'other']
  );
});

test('selectConfig returns the first candidate or the selected one', () => {
  assert.equal(selectConfig(TREE, 'steps', 'task')?.name, 'demo.prepare');
  assert.equal(selectConfig(TREE, 'steps', 'task', 'other')?.name, 'other');
  assert.equal(selectConfig(TREE, 'dags', 'definition'), null);
});

test('selectConfig lists the candidates when the selection is unknown', () => {
  assert.throws(
    () => selectConfig(TREE, 'steps', 'task', 'missing'),
    (err: unknown) => {
      assert.ok(err instanceof ConfigMissingError);
      assert.equal(
        err.message,
        "missing's task was not found in steps configurations. Available candidates are: demo.prepare demo.train other"
      );
      return true;
    }
  );
});

test('JobConfig.load selects and derives step and dag values', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  const dir = await useTempDir(t);
  const file = await writeText(path.join(dir, 'job.yaml'), JOB_CONFIG);
  const app = await AppConfig.load();

  const conf = await JobConfig.load(file, {}, app);

  assert.equal(conf.configPath(), file);
  assert.equal(conf.rootDir(), dir);
  assert.equal(conf.resolvePath('notebook/prepare.ipynb'), path.join(dir, 'notebook', 'prepare.ipynb'));
  assert.equal(conf.step?.name, 'demo.prepare');
  assert.equal(conf.dag?.name, 'nightly.report');
  assert.equal(conf.stepContainerName(), 'jupyter_demo_prepare');
  assert.equal(conf.dagContainerName(), 'airflow_nightly_report');
  assert.deepEqual(conf.stepExtractParameters(), ['-p', 'alpha', '0.5', '-p', 'label', 'first']);

  const { task, docker_image: image } = conf.requireStep().settings;
  assert.equal(task.code_format, 'py');
  assert.equal(task.jupytext_format, 'percent');
  assert.equal(task.execution_dir_path, 'notebook_run');
  assert.deepEqual(image.docker_extra_options, []);

  const output = conf.stepNotebookOutputPath('/home/jovyan/work/notebook/prepare.ipynb');
  assert.match(output, new RegExp(`^/home/jovyan/work/notebook_run/prepare_\\d{14}${app.userId()}\\.ipynb$`));
});

test('JobConfig.load honours an explicit step selection', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  const dir = await useTempDir(t);
  const file = await writeText(path.join(dir, 'job.yaml'), JOB_CONFIG);

  const conf = await JobConfig.load(file, { step: 'demo.train' });
  assert.equal(conf.stepContainerName(), 'jupyter_demo_train');
  assert.deepEqual(conf.stepExtractParameters(), []);
});

test('JobConfig.load accepts an inline document', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  const conf = await JobConfig.load('steps:\n  one:\n    task:\n      type: jupyter\n      code_path: a.ipynb\n');

  assert.equal(conf.step?.name, 'one');
  assert.equal(conf.configPath(), null);
  assert.equal(conf.rootDir(), process.cwd());
  assert.equal(conf.dag, null);
  assert.throws(() => conf.requireDag(), ConfigMissingError);
});

test('JobConfig.load reports mistyped and missing step fields', { concurrency: false }, async (t) => {
  await useLabflowHome(t);

  await assert.rejects(
    JobConfig.load('steps:\n  bad:\n    task:\n      type: jupyter\n      code_path: 5\n'),
    (err: unknown) => {
      assert.ok(err instanceof ConfigTypeError);
      assert.equal(err.message, 'In step named bad: type mismatch for task.code_path: Expected string, received number');
      return true;
    }
  );

  await assert.rejects(JobConfig.load('steps:\n  bad:\n    task:\n      type: jupyter\n'), (err: unknown) => {
    assert.ok(err instanceof ConfigMissingError);
    assert.equal(err.message, 'In step named bad: missing definition of task.code_path');
    return true;
  });
});

test('JobConfig.load rejects documents that are not mappings', { concurrency: false }, async (t) => {
  await useLabflowHome(t);
  await assert.rejects(JobConfig.load('no-such-file.yaml'), ConfigTypeError);
});
