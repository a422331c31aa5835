import assert from 'node:assert/strict';
import { test } from 'node:test';
import { useTempDir } from './helpers';
import { ProcessError } from '../src/lib/errors';
import { formatCommand, runProcess, startProcess } from '../src/lib/process';

test('runProcess forwards stdout and stderr lines and resolves with the exit code', async () => {
  const lines: string[] = [];
  const exitCode = await runProcess('sh', ['-c', 'echo one; echo two >&2; exit 3'], {
    onLine: (line) => lines.push(line)
  });
  assert.equal(exitCode, 3);
  assert.deepEqual([...lines].sort(), ['one', 'two']);
});

test('runProcess runs in the requested directory', async (t) => {
  const dir = await useTempDir(t);
  const lines: string[] = [];
  await runProcess('pwd', [], { cwd: dir, onLine: (line) => lines.push(line) });
  assert.deepEqual(lines, [dir]);
});

test('runProcess rejects with a ProcessError when the command cannot start', async () => {
  await assert.rejects(runProcess('labflow-missing-binary', []), (err: unknown) => {
    assert.ok(err instanceof ProcessError);
    assert.equal(err.exitCode, null);
    assert.ok(err.message.startsWith('Failed to start labflow-missing-binary: '));
    return true;
  });
});

test('startProcess exposes the child and its completion', async () => {
  const handle = startProcess('sh', ['-c', 'exit 0']);
  assert.equal(typeof handle.child.pid, 'number');
  assert.equal(await handle.completion, 0);
});

test('formatCommand joins the command line', () => {
  assert.equal(formatCommand('docker', ['tag', 'abc', 'demo:v1']), 'docker tag abc demo:v1');
});
