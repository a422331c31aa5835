import assert from 'node:assert/strict';
import path from 'node:path';
import { readFile } from 'node:fs/promises';
import { test } from 'node:test';
import { useTempDir, writeText } from './helpers';
import { renderTemplate, renderTemplateFile } from '../src/lib/template';

test('renderTemplate substitutes values', async () => {
  assert.equal(await renderTemplate('user: {{ user_id }} in {{ timezone }}', { user_id: 'u42', timezone: 'UTC' }), 'user: u42 in UTC');
});

test('renderTemplate leaves unset slots empty', async () => {
  assert.equal(await renderTemplate('FROM base\n{{ apt_packages }}\nUSER jovyan', {}), 'FROM base\n\nUSER jovyan');
});

test('renderTemplate rejects unknown filters', async () => {
  await assert.rejects(renderTemplate('{{ name | shout }}', { name: 'x' }));
});

test('renderTemplateFile writes into missing directories', async (t) => {
  const dir = await useTempDir(t);
  const source = await writeText(path.join(dir, 'source.txt'), 'steps:\n  {{ name }}: {}\n');

  const destination = path.join(dir, 'nested', 'out', 'demo.yaml');
  const written = await renderTemplateFile(source, destination, { name: 'demo' });

  assert.equal(written, destination);
  assert.equal(await readFile(destination, 'utf8'), 'steps:\n  demo: {}\n');
});
