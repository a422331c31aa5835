import { promises as fs } from 'node:fs';
import path from 'node:path';
import { pathExists, touch } from './fs';
import { getLogger } from './logger';
import { runProcess } from './process';
import { templatePath } from './resources';
import { renderTemplateFile } from './template';

export const DEFAULT_NOTEBOOK_FORMAT = 'py:percent';

export type NotebookPaths = {
  notebook: string;
  source: string;
};

function sourceExtension(fromFormat: string): string {
  return fromFormat.split(':')[0] || 'py';
}

export function notebookFormat(codeFormat: string, jupytextFormat: string): string {
  return `${codeFormat}:${jupytextFormat}`;
}

export function notebookPaths(codePath: string, fromFormat: string = DEFAULT_NOTEBOOK_FORMAT): NotebookPaths {
  const parsed = path.parse(codePath);
  const base = path.join(parsed.dir, parsed.name);
  return {
    notebook: `${base}.ipynb`,
    source: `${base}.${sourceExtension(fromFormat)}`
  };
}

async function runJupytext(args: string[]): Promise<void> {
  const exitCode = await runProcess('jupytext', args);
  if (exitCode !== 0) {
    getLogger().warn(`jupytext ${args.join(' ')} exited with code ${exitCode ?? 'unknown'}`);
  }
}

/**
 * Makes sure a notebook and its jupytext-paired source exist and agree.
 * A missing notebook is built from the source when there is one, otherwise
 * from the blank notebook template.
 */
export async function ensureNotebook(
  codePath: string,
  fromFormat: string = DEFAULT_NOTEBOOK_FORMAT
): Promise<NotebookPaths> {
  const paths = notebookPaths(codePath, fromFormat);
  const pairing = `.ipynb,${fromFormat}`;
  const hadNotebook = await pathExists(paths.notebook);

  if (await pathExists(paths.source)) {
    const args = ['--from', fromFormat, '--to', 'notebook', paths.source, '-o', paths.notebook, '--set-formats', pairing];
    await runJupytext(hadNotebook ? [...args, '--sync'] : args);
    // jupyter refuses to open a pair whose text file is older than the notebook
    await touch(paths.source);
    return paths;
  }

  if (!hadNotebook) {
    await renderTemplateFile(templatePath('notebook.json'), paths.notebook, { format: fromFormat });
  }
  await runJupytext(['--set-formats', pairing, paths.notebook]);
  return paths;
}

/** Applies `ensureNotebook` to `codePath` and to every notebook beside it. */
export async function ensureNotebookDir(
  codePath: string,
  fromFormat: string = DEFAULT_NOTEBOOK_FORMAT
): Promise<NotebookPaths> {
  const target = await ensureNotebook(codePath, fromFormat);
  const directory = path.dirname(target.notebook);
  const extension = `.${sourceExtension(fromFormat)}`;
  const seen = new Set([target.notebook]);

  const entries = (await fs.readdir(directory, { withFileTypes: true }))
    .filter((entry) => entry.isFile() && (entry.name.endsWith('.ipynb') || entry.name.endsWith(extension)))
    .map((entry) => entry.name)
    .sort();
  for (const name of entries) {
    const sibling = path.join(directory, name);
    const { notebook } = notebookPaths(sibling, fromFormat);
    if (seen.has(notebook)) {
      continue;
    }
    seen.add(notebook);
    await ensureNotebook(sibling, fromFormat);
  }
  return target;
}
