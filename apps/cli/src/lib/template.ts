import { Liquid } from 'liquidjs';
import { readTextFile, writeFile } from './fs';

export type TemplateValues = Record<string, unknown>;

// Unset variables render empty so optional Dockerfile slots can be left out.
const engine = new Liquid({
  cache: false,
  strictFilters: true,
  strictVariables: false
});

export async function renderTemplate(source: string, values: TemplateValues): Promise<string> {
  return engine.parseAndRender(source, values);
}

export async function renderTemplateFile(
  templateFile: string,
  destination: string,
  values: TemplateValues
): Promise<string> {
  const source = await readTextFile(templateFile);
  const rendered = await renderTemplate(source, values);
  await writeFile(destination, rendered);
  return destination;
}
