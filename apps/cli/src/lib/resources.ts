import path from 'node:path';

export const RESOURCES_DIR = path.resolve(__dirname, '..', '..', 'resources');

export function resourcePath(...segments: string[]): string {
  return path.join(RESOURCES_DIR, ...segments);
}

export function templatePath(name: string): string {
  return resourcePath('config', 'template', name);
}

export function dockerSourcePath(name: string): string {
  return resourcePath('docker', name);
}
