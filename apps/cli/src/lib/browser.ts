import { spawn } from 'node:child_process';
import { getLogger } from './logger';

function openerFor(platform: NodeJS.Platform, url: string): { command: string; args: string[] } {
  if (platform === 'darwin') {
    return { command: 'open', args: [url] };
  }
  if (platform === 'win32') {
    return { command: 'cmd', args: ['/c', 'start', '', url] };
  }
  return { command: 'xdg-open', args: [url] };
}

/** Hands the url to the desktop's default browser without waiting for it. */
export function openBrowser(url: string, platform: NodeJS.Platform = process.platform): void {
  const { command, args } = openerFor(platform, url);
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.once('error', (err) => {
    getLogger().warn(`Unable to open a browser with ${command}: ${err.message}`);
  });
  child.unref();
}
