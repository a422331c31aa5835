import readline from 'node:readline';
import { UsageError } from './errors';

function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

export async function confirmPrompt(message: string, defaultValue = false): Promise<boolean> {
  if (!isInteractive()) {
    return defaultValue;
  }

  const suffix = defaultValue ? '[Y/n]' : '[y/N]';
  const normalized = (await ask(`${message} ${suffix} `)).trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Asks for a value until a non-empty answer is given. Without a terminal the
 * option that would have provided the value is reported as missing.
 */
export async function textPrompt(message: string, optionName: string): Promise<string> {
  if (!isInteractive()) {
    throw new UsageError(`Missing option '${optionName}'`);
  }
  for (;;) {
    const answer = (await ask(`${message}: `)).trim();
    if (answer) {
      return answer;
    }
  }
}
