/**
 * Interactive yes/no confirmation
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';
import type { ConfirmStrategy } from '@mediasync/acquisition';

export function isAffirmative(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'Y';
}

/**
 * Default is no: anything but y/Y, and end of input, declines
 */
export function confirmPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): ConfirmStrategy {
  return (message) => new Promise<boolean>((resolve) => {
    const rl = createInterface({ input, output });
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        resolve(false);
      }
    });

    output.write(`\n${chalk.yellow(message)}\n`);
    rl.question('Do you want to proceed anyway? [y/N]: ', (answer) => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}
