/**
 * Database password for connection commands.
 * Reads TABLETALK_PASSWORD, then stdin when asked to, then prompts on the
 * terminal without echo.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import { usageError } from '../errors.js';

export const PASSWORD_ENV = 'TABLETALK_PASSWORD';

export function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk: string) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

function promptHidden(label: string): Promise<string> {
  let muted = false;
  // typed characters go nowhere once the label is out
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    },
  });
  const rl = createInterface({ input: process.stdin, output, terminal: true });

  return new Promise((resolve, reject) => {
    rl.on('error', reject);
    rl.question(label, (answer) => {
      rl.close();
      process.stderr.write('\n');
      resolve(answer);
    });
    muted = true;
  });
}

export async function getPassword(options: { stdin?: boolean; env?: NodeJS.ProcessEnv } = {}): Promise<string> {
  const fromEnv = (options.env ?? process.env)[PASSWORD_ENV];
  if (fromEnv) return fromEnv;

  if (options.stdin) {
    const fromStdin = await readStdin();
    if (!fromStdin) {
      throw usageError('Expected password on stdin, but received empty input.');
    }
    return fromStdin;
  }

  if (!process.stdin.isTTY) {
    throw usageError(`No password available. Set ${PASSWORD_ENV} or pass --password-stdin.`);
  }
  return promptHidden('Password: ');
}
