/**
 * Interactive password prompt utility.
 * Reads the password from ASKDB_DB_PASSWORD or prompts on stderr without echo.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export function getPassword(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const envPw = env.ASKDB_DB_PASSWORD;
  if (envPw) {
    return Promise.resolve(envPw);
  }

  return new Promise((resolve, reject) => {
    // typed characters go nowhere
    const silent = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    const rl = createInterface({ input: process.stdin, output: silent, terminal: true });

    process.stderr.write('Password: ');
    rl.question('', (answer) => {
      process.stderr.write('\n');
      rl.close();
      resolve(answer);
    });

    rl.on('error', reject);
  });
}
