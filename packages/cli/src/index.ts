import os from 'node:os';
import { exitCodeFor } from '@findfile/shared';
import { consoleOutput } from './output/console';
import { formatError } from './output/errorReport';
import { createProgram } from './program';

const program = createProgram({
  env: process.env,
  homeDir: os.homedir(),
  cwd: process.cwd(),
  output: consoleOutput,
});

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    for (const line of formatError(e)) {
      console.error(line);
    }
    process.exit(exitCodeFor(e));
  }
}

void main();
