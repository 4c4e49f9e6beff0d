#!/usr/bin/env node
import { loadEnv } from '../config/env';
import { createClackPrompter } from '../interactive';
import { handleError } from '../utils';
import { createYtDlpRunner } from '../ytdlp';
import { createProgram } from './program';
import { executeCli } from './run';

async function run(): Promise<void> {
  const env = loadEnv();
  const program = createProgram((urls, options) =>
    executeCli(urls, options, {
      env,
      runner: createYtDlpRunner(env.ytDlpBin),
      createPrompter: createClackPrompter,
      isTTY: Boolean(process.stdin.isTTY),
      showHelp: () => program.outputHelp({ error: true }),
    })
  );

  await program.parseAsync(process.argv);
}

run().then(
  () => process.exit(0),
  (error: unknown) => handleError(error)
);
