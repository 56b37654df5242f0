#!/usr/bin/env node
import { CliError, errorEnvelope } from './errors.js';
import { createProgram } from './program.js';

async function run() {
  await createProgram().parseAsync(process.argv);
}

run().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(JSON.stringify(errorEnvelope(error.code, error.message, error.details), null, 2));
    process.exit(error.exitCode);
  }

  const message = error instanceof Error ? error.message : 'Unknown CLI error';
  console.error(JSON.stringify(errorEnvelope('UNEXPECTED_ERROR', message), null, 2));
  process.exit(1);
});
