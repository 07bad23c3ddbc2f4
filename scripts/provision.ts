#!/usr/bin/env node

import path from 'path';
import { fileURLToPath } from 'url';

import { execaRunner } from './lib/process.js';
import { print, symbols } from './utils.js';
import { createProvisionRuntime } from './provision/cli-runtime.js';
import { ProvisionError } from './provision/errors.js';
import { runProvision, type ProvisionOutcome } from './provision/pipeline.js';

export function exitCodeForOutcome(outcome: ProvisionOutcome): number {
  return outcome.status === 'completed' ? 0 : 1;
}

async function main(argv = process.argv): Promise<number> {
  const { config, logger } = createProvisionRuntime(argv);

  const outcome = await runProvision(config, { runner: execaRunner, logger });

  if (outcome.status === 'aborted') {
    print(`\n${symbols.error} ${outcome.error.message}`, 'red');
    if (outcome.phase !== 'preflight') {
      print(`  ${symbols.info} Fix the problem and re-run; finished steps will be skipped.`, 'cyan');
      print(`  ${symbols.info} See log: ${config.logFile}`, 'cyan');
    }
  }

  return exitCodeForOutcome(outcome);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      if (e instanceof ProvisionError) {
        print(`${symbols.error} ${e.message}`, 'red');
      } else {
        console.error(e instanceof Error ? e.stack ?? e.message : String(e));
      }
      process.exit(1);
    }
  );
}

export { main };
