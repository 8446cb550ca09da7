#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { evaluateCommand } from './cli/commands/evaluate.js';
import { baselinesCommand } from './cli/commands/baselines.js';
import { splitWideCommand } from './cli/commands/split-wide.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
variant-bench - Benchmark variant effect predictors against truth labels

Usage:
  variant-bench <command> [options]

Commands:
  evaluate, ev      Evaluate prediction files and write metrics, report and manifest
  baselines, bl     Generate random and position baseline predictions
  split-wide, sw    Split a wide score table into per-tool prediction files
  help, -h          Show this help

Options:
  --version, -V     Show version information

Run 'variant-bench <command> --help' for command options.
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    printVersion();
    return;
  }

  let exitCode = 0;
  switch (command) {
    case 'evaluate':
    case 'ev':
      exitCode = await evaluateCommand(args.slice(1));
      break;

    case 'baselines':
    case 'bl':
      exitCode = await baselinesCommand(args.slice(1));
      break;

    case 'split-wide':
    case 'sw':
      exitCode = await splitWideCommand(args.slice(1));
      break;

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
