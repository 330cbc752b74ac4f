#!/usr/bin/env node
import { Effect } from 'effect';
import { parseCliArgs, USAGE } from './lib/Cli/CliArgs.js';
import {
  EXIT_PRECONDITION_FAILED,
  EXIT_PROCESSING_FAILED,
  runCli,
} from './lib/Cli/CliProgram.js';

const BAR_WIDTH = 30;

const renderProgress = (fraction: number): void => {
  if (!process.stderr.isTTY) return;
  const filled = Math.round(fraction * BAR_WIDTH);
  const bar = '#'.repeat(filled) + '-'.repeat(BAR_WIDTH - filled);
  process.stderr.write(`\r[${bar}] ${Math.round(fraction * 100)}%`);
  if (fraction >= 1) process.stderr.write('\n');
};

async function main(): Promise<number> {
  const parsed = await Effect.runPromise(Effect.either(parseCliArgs(process.argv.slice(2))));
  if (parsed._tag === 'Left') {
    console.error(`linkscan: ${parsed.left.message}\n`);
    console.error(USAGE);
    return EXIT_PRECONDITION_FAILED;
  }

  const options = parsed.right;
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    if (process.stderr.isTTY) process.stderr.write('\n');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await Effect.runPromise(
      runCli(
        options,
        {
          stdout: (line) => console.log(line),
          stderr: (line) => console.error(line),
        },
        { signal: controller.signal, onProgress: renderProgress }
      )
    );
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('linkscan failed:', error);
    process.exitCode = EXIT_PROCESSING_FAILED;
  }
);
