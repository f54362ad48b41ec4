#!/usr/bin/env node
import { ConfigError, USAGE, parseArgs } from './config';
import { ConsoleDevice, TerminalConsole } from './hardware/console';
import { LC3VirtualMachine } from './lc3-vm';

/**
 * Runs an image from the command line.
 * @returns 0 on halt, 1 on error, 2 when `--max-steps` ran out first
 */
export function main(args: string[], device: ConsoleDevice = new TerminalConsole()): number {
  try {
    const config = parseArgs(args);
    const vm = new LC3VirtualMachine(device, { pcStart: config.pcStart, trace: config.trace });
    vm.load(config.imagePath);

    if (vm.run(config.maxSteps)) {
      return 0;
    }
    console.error(`stopped after ${config.maxSteps} steps without halting`);
    return 2;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`error: ${message}`);
    if (err instanceof ConfigError) {
      console.error(USAGE);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
