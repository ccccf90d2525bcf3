import { Command } from 'commander';
import { injectIntoPayload } from '../utils/payload.js';
import { printError, printSuccess } from '../utils/display.js';
import { parseOffset } from './inspect.js';

interface InjectOptions {
  amount: string;
  offset?: string;
}

/**
 * Register the `aequi inject` command.
 */
export function registerInjectCommand(program: Command): void {
  program
    .command('inject <payload>')
    .description('Patch an amount into a call payload, checked against the selector table')
    .requiredOption('--amount <n>', 'Amount to write, in base units')
    .option('--offset <n>', 'Declared offset (defaults to the registered one)')
    .action(async (payload: string, options: InjectOptions) => {
      try {
        if (!/^\d+$/.test(options.amount)) {
          throw new Error(`Amount must be a non-negative integer, got "${options.amount}"`);
        }
        const patched = await injectIntoPayload(payload, BigInt(options.amount), parseOffset(options.offset));
        printSuccess('Payload patched');
        console.log(patched);
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
