import { Command } from 'commander';
import chalk from 'chalk';
import { inspectPayload } from '../utils/payload.js';
import { printError, printField, printWarning } from '../utils/display.js';

interface InspectOptions {
  offset?: string;
}

export function parseOffset(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const offset = Number(raw);
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new Error(`Offset must be a non-negative integer, got "${raw}"`);
  }
  return offset;
}

/**
 * Register the `aequi inspect` command.
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <payload>')
    .description('Show the selector, registered offset and amount word of a call payload')
    .option('--offset <n>', 'Byte offset to read instead of the registered one')
    .action((payload: string, options: InspectOptions) => {
      try {
        const info = inspectPayload(payload, parseOffset(options.offset));

        printField('Selector', info.selector + (info.signature ? chalk.gray(`  ${info.signature}`) : ''));
        printField('Registered offset', info.registeredOffset === undefined ? 'none' : String(info.registeredOffset));
        printField('Length', `${info.length} bytes`);
        if (info.offset !== undefined) {
          printField(
            `Word at ${info.offset}`,
            info.word === undefined ? chalk.red('does not fit') : info.word.toString()
          );
        } else {
          printWarning('Selector is not registered for injection');
        }
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
