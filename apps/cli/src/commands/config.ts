import { Command } from 'commander';
import { loadConfig, toExecutorConfig } from '../utils/config.js';
import { printBanner, printError, printSection, printTable } from '../utils/display.js';

/**
 * Register the `aequi config` command.
 */
export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the effective executor configuration (.env and AEQUI_* variables)')
    .action(() => {
      try {
        const config = loadConfig();
        const executor = toExecutorConfig(config);

        printBanner();
        printSection('EXECUTOR CONFIG');
        printTable(
          ['Setting', 'Value'],
          [
            ['maxPulls', String(executor.maxPulls)],
            ['maxApprovals', String(executor.maxApprovals)],
            ['maxCalls', String(executor.maxCalls)],
            ['maxFlushTokens', String(executor.maxFlushTokens)],
            ['logLevel', config.logLevel],
            ['verbose', String(executor.verbose)],
          ]
        );
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
