import { Command } from 'commander';
import { DEFAULT_SELECTOR_OFFSETS } from '@aequi/registry';
import { printBanner, printSection, printTable } from '../utils/display.js';

/**
 * Register the `aequi selectors` command.
 */
export function registerSelectorsCommand(program: Command): void {
  program
    .command('selectors')
    .description('Show the default selector -> injection offset table')
    .action(() => {
      printBanner();
      printSection('SELECTOR OFFSETS');
      printTable(
        ['Selector', 'Function', 'Offset'],
        DEFAULT_SELECTOR_OFFSETS.map((e) => [e.selector, e.signature, String(e.offset)])
      );
    });
}
