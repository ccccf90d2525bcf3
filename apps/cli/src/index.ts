import { Command } from 'commander';
import { registerSelectorsCommand } from './commands/selectors.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerInjectCommand } from './commands/inject.js';
import { registerConfigCommand } from './commands/config.js';
import { registerSimulateCommand } from './commands/simulate.js';

const program = new Command();

program
  .name('aequi')
  .description('Aequi - security-gated multicall executor')
  .version('0.1.0');

// Register commands
registerSelectorsCommand(program);
registerInspectCommand(program);
registerInjectCommand(program);
registerConfigCommand(program);
registerSimulateCommand(program);

// Parse and execute
await program.parseAsync();
