import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { describeExecutorError } from '@aequi/executor';
import { loadConfig, toExecutorConfig } from '../utils/config.js';
import { parsePlan, type SimulationPlan } from '../utils/plan.js';
import { runPlan, type SimulationResult } from '../utils/simulate.js';
import {
  printBanner,
  printError,
  printField,
  printInfo,
  printSection,
  printSuccess,
  printTable,
  shortHex,
} from '../utils/display.js';

/**
 * Register the `aequi simulate` command.
 *
 * Runs a plan against a fresh in-process ledger; nothing leaves the machine.
 */
export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate <plan>')
    .description('Run an execute plan (JSON) against a fresh in-process ledger')
    .action(async (planPath: string) => {
      printBanner();

      let plan: SimulationPlan;
      try {
        plan = parsePlan(JSON.parse(await readFile(planPath, 'utf8')));
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
        return;
      }

      const config = toExecutorConfig(loadConfig());
      const spinner = ora({ text: 'Building ledger...', color: 'cyan' }).start();

      let result: SimulationResult;
      try {
        result = await runPlan(plan, config, (state) => {
          switch (state.phase) {
            case 'calling':
              spinner.text = `Call ${state.index} -> ${state.target}`;
              break;
            case 'completed':
            case 'reverted':
              break;
            default:
              spinner.text = `${state.phase[0].toUpperCase()}${state.phase.slice(1)}...`;
          }
        });
      } catch (err) {
        spinner.fail('Simulation could not start');
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
        return;
      }

      const { outcome } = result;
      if (!outcome.success) {
        spinner.fail('Execute reverted');
        printField('Revert data', outcome.revertData);
        printInfo(outcome.error ? describeExecutorError(outcome.error) : 'Revert data came from a callee');
        process.exitCode = 1;
        return;
      }
      spinner.succeed(`Execute completed (${outcome.returnData.length} call(s))`);
      console.log('');

      printSection('CALL RESULTS');
      printTable(
        ['#', 'Return data'],
        outcome.returnData.map((data, i) => [String(i), shortHex(data, 24)])
      );

      if (result.report && result.report.injections.length > 0) {
        printSection('INJECTIONS');
        printTable(
          ['Call', 'Token', 'Offset', 'Amount'],
          result.report.injections.map((inj) => [
            String(inj.callIndex),
            inj.token,
            String(inj.offset),
            inj.amount.toString(),
          ])
        );
      }

      printSection('BALANCES AFTER');
      printTable(
        ['Token', 'Caller', 'Executor'],
        result.balances.map((b) => [b.symbol, b.caller.toString(), b.executor.toString()])
      );
      printField('Native returned', (result.report?.nativeReturned ?? 0n).toString());
      printField('Caller native', result.callerNative.toString());

      if (result.commitment) {
        console.log('');
        printSuccess(`Audit hash ${chalk.gray(result.commitment.hash)}`);
      }
    });
}
