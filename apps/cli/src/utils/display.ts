import chalk from 'chalk';
import Table from 'cli-table3';

const THEME = {
  primary: chalk.hex('#0ea5e9'),
  secondary: chalk.hex('#7dd3fc'),
  success: chalk.hex('#10b981'),
  warning: chalk.hex('#f59e0b'),
  error: chalk.hex('#ef4444'),
  muted: chalk.gray,
};

export function printBanner(): void {
  console.log('');
  console.log(THEME.primary('  ╔══════════════════════════════════════╗'));
  console.log(THEME.primary('  ║') + THEME.secondary('      AEQUI - Multicall Executor      ') + THEME.primary('║'));
  console.log(THEME.primary('  ╚══════════════════════════════════════╝'));
  console.log('');
}

/**
 * Shorten a hex string for table cells.
 */
export function shortHex(value: string, keep: number = 10): string {
  if (value.length <= keep * 2 + 3) return value;
  return `${value.slice(0, keep)}...${value.slice(-keep + 2)}`;
}

export function printSection(title: string): void {
  console.log(THEME.primary.bold(`  ${title}`));
  console.log('');
}

export function printField(label: string, value: string): void {
  console.log(THEME.primary(`  ${label}: `) + chalk.white(value));
}

export function printInfo(message: string): void {
  console.log(THEME.secondary('  i ') + message);
}

export function printSuccess(message: string): void {
  console.log(THEME.success('  + ') + message);
}

export function printWarning(message: string): void {
  console.log(THEME.warning('  ! ') + message);
}

export function printError(message: string): void {
  console.log(THEME.error('  x ') + message);
}

/**
 * Print a formatted table with headers and rows.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}
