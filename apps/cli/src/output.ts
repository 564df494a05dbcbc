import type { Command } from 'commander';
import type { CellValue, Chart, LogLevel, ResultSet } from '@salesask/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

/** Log level implied by the output flags, if any */
export function logLevelFromOutput(output: OutputOptions): LogLevel | undefined {
  if (output.debug) return 'debug';
  if (output.verbose) return 'info';
  if (output.quiet) return 'error';
  return undefined;
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: CellValue[][], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

/** Table, row count line, chart directive and insight lines */
export function printResult(result: ResultSet, chart: Chart, insight: string[], output: OutputOptions): void {
  printHumanTable(
    result.columns.map((c) => c.name),
    result.rows,
    output,
  );
  printHuman('', output);
  printHuman(
    `${result.rowCount} row${result.rowCount !== 1 ? 's' : ''} returned` +
      (result.truncated ? ' (truncated)' : '') +
      ` in ${result.execMs}ms`,
    output,
  );
  printHuman(`Chart: ${describeChart(chart)}`, output);
  if (insight.length > 0) {
    printHuman('', output);
    printHuman('Insights:', output);
    for (const line of insight) {
      printHuman(`  • ${line}`, output);
    }
  }
}

export function describeChart(chart: Chart): string {
  switch (chart.kind) {
    case 'bar':
      return `bar (category: ${chart.categoryAxis}, value: ${chart.valueAxis})`;
    case 'line':
      return `line (time: ${chart.timeAxis}, value: ${chart.valueAxis}${chart.series ? `, series: ${chart.series}` : ''})`;
    case 'pie':
      return `pie (label: ${chart.label}, value: ${chart.value})`;
    case 'scatter':
      return `scatter (x: ${chart.x}, y: ${chart.y})`;
    case 'table':
      return 'table only';
  }
}

export function printError(error: unknown, output: OutputOptions): void {
  const isCliError = error instanceof CliError;
  const message = isCliError ? error.message : error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? error.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

/** JSON success envelope; human output is printed by each command */
export function printCommandSuccess(value: unknown): void {
  printJson({ ok: true, data: value });
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
