#!/usr/bin/env node

/**
 * salesask CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import { existsSync } from 'node:fs';
import {
  answerQuestion,
  describeResult,
  selectChart,
  summarizeDataset,
  SafetyValidator,
  formatNumber,
} from '@salesask/core';
import { EXIT_CODE_SUCCESS, fromCoreError, toExitCode, usageError, runtimeError, policyError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printResult,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { loadCliConfig, openCatalog, openPipeline, type Pipeline, type PipelineOptions } from './pipeline.js';

const VERSION = '0.1.0';

interface AskOptions {
  lang?: string;
  ai: boolean;
  data?: string;
}

interface DataOptions {
  data?: string;
}

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

async function withPipeline(
  output: OutputOptions,
  options: PipelineOptions,
  fn: (pipeline: Pipeline) => Promise<void>,
): Promise<void> {
  const pipeline = openPipeline(output, options);
  try {
    await fn(pipeline);
  } finally {
    pipeline.close();
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('salesask')
  .description('salesask — ask questions about sales data, get a table, a chart and insights')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor
  Query:    ask, run, validate
  Data:     summary, fallbacks
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment, configuration and the sales data file')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;
          const { config } = loadCliConfig(output);
          const openaiKeySet = Boolean(config.openaiApiKey);
          const dataExists = existsSync(config.dataPath);

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            openAiKeySet: openaiKeySet,
            model: config.model,
            data: { path: config.dataPath, exists: dataExists },
            limits: {
              defaultLimit: config.defaultLimit,
              maxRows: config.maxRows,
              execTimeoutMs: config.execTimeoutMs,
              translatorTimeoutMs: config.translatorTimeoutMs,
            },
          };

          if (output.json) {
            printCommandSuccess(payload);
            return;
          }

          printHuman('salesask doctor', output);
          printHuman('===============', output);
          printHuman('', output);
          printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(
            `OpenAI key: ${openaiKeySet ? 'set ✓' : 'not set (questions use the fallback catalog)'}`,
            output,
          );
          printHuman(`LLM model:  ${config.model}`, output);
          printHuman(`Data file:  ${config.dataPath} ${dataExists ? '✓' : '✗ not found'}`, output);
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Default LIMIT:       ${config.defaultLimit}`, output);
          printHuman(`  Max rows:            ${config.maxRows}`, output);
          printHuman(`  Execution timeout:   ${config.execTimeoutMs}ms`, output);
          printHuman(`  Translator timeout:  ${config.translatorTimeoutMs}ms`, output);
        });
      }),
  ),
  ['salesask doctor', 'salesask doctor --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a question — translate, validate, fall back if needed, run, chart')
      .argument('<question>', 'Question about the sales data')
      .option('--lang <tag>', 'Language of the question (e.g. en, ja)')
      .option('--no-ai', 'Skip the translator and answer from the fallback catalog')
      .option('--data <path>', 'Sales CSV file')
      .action(async function (this: Command, question: string, opts: AskOptions) {
        await runCommand(this, async (output) => {
          if (!question.trim()) {
            throw usageError('Question must not be empty.');
          }
          await withPipeline(output, { data: opts.data, ai: opts.ai }, async (pipeline) => {
            if (output.verbose) {
              printHuman(`Question: "${question}"`, output);
              printHuman(`Translator: ${pipeline.translator ? pipeline.config.model : 'off'}`, output);
            }

            const answer = await answerQuestion(
              { text: question, language: opts.lang },
              {
                resolver: pipeline.resolver,
                executor: pipeline.executor,
                catalog: pipeline.catalog,
                logger: pipeline.logger,
              },
            );

            if (answer.status === 'error') {
              throw runtimeError(answer.error.message, 'EXECUTION_FAILED', {
                attempts: answer.attempts,
                source: answer.resolution.source,
              });
            }

            const { resolution, query } = answer;
            if (output.json) {
              printCommandSuccess(
                {
                  source: resolution.source,
                  intent: resolution.intent ?? null,
                  softFailure: resolution.softFailure ?? null,
                  sql: query.sql,
                  retried: answer.retried,
                  result: answer.result,
                  chart: answer.chart,
                  insight: answer.insight,
                },
              );
              return;
            }

            const origin =
              resolution.source === 'translator' && !answer.retried
                ? `translator, model: ${pipeline.config.model}`
                : `fallback: ${query.intent ?? 'default'}`;
            printHuman(`SQL (${origin}):`, output);
            printHuman(`  ${query.sql}`, output);
            for (const warning of resolution.warnings) {
              printWarning(warning, output);
            }
            if (answer.retried) {
              printWarning('The first query failed; showing the default overview instead.', output);
            }
            if (output.verbose && resolution.softFailure) {
              printHuman(
                `Fallback reason: ${resolution.softFailure.stage} (${resolution.softFailure.reason})`,
                output,
              );
            }
            printHuman('', output);
            printResult(answer.result, answer.chart, answer.insight, output);
          });
        });
      }),
  ),
  [
    'salesask ask "monthly revenue by category"',
    'salesask ask "チャネル別の売上合計は？" --lang ja',
    'salesask ask "top categories last month" --no-ai --json',
  ],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('validate')
      .description('Check a SQL query against the safety policy without running it')
      .argument('<sql>', 'SQL query text')
      .action(async function (this: Command, sql: string) {
        await runCommand(this, async (output) => {
          const { config } = loadCliConfig(output);
          const validator = new SafetyValidator({
            defaultLimit: config.defaultLimit,
            maxLimit: config.maxRows,
          });
          const verdict = validator.validate(sql);

          if (!verdict.accepted) {
            throw policyError(verdict.reason, { code: verdict.code });
          }

          const payload = {
            accepted: true,
            sql: verdict.query.sql,
            limit: verdict.query.limit,
            limitApplied: verdict.limitApplied,
            clamped: verdict.clamped,
            warnings: verdict.warnings,
          };
          if (output.json) {
            printCommandSuccess(payload);
            return;
          }
          printHuman('Policy: ALLOWED', output);
          printHuman(`  ${verdict.query.sql}`, output);
          for (const warning of verdict.warnings) {
            printWarning(warning, output);
          }
        });
      }),
  ),
  ['salesask validate "SELECT region, SUM(revenue) FROM sales GROUP BY region"', 'salesask validate "DROP TABLE sales" --json'],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('run')
      .description('Validate and run a hand-written SQL query')
      .argument('<sql>', 'SQL query text')
      .option('--data <path>', 'Sales CSV file')
      .action(async function (this: Command, sql: string, opts: DataOptions) {
        await runCommand(this, async (output) => {
          await withPipeline(output, { data: opts.data, ai: false }, async (pipeline) => {
            const verdict = pipeline.validator.validate(sql);
            if (!verdict.accepted) {
              throw policyError(verdict.reason, { code: verdict.code });
            }
            for (const warning of verdict.warnings) {
              printWarning(warning, output);
            }

            const outcome = await pipeline.executor.execute(verdict.query);
            if (!outcome.ok) {
              const { error } = outcome;
              throw runtimeError(`Query failed (${error.kind}).`, 'EXECUTION_FAILED', {
                kind: error.kind,
                engineMessage: error.message,
              });
            }

            const { chart } = selectChart(outcome.result);
            const insight = describeResult(outcome.result, chart);
            if (output.json) {
              printCommandSuccess({ sql: verdict.query.sql, result: outcome.result, chart, insight });
              return;
            }
            printResult(outcome.result, chart, insight, output);
          });
        });
      }),
  ),
  ['salesask run "SELECT month, SUM(units) AS units FROM sales GROUP BY month"'],
);

// ── summary ──────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('summary')
      .description('Show an overview of the sales data')
      .option('--data <path>', 'Sales CSV file')
      .action(async function (this: Command, opts: DataOptions) {
        await runCommand(this, async (output) => {
          await withPipeline(output, { data: opts.data, ai: false }, async (pipeline) => {
            const summary = await summarizeDataset(pipeline.engine);
            if (output.json) {
              printCommandSuccess({ path: pipeline.config.dataPath, ...summary });
              return;
            }
            printHuman(`Data file:      ${pipeline.config.dataPath}`, output);
            printHuman(`Total records:  ${formatNumber(summary.totalRecords)}`, output);
            printHuman(`Total revenue:  ${formatNumber(summary.totalRevenue)}`, output);
            printHuman(`Date range:     ${summary.firstDate ?? '-'} to ${summary.lastDate ?? '-'}`, output);
            printHuman(`Categories:     ${summary.categories.join(', ')}`, output);
            printHuman(`Regions:        ${summary.regions.join(', ')}`, output);
            printHuman(`Sales channels: ${summary.salesChannels.join(', ')}`, output);
            printHuman(`Segments:       ${summary.customerSegments.join(', ')}`, output);
          });
        });
      }),
  ),
  ['salesask summary', 'salesask summary --data ./my_sales.csv --json'],
);

// ── fallbacks ────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('fallbacks')
      .description('List the fallback queries and sample questions')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const { config } = loadCliConfig(output);
          const catalog = openCatalog(config);
          const entries = catalog.entries();
          if (output.json) {
            printCommandSuccess({ entries, sampleQuestions: catalog.sampleQuestions() });
            return;
          }
          const fallbackIntent = catalog.defaultEntry().intent;
          for (const entry of entries) {
            const marker = entry.intent === fallbackIntent ? ' (default)' : '';
            printHuman(`${entry.intent}${marker}: ${entry.title}`, output);
            if (output.verbose) {
              printHuman(`  ${entry.sql}`, output);
              printHuman(`  keywords: ${entry.keywords.join(', ')}`, output);
            }
          }
          printHuman('', output);
          printHuman('Sample questions:', output);
          for (const q of catalog.sampleQuestions()) {
            printHuman(`  ${q}`, output);
          }
        });
      }),
  ),
  ['salesask fallbacks', 'salesask fallbacks --verbose'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();

