#!/usr/bin/env node
/**
 * costplan CLI
 *
 * Commands:
 *   costplan run     [--description <text>] [--description-file <path>] [--out <dir>] [--json]
 *   costplan analyze --billing <path> --budget <inr> [--json]
 *   costplan report  [--out <dir>] [--full] [--json]
 *   costplan status  [--out <dir>] [--json]
 *
 * Exit codes:
 *   0   success
 *   2   configuration or validation error, missing input
 *   3   I/O failure
 *   4   unexpected bug (including a fallback that breaks its constraint)
 *   130 interrupted
 */

import { Command } from 'commander';
import { join, resolve } from 'path';
import { z } from 'zod';
import { loadConfig, configSummary, type AppConfig } from './config/index.js';
import { createGateway } from './generation/gateway.js';
import { runPipeline, billingMonthOf } from './stages/pipeline.js';
import { analyze } from './analysis/index.js';
import { readDescription, readJsonFile, readTextFile } from './io/index.js';
import { renderAnalysis, renderRecommendations, renderReportSummary } from './report/index.js';
import { BillingRecordSchema, CostReportSchema, type StageSummary } from './contracts/index.js';
import {
  ARTIFACT_FILES,
  createArtifactWriter,
  createLogger,
  listArtifacts,
  wrapError,
  exitCodeFor,
  PipelineError,
  EXIT_SUCCESS,
  type ArtifactWriter,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from './runner/index.js';

interface RunOptions {
  description?: string;
  descriptionFile?: string;
  out: string;
  json?: boolean;
}

interface AnalyzeOptions {
  billing: string;
  budget: string;
  json?: boolean;
}

interface ReportOptions {
  out: string;
  full?: boolean;
  json?: boolean;
}

interface StatusOptions {
  out: string;
  json?: boolean;
}

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('costplan')
  .description('Cloud cost planner - project profile, synthetic billing and optimisation report')
  .version('0.1.0');

// ---------------------------------------------------------------------------
// run: all three stages
// ---------------------------------------------------------------------------

program
  .command('run')
  .description('Profile a project description, simulate its bill and produce a cost report')
  .addHelpText(
    'after',
    '\nExample:\n  costplan run --description "A small Django app on PostgreSQL, budget Rs. 20000 per month" --out ./plan\n',
  )
  .option('--description <text>', 'Project description')
  .option('--description-file <path>', 'Read the project description from a file')
  .option('--out <dir>', 'Output directory', '.')
  .option('--json', 'Emit structured JSON to stdout')
  .action(async (options: RunOptions) => {
    const startedAt = new Date().toISOString();

    // Before any artifact exists.
    let config: AppConfig;
    try {
      config = loadConfig();
    } catch (err) {
      exitWithEnvelope(wrapError(err), options.json);
    }

    const aw = createArtifactWriter(resolve(options.out));
    const log = createLogger({
      module: 'costplan',
      filePath: aw.logsPath,
      json: options.json,
      runId: aw.runId,
      minLevel: config.logLevel,
    });
    const stages: StageSummary[] = [];

    const controller = new AbortController();
    const onInterrupt = (): void => {
      log.warn('run.interrupt', 'Interrupt received; stopping the current stage');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const description = await resolveDescription(options, controller.signal);
      log.info('run.start', 'Starting cost planning run', { config: configSummary(config) });

      const result = await runPipeline({
        description,
        config,
        gateway: createGateway(config),
        logger: log,
        writer: aw,
        billingMonth: billingMonthOf(new Date()),
        signal: controller.signal,
        onStageComplete: (stage) => {
          stages.push(stage);
          if (!options.json) console.error(`  [${stage.origin}] ${stage.stage} -> ${stage.artifact}`);
        },
      });

      const summary = aw.finalize({ command: 'run', startedAt, exitCode: EXIT_SUCCESS, stages });

      if (options.json) {
        process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
      } else {
        console.log('');
        for (const line of renderReportSummary(result.report)) console.log(line);
        console.log(`\nArtifacts: ${aw.dir}`);
      }
      process.exit(EXIT_SUCCESS);
    } catch (err) {
      handleError(err, 'run', startedAt, aw, log, stages, options.json);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

// ---------------------------------------------------------------------------
// analyze: engine only, no inference service
// ---------------------------------------------------------------------------

program
  .command('analyze')
  .description('Summarise an existing billing ledger against a budget (no network)')
  .addHelpText('after', '\nExample:\n  costplan analyze --billing ./mock_billing.json --budget 50000\n')
  .requiredOption('--billing <path>', 'Path to a billing ledger JSON file')
  .requiredOption('--budget <inr>', 'Monthly budget in INR')
  .option('--json', 'Emit structured JSON to stdout')
  .action((options: AnalyzeOptions) => {
    try {
      const budget = Number(options.budget);
      if (!Number.isFinite(budget) || budget <= 0) {
        throw new PipelineError('VALIDATION_ERROR', `Budget must be a positive number, got "${options.budget}"`);
      }

      const records = readJsonFile(options.billing, z.array(BillingRecordSchema).min(1), 'Billing ledger');
      const summary = analyze(records, budget);

      if (options.json) {
        process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
      } else {
        console.log(`\nAnalysis of ${records.length} billing record(s):`);
        for (const line of renderAnalysis(summary)) console.log(`  ${line}`);
        console.log('\n  By service:');
        for (const [service, cost] of Object.entries(summary.service_costs)) {
          console.log(`    ${service}: ${cost.toFixed(2)}`);
        }
      }
    } catch (err) {
      handleCliError(err, options.json);
    }
  });

// ---------------------------------------------------------------------------
// report: show a saved report
// ---------------------------------------------------------------------------

program
  .command('report')
  .description('Show the cost report saved in an output directory')
  .option('--out <dir>', 'Output directory', '.')
  .option('--full', 'Show every recommendation with its steps', false)
  .option('--json', 'Emit structured JSON to stdout')
  .action((options: ReportOptions) => {
    try {
      const path = join(resolve(options.out), ARTIFACT_FILES.analysis);
      const report = readJsonFile(path, CostReportSchema, 'Cost report');

      if (options.json) {
        process.stdout.write(JSON.stringify(report, null, 2) + '\n');
        return;
      }
      const lines = options.full ? renderRecommendations(report) : renderReportSummary(report);
      for (const line of lines) console.log(line);
    } catch (err) {
      handleCliError(err, options.json);
    }
  });

// ---------------------------------------------------------------------------
// status: which artifacts exist
// ---------------------------------------------------------------------------

program
  .command('status')
  .description('List which artifacts exist in an output directory')
  .option('--out <dir>', 'Output directory', '.')
  .option('--json', 'Emit structured JSON to stdout')
  .action((options: StatusOptions) => {
    const dir = resolve(options.out);
    const artifacts = listArtifacts(dir);

    if (options.json) {
      process.stdout.write(JSON.stringify({ dir, artifacts }, null, 2) + '\n');
      return;
    }
    console.log('\nArtifacts:');
    for (const a of artifacts) {
      console.log(`  ${a.present ? 'OK     ' : 'MISSING'} ${a.file}`);
    }
    console.log(`\nLocation: ${dir}`);
  });

// ---------------------------------------------------------------------------
// Description input
// ---------------------------------------------------------------------------

async function resolveDescription(options: RunOptions, signal: AbortSignal): Promise<string> {
  if (options.description !== undefined) return options.description;
  if (options.descriptionFile !== undefined) return readTextFile(options.descriptionFile, 'Description file');
  if (process.stdin.isTTY) {
    console.error('Enter project description (blank line twice to finish):');
  }
  return readDescription(process.stdin, signal);
}

// ---------------------------------------------------------------------------
// Error handling helpers
// ---------------------------------------------------------------------------

function exitWithEnvelope(envelope: RunnerErrorEnvelope, json?: boolean): never {
  if (json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.code}]: ${envelope.userMessage}`);
    if (process.env.DEBUG && envelope.cause) {
      console.error(`  cause: ${envelope.cause}`);
    }
  }
  process.exit(exitCodeFor(envelope.code));
}

function handleError(
  err: unknown,
  command: string,
  startedAt: string,
  aw: ArtifactWriter,
  log: StructuredLogger,
  stages: StageSummary[],
  json?: boolean,
): never {
  const envelope = wrapError(err);
  log.error(`${command}.error`, envelope.userMessage, { code: envelope.code });

  aw.finalize({
    command,
    startedAt,
    exitCode: exitCodeFor(envelope.code),
    stages,
    error: envelope,
  });

  exitWithEnvelope(envelope, json);
}

function handleCliError(err: unknown, json?: boolean): never {
  exitWithEnvelope(wrapError(err), json);
}

await program.parseAsync();
