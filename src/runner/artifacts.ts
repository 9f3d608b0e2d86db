/**
 * Artifact layout manager.
 *
 * Layout of an output directory:
 *   ./project_description.txt
 *   ./project_profile.json
 *   ./mock_billing.json
 *   ./cost_optimization_report.json
 *   ./logs.jsonl
 *   ./run_summary.json
 *
 * Stage documents are written as soon as their stage completes, so an
 * abort later in the run leaves the earlier artifacts in place.
 */

import { mkdirSync, writeFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { randomUUID } from 'crypto';
import { redact } from './redact.js';
import type { RunnerErrorEnvelope } from './errors.js';
import type { StageKind, StageSummary } from '../contracts/index.js';

export const ARTIFACT_FILES = {
  description: 'project_description.txt',
  profile: 'project_profile.json',
  billing: 'mock_billing.json',
  analysis: 'cost_optimization_report.json',
  logs: 'logs.jsonl',
  summary: 'run_summary.json',
} as const;

export function artifactFileFor(stage: StageKind): string {
  return ARTIFACT_FILES[stage];
}

export interface RunSummary {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  exit_code: number;
  artifact_dir: string;
  files: string[];
  stages: StageSummary[];
  error?: RunnerErrorEnvelope;
}

export interface ArtifactWriter {
  readonly dir: string;
  readonly runId: string;
  readonly logsPath: string;

  /** Write a JSON document (pretty-printed, unredacted) and return its path. */
  writeDocument(fileName: string, data: unknown): string;

  /** Write a plain-text file and return its path. */
  writeText(fileName: string, text: string): string;

  /** Write run_summary.json (redacted) and return it. */
  finalize(opts: {
    command: string;
    startedAt: string;
    exitCode: number;
    stages: StageSummary[];
    error?: RunnerErrorEnvelope;
  }): RunSummary;
}

/**
 * Run-ID from the current timestamp plus randomness.
 * Format: YYYYMMDD-HHmmss-<short-uuid>
 */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const short = randomUUID().slice(0, 8);
  return `${date}-${time}-${short}`;
}

export function createArtifactWriter(base: string, runId?: string): ArtifactWriter {
  const id = runId ?? generateRunId();
  const dir = resolve(base);
  const logsPath = join(dir, ARTIFACT_FILES.logs);

  mkdirSync(dir, { recursive: true });

  const written: string[] = [];

  function track(fileName: string): void {
    if (!written.includes(fileName)) written.push(fileName);
  }

  return {
    dir,
    runId: id,
    logsPath,

    writeDocument(fileName: string, data: unknown): string {
      const filePath = join(dir, fileName);
      writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      track(fileName);
      return filePath;
    },

    writeText(fileName: string, text: string): string {
      const filePath = join(dir, fileName);
      writeFileSync(filePath, text, 'utf-8');
      track(fileName);
      return filePath;
    },

    finalize(opts): RunSummary {
      const files = [...written];
      if (existsSync(logsPath)) files.push(ARTIFACT_FILES.logs);
      files.push(ARTIFACT_FILES.summary);

      const summary: RunSummary = {
        run_id: id,
        command: opts.command,
        started_at: opts.startedAt,
        finished_at: new Date().toISOString(),
        exit_code: opts.exitCode,
        artifact_dir: dir,
        files,
        stages: opts.stages,
        ...(opts.error && { error: opts.error }),
      };

      writeFileSync(join(dir, ARTIFACT_FILES.summary), JSON.stringify(redact(summary), null, 2) + '\n', 'utf-8');
      return summary;
    },
  };
}

/**
 * Which of the standard artifacts exist in `base`.
 */
export function listArtifacts(base: string): Array<{ file: string; present: boolean }> {
  const dir = resolve(base);
  return [
    ARTIFACT_FILES.description,
    ARTIFACT_FILES.profile,
    ARTIFACT_FILES.billing,
    ARTIFACT_FILES.analysis,
  ].map((file) => ({ file, present: existsSync(join(dir, file)) }));
}
