import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { SuiteSummary, TestCaseResult } from '../schema/index.js';
import { summarizeResults, suiteSummarySchema } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputCase } from '../schema/jsonOutput.js';
import { LIMITS, PATHS } from '../config/defaults.js';
import { errorMessage } from '../utils/errors.js';
import { formatTimestamp } from '../utils/time.js';
import * as log from '../utils/logger.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputCase };

// ── Reporter boundary ────────────────────────────────────────

export interface Reporter {
  /** Consume the ordered results of one run; resolves to the files written. */
  report(results: readonly TestCaseResult[]): Promise<string[]>;
}

export function exitCodeFor(results: readonly TestCaseResult[]): number {
  return results.every((r) => r.success) ? 0 : 1;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  results: readonly TestCaseResult[],
  summary: SuiteSummary,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    summary,
    exitCode: exitCodeFor(results),
    cases: results.map(caseToJSON),
  };
}

function caseToJSON(result: TestCaseResult): JsonOutputCase {
  return {
    id: result.id,
    name: result.name,
    description: result.description,
    result: result.success ? 'PASS' : 'FAIL',
    durationMs: Math.round(result.duration * 1000),
    error: result.error ?? null,
    screenshot: result.screenshot ?? null,
    startTime: result.startTime,
    endTime: result.endTime,
    steps: result.steps,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(
  results: readonly TestCaseResult[],
  summary: SuiteSummary,
  previous?: SuiteSummary,
): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# stepqa Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Run** | ${summary.timestamp} |`);
  lines.push(`| **Total** | ${String(summary.total)} |`);
  lines.push(`| **Passed** | ${String(summary.passed)} |`);
  lines.push(`| **Failed** | ${String(summary.failed)} |`);
  lines.push(`| **Pass rate** | ${formatRate(summary.passRate)} |`);
  lines.push(`| **Duration** | ${formatSeconds(summary.duration)} |`);
  if (previous) {
    lines.push(
      `| **Previous run** | ${previous.timestamp}: ${formatRate(previous.passRate)} (${formatDelta(summary.passRate - previous.passRate)}) |`,
    );
  }
  lines.push('');

  // Case summary table
  lines.push(`## Test Cases`);
  lines.push('');
  lines.push(`| ID | Name | Result | Duration | Error |`);
  lines.push(`|----|------|--------|----------|-------|`);

  for (const r of results) {
    lines.push(
      `| ${escapeMarkdownCell(r.id)} | ${escapeMarkdownCell(r.name)} | ${verdictIcon(r.success)} | ${formatSeconds(r.duration)} | ${escapeMarkdownCell(r.error ?? '')} |`,
    );
  }

  lines.push('');

  // Per-case details
  lines.push(`## Details`);
  lines.push('');

  for (const r of results) {
    lines.push(`### ${r.id}: ${r.name} ${verdictIcon(r.success)}`);
    lines.push('');
    if (r.description.length > 0) {
      lines.push(r.description);
      lines.push('');
    }

    if (r.steps.length > 0) {
      lines.push(`| # | Step | Result | Message |`);
      lines.push(`|---|------|--------|---------|`);
      for (const s of r.steps) {
        const note = s.success ? (s.message ?? '') : (s.error ?? '');
        lines.push(
          `| ${String(s.index)} | ${escapeMarkdownCell(s.description)} | ${verdictIcon(s.success)} | ${escapeMarkdownCell(note)} |`,
        );
      }
      lines.push('');
    }

    if (r.screenshot !== undefined) {
      lines.push(`![failure screenshot](${r.screenshot})`);
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── History ──────────────────────────────────────────────────

const historySchema = z.array(suiteSummarySchema);

export async function loadHistory(historyPath: string): Promise<SuiteSummary[]> {
  let raw: string;
  try {
    raw = await readFile(historyPath, 'utf-8');
  } catch {
    return [];
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return historySchema.parse(parsed);
  } catch (err) {
    log.warn(`Ignoring unreadable run history ${historyPath}: ${errorMessage(err)}`);
    return [];
  }
}

export function appendHistory(
  history: readonly SuiteSummary[],
  entry: SuiteSummary,
): SuiteSummary[] {
  return [...history, entry].slice(-LIMITS.MAX_HISTORY_ENTRIES);
}

// ── File reporter ────────────────────────────────────────────

export interface FileReporterConfig {
  reportsDir: string;
  now?: (() => Date) | undefined;
}

/**
 * Write a markdown report, a JSON summary and the run history
 * under the reports directory.
 */
export function createFileReporter(config: FileReporterConfig): Reporter {
  const now = config.now ?? (() => new Date());

  return {
    async report(results: readonly TestCaseResult[]): Promise<string[]> {
      if (results.length === 0) {
        log.warn('No test results to report');
        return [];
      }

      await mkdir(config.reportsDir, { recursive: true });

      const timestamp = formatTimestamp(now());
      const summary = summarizeResults(results, timestamp);

      const historyPath = path.join(config.reportsDir, PATHS.HISTORY_FILE);
      const history = await loadHistory(historyPath);
      const previous = history[history.length - 1];

      const markdownPath = path.join(config.reportsDir, `report_${timestamp}.md`);
      await writeFile(
        markdownPath,
        generateMarkdown(results, summary, previous),
        'utf-8',
      );

      const jsonPath = path.join(config.reportsDir, `summary_${timestamp}.json`);
      await writeFile(
        jsonPath,
        serializeJSON(generateJSON(results, summary)) + '\n',
        'utf-8',
      );

      await writeFile(
        historyPath,
        JSON.stringify(appendHistory(history, summary), null, 2) + '\n',
        'utf-8',
      );

      return [markdownPath, jsonPath, historyPath];
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function verdictIcon(success: boolean): string {
  return success ? '[PASS]' : '[FAIL]';
}

function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

function formatRate(value: number): string {
  return `${String(Math.round(value * 100))}%`;
}

function formatDelta(value: number): string {
  const points = Math.round(value * 100);
  return `${points >= 0 ? '+' : ''}${String(points)} pts`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
