import path from 'node:path';

import type { Command } from 'commander';

import type { FileConfig, TestCase, TestCaseResult } from '../schema/index.js';
import { summarizeResults } from '../schema/index.js';
import { createChatClient, loadAIConfig } from '../llm/index.js';
import { interpretStep, runSuite } from '../core/index.js';
import { loadTestCases } from '../cases/index.js';
import { createFileReporter, exitCodeFor, generateJSON, serializeJSON } from '../report/index.js';
import { PATHS, loadConfigFile, resolveSelectorProfile } from '../config/index.js';
import { ConfigurationError, SessionLaunchError, errorMessage } from '../utils/errors.js';
import { formatTimestamp } from '../utils/time.js';
import * as log from '../utils/logger.js';

// ── Shared helpers ───────────────────────────────────────────

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function readConfig(configPath: string): Promise<FileConfig> {
  // The default path may legitimately be absent; an explicit one may not.
  return loadConfigFile(configPath, { optional: configPath === PATHS.CONFIG_FILE });
}

function parsePacing(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`--pacing must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function selectCases(testCases: readonly TestCase[], ids: readonly string[]): TestCase[] {
  if (ids.length === 0) return [...testCases];
  const wanted = new Set(ids);
  return testCases.filter((tc) => wanted.has(tc.id));
}

function exitCodeForError(err: unknown): number {
  if (err instanceof ConfigurationError || err instanceof SessionLaunchError) {
    return err.exitCode;
  }
  return 4;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(results: readonly TestCaseResult[]): void {
  const passed = results.filter((r) => r.success).length;
  const failed = results.length - passed;
  const seconds = results.reduce((sum, r) => sum + r.duration, 0);

  process.stderr.write(`\n--- stepqa Result ---\n`);
  for (const r of results) {
    const status = r.success ? 'PASS' : 'FAIL';
    process.stderr.write(`${status}  ${r.id}  ${r.name}\n`);
    if (r.error !== undefined) {
      process.stderr.write(`      ${r.error}\n`);
    }
  }
  process.stderr.write(
    `Cases:   ${String(passed)} passed, ${String(failed)} failed\n`,
  );
  process.stderr.write(`Time:    ${seconds.toFixed(1)}s\n\n`);
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run test cases from the test case directory in one browser session')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--cases <dir>', 'Directory of test case documents')
    .option('--reports <dir>', 'Directory for reports and screenshots')
    .option('--case <id>', 'Run only this test case (repeatable)', collect, [])
    .option('--headless', 'Run browser headless')
    .option('--pacing <ms>', 'Delay between test cases in milliseconds')
    .option('--json', 'Output JSON to stdout')
    .action(
      async (opts: {
        config: string;
        cases?: string;
        reports?: string;
        case: string[];
        headless?: true;
        pacing?: string;
        json?: true;
      }) => {
        try {
          // 1. Config file, then CLI flags on top
          const config = await readConfig(opts.config);
          const pacingMs = parsePacing(opts.pacing, config.pacingMs);
          const headless = opts.headless ?? config.headless;
          const casesDir = path.resolve(opts.cases ?? config.testCaseDir);
          const reportsDir = path.resolve(opts.reports ?? config.reportsDir);

          // 2. AI collaborator (fails fast on missing credentials)
          const aiConfig = loadAIConfig(process.env, config.ai ?? {});
          const chat = createChatClient(aiConfig);
          log.conversation('system', `AI client initialised: ${aiConfig.provider}`);

          // 3. Test cases
          const loaded = await loadTestCases(casesDir);
          const testCases = selectCases(loaded.testCases, opts.case);
          if (testCases.length === 0) {
            process.stderr.write(
              `No test case matches ${opts.case.map((id) => `"${id}"`).join(', ')}\n`,
            );
            process.exitCode = 4;
            return;
          }

          // 4. Suite
          const results = await runSuite(testCases, {
            chat,
            reportsDir,
            session: { headless, viewport: config.viewport },
            reporter: createFileReporter({ reportsDir }),
            pacingMs,
            selectors: resolveSelectorProfile(config.selectors),
            titleMarkers: config.titleMarkers,
            failCaseOnAdvisoryError: config.failCaseOnAdvisoryError,
            advisory: {
              model: config.ai?.model,
              temperature: config.ai?.temperature,
            },
          });

          // 5. JSON to stdout if --json
          if (opts.json) {
            const summary = summarizeResults(results, formatTimestamp(new Date()));
            process.stdout.write(serializeJSON(generateJSON(results, summary)) + '\n');
          }

          // 6. Summary to stderr always
          printSummary(results);
          process.exitCode = exitCodeFor(results);
        } catch (err) {
          process.stderr.write(`Error: ${errorMessage(err)}\n`);
          process.exitCode = exitCodeForError(err);
        }
      },
    );
}

// ── Interpret command (dry run) ──────────────────────────────

export function registerInterpretCommand(program: Command): void {
  program
    .command('interpret')
    .description('Show the action each step maps to, without a browser')
    .argument('<steps...>', 'Step descriptions')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .action(async (steps: string[], opts: { config: string }) => {
      try {
        const config = await readConfig(opts.config);
        const selectors = resolveSelectorProfile(config.selectors);
        const interpretations = steps.map((step) => ({
          step,
          ...interpretStep(step, selectors),
        }));
        process.stdout.write(serializeJSON(interpretations) + '\n');
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = exitCodeForError(err);
      }
    });
}

// ── List command ─────────────────────────────────────────────

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the test cases that would run')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--cases <dir>', 'Directory of test case documents')
    .action(async (opts: { config: string; cases?: string }) => {
      try {
        const config = await readConfig(opts.config);
        const loaded = await loadTestCases(path.resolve(opts.cases ?? config.testCaseDir));
        for (const tc of loaded.testCases) {
          process.stdout.write(
            `${tc.id}\t${tc.name}\t${String(tc.steps.length)} step(s)\n`,
          );
        }
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = exitCodeForError(err);
      }
    });
}
