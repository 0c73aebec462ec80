import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  appendHistory,
  createFileReporter,
  exitCodeFor,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../reporter.js';
import { summarizeResults } from '../../schema/index.js';
import type { SuiteSummary, TestCaseResult } from '../../schema/index.js';

const passed: TestCaseResult = {
  id: 'TC001',
  name: 'Home page',
  description: 'Open the home page',
  success: true,
  duration: 1.5,
  steps: [{ index: 1, description: 'open it', success: true, message: 'ok' }],
  startTime: '2026-01-02T03:04:00.000Z',
  endTime: '2026-01-02T03:04:01.500Z',
};

const failed: TestCaseResult = {
  id: 'TC002',
  name: 'Search | results',
  description: '',
  success: false,
  duration: 0.5,
  error: 'Element not found',
  screenshot: 'screenshots/TC002_20260102_030405.png',
  steps: [
    { index: 1, description: 'click', success: false, error: 'Element not found' },
  ],
  startTime: '2026-01-02T03:04:02.000Z',
  endTime: '2026-01-02T03:04:02.500Z',
};

const withReportsDir = async <T>(fn: (dir: string) => Promise<T>): Promise<T> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stepqa-report-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

test('summarizeResults counts outcomes and total duration', () => {
  assert.deepEqual(summarizeResults([passed, failed], 'T'), {
    timestamp: 'T',
    total: 2,
    passed: 1,
    failed: 1,
    passRate: 0.5,
    duration: 2,
  });
  assert.equal(summarizeResults([], 'T').passRate, 0);
});

test('exit code is 0 only when every case passed', () => {
  assert.equal(exitCodeFor([passed]), 0);
  assert.equal(exitCodeFor([passed, failed]), 1);
});

test('markdown lists cases, steps and the failure screenshot', () => {
  const summary = summarizeResults([passed, failed], '20260102_030405');
  const lines = generateMarkdown([passed, failed], summary).split('\n');

  assert.ok(lines.includes('| **Pass rate** | 50% |'));
  assert.ok(lines.includes('| TC001 | Home page | [PASS] | 1.50s |  |'));
  assert.ok(
    lines.includes('| TC002 | Search \\| results | [FAIL] | 0.50s | Element not found |'),
  );
  assert.ok(lines.includes('| 1 | click | [FAIL] | Element not found |'));
  assert.ok(lines.includes('![failure screenshot](screenshots/TC002_20260102_030405.png)'));
  assert.ok(!lines.some((l) => l.startsWith('| **Previous run**')));
});

test('markdown compares against the previous run when given', () => {
  const summary = summarizeResults([passed, failed], 'now');
  const previous: SuiteSummary = {
    timestamp: 'before',
    total: 2,
    passed: 2,
    failed: 0,
    passRate: 1,
    duration: 3,
  };
  const lines = generateMarkdown([passed, failed], summary, previous).split('\n');

  assert.ok(lines.includes('| **Previous run** | before: 100% (-50 pts) |'));
});

test('JSON output is versioned and serialized with sorted keys', () => {
  const summary = summarizeResults([failed], 'T');
  const output = generateJSON([failed], summary);

  assert.equal(output.version, '1.0');
  assert.equal(output.exitCode, 1);
  assert.deepEqual(output.cases[0], {
    id: 'TC002',
    name: 'Search | results',
    description: '',
    result: 'FAIL',
    durationMs: 500,
    error: 'Element not found',
    screenshot: 'screenshots/TC002_20260102_030405.png',
    startTime: '2026-01-02T03:04:02.000Z',
    endTime: '2026-01-02T03:04:02.500Z',
    steps: failed.steps,
  });

  assert.equal(serializeJSON({ b: 1, a: { d: 2, c: 3 } }), [
    '{',
    '  "a": {',
    '    "c": 3,',
    '    "d": 2',
    '  },',
    '  "b": 1',
    '}',
  ].join('\n'));
});

test('history keeps only the newest entries', () => {
  const entry = (n: number): SuiteSummary => ({
    timestamp: String(n),
    total: 1,
    passed: 1,
    failed: 0,
    passRate: 1,
    duration: 1,
  });
  const history = Array.from({ length: 50 }, (_, i) => entry(i));

  const next = appendHistory(history, entry(50));

  assert.equal(next.length, 50);
  assert.equal(next[0]?.timestamp, '1');
  assert.equal(next[49]?.timestamp, '50');
});

test('the file reporter writes report, summary and history', async () => {
  await withReportsDir(async (dir) => {
    const reporter = createFileReporter({
      reportsDir: dir,
      now: () => new Date(2026, 0, 2, 3, 4, 5),
    });

    const written = await reporter.report([passed, failed]);

    assert.deepEqual(
      written.map((f) => path.basename(f)),
      ['report_20260102_030405.md', 'summary_20260102_030405.json', 'history.json'],
    );

    const summary: unknown = JSON.parse(
      await fs.readFile(path.join(dir, 'summary_20260102_030405.json'), 'utf-8'),
    );
    assert.deepEqual(
      summary,
      generateJSON([passed, failed], summarizeResults([passed, failed], '20260102_030405')),
    );

    await reporter.report([passed]);
    const history: unknown = JSON.parse(
      await fs.readFile(path.join(dir, 'history.json'), 'utf-8'),
    );
    assert.ok(Array.isArray(history));
    assert.equal(history.length, 2);

    const markdown = await fs.readFile(
      path.join(dir, 'report_20260102_030405.md'),
      'utf-8',
    );
    assert.ok(
      markdown.split('\n').includes('| **Previous run** | 20260102_030405: 50% (+50 pts) |'),
    );
  });
});

test('the file reporter writes nothing for an empty run', async () => {
  await withReportsDir(async (dir) => {
    const written = await createFileReporter({ reportsDir: dir }).report([]);

    assert.deepEqual(written, []);
    assert.deepEqual(await fs.readdir(dir), []);
  });
});
