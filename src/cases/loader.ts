import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import type { TestCase } from '../schema/index.js';
import {
  testCaseListDocumentSchema,
  testCaseSchema,
  testCaseWrapperDocumentSchema,
} from '../schema/index.js';
import { errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { DEFAULT_TEST_CASES } from './defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface LoadedTestCases {
  testCases: TestCase[];
  /** Documents that contributed at least one case, in load order. */
  files: string[];
  usedDefaults: boolean;
}

const DOCUMENT_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

// ── Document normalization ───────────────────────────────────

/**
 * Flatten one parsed document into raw case records: a list, an
 * object wrapping `test_cases`, or a single case.
 */
export function normalizeDocument(document: unknown): unknown[] {
  const list = testCaseListDocumentSchema.safeParse(document);
  if (list.success) return list.data;

  const wrapper = testCaseWrapperDocumentSchema.safeParse(document);
  if (wrapper.success) return wrapper.data.test_cases;

  return [document];
}

function validateRecords(records: readonly unknown[], source: string): TestCase[] {
  const valid: TestCase[] = [];

  for (const [i, record] of records.entries()) {
    const parsed = testCaseSchema.safeParse(record);
    if (parsed.success) {
      valid.push(parsed.data);
      continue;
    }
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    log.warn(`Skipping test case #${String(i + 1)} in ${source}: ${issues}`);
  }

  return valid;
}

async function parseDocumentFile(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  // Tolerate a UTF-8 BOM written by some editors
  const text = raw.replace(/^\uFEFF/, '');
  return filePath.endsWith('.json') ? JSON.parse(text) : parseYaml(text);
}

async function listDocuments(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && DOCUMENT_EXTENSIONS.has(path.extname(e.name)))
      .map((e) => e.name)
      .sort();
  } catch {
    return [];
  }
}

function defaults(): LoadedTestCases {
  return {
    testCases: DEFAULT_TEST_CASES.map((tc) => ({ ...tc, steps: [...tc.steps] })),
    files: [],
    usedDefaults: true,
  };
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Load every test-case document in `dir` (sorted by file name) into
 * one ordered list. Falls back to the built-in examples when the
 * directory is missing or yields no valid case.
 */
export async function loadTestCases(dir: string): Promise<LoadedTestCases> {
  const names = await listDocuments(dir);
  if (names.length === 0) {
    log.info(`No test case documents in ${dir}, using built-in examples`);
    return defaults();
  }

  const testCases: TestCase[] = [];
  const files: string[] = [];

  for (const name of names) {
    const filePath = path.join(dir, name);
    let document: unknown;
    try {
      document = await parseDocumentFile(filePath);
    } catch (err) {
      log.warn(`Cannot parse test case file ${name}: ${errorMessage(err)}`);
      continue;
    }

    const loaded = validateRecords(normalizeDocument(document), name);
    if (loaded.length === 0) continue;

    log.info(`Loaded ${String(loaded.length)} test case(s) from ${name}`);
    testCases.push(...loaded);
    files.push(filePath);
  }

  if (testCases.length === 0) {
    log.warn('No valid test cases loaded, using built-in examples');
    return defaults();
  }

  log.info(
    `Loaded ${String(testCases.length)} test case(s) from ${String(files.length)} file(s)`,
  );
  return { testCases, files, usedDefaults: false };
}
