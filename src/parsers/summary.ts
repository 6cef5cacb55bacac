import * as core from '@actions/core';
import type { TestRecord, TestRecords } from './types';

const LINE_MARKER = 'test';
const LINE_PREFIX_LENGTH = 'test '.length;
const OUTCOME_SEPARATOR = '...';

/**
 * Maps a raw outcome token to its flags. Only the exact tokens `ok` and
 * `FAILED` count; anything else is neither (skipped).
 */
export function classifyOutcome(token: string): Pick<TestRecord, 'passed' | 'failed'> {
  return {
    passed: token === 'ok',
    failed: token === 'FAILED',
  };
}

/**
 * Parses the summary block (`test <name> ... <outcome>` lines) into records.
 * Lines that don't start with `test` are ignored. A repeated name replaces
 * the earlier record but keeps its original position.
 *
 * @throws {Error} If a qualifying line has no single `...` separator.
 */
export function parseSummaryBlock(block: string, records: TestRecords = new Map()): TestRecords {
  const lines = block.split('\n');

  lines.forEach((line, index) => {
    if (line.slice(0, LINE_MARKER.length) !== LINE_MARKER) return;

    const parts = line.slice(LINE_PREFIX_LENGTH).split(OUTCOME_SEPARATOR);
    if (parts.length !== 2) {
      throw new Error(
        `❌ Malformed summary line ${index + 1}: "${line}"\n\n` +
        `💡 Expected the form: test <name> ${OUTCOME_SEPARATOR} <outcome>`
      );
    }

    const [rawName, rawOutcome] = parts;
    const name = rawName.trim();
    const outcome = rawOutcome.trim();

    records.set(name, { name, ...classifyOutcome(outcome) });
    core.debug(`Parsed ${name}: ${outcome}`);
  });

  return records;
}
