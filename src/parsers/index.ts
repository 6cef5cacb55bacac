import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parseSummaryBlock } from './summary';
import { attachOutputBlocks } from './output-blocks';
import type { TestRecords } from './types';

export type { RunSummary, TestOutcome, TestRecord, TestRecords } from './types';
export { classifyOutcome, parseSummaryBlock } from './summary';
export { attachOutputBlocks } from './output-blocks';

const BLOCK_SEPARATOR = '\n\n';

/**
 * Splits a test log into blank-line-delimited blocks. The first block is
 * always the summary block, even when the log is empty.
 */
export function splitBlocks(text: string): string[] {
  return text.split(BLOCK_SEPARATOR);
}

/**
 * Parses a whole test log: summary lines first, then the output blocks that
 * follow it.
 */
export function parseTestLog(text: string): TestRecords {
  const [summary, ...outputBlocks] = splitBlocks(text);
  const records = parseSummaryBlock(summary);
  return attachOutputBlocks(outputBlocks, records);
}

/**
 * Reads a test log from disk in full and parses it.
 */
export async function readTestLog(filePath: string): Promise<TestRecords> {
  if (!existsSync(filePath)) {
    throw new Error(
      `❌ Input file not found: "${filePath}"\n\n` +
      '💡 Make sure your test step writes its summary to this file before the conversion runs.'
    );
  }

  let contents: string;
  try {
    contents = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `❌ Failed to read input file "${filePath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseTestLog(contents);
}
