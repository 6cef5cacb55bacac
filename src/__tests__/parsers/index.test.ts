import { describe, it, expect, vi } from 'vitest';
import path from 'path';

vi.mock('@actions/core');

import { parseTestLog, readTestLog, splitBlocks } from '../../parsers/index';

const FIXTURES_DIR = path.join(__dirname, '../test-data');

// ============================================================================
// splitBlocks
// ============================================================================

describe('splitBlocks', () => {
  it('splits on blank lines', () => {
    expect(splitBlocks('a\nb\n\nc\n\nd')).toEqual(['a\nb', 'c', 'd']);
  });

  it('always yields a summary block for empty input', () => {
    expect(splitBlocks('')).toEqual(['']);
  });
});

// ============================================================================
// parseTestLog
// ============================================================================

describe('parseTestLog', () => {
  it('parses a passing log', () => {
    const records = parseTestLog('test foo ... ok\n\n');
    expect([...records.values()]).toEqual([{ name: 'foo', passed: true, failed: false }]);
  });

  it('attaches output blocks to failed tests', () => {
    const records = parseTestLog('test bar ... FAILED\n\n---- bar\nassertion failed: x != y\n');
    expect(records.get('bar')).toEqual({
      name: 'bar',
      passed: false,
      failed: true,
      output: 'assertion failed: x != y\n',
    });
  });

  it('never reads summary lines from later blocks', () => {
    const records = parseTestLog('test a ... ok\n\ntest b ... ok');
    expect([...records.keys()]).toEqual(['a']);
  });

  it('returns no records for an empty log', () => {
    expect(parseTestLog('').size).toBe(0);
  });
});

// ============================================================================
// readTestLog
// ============================================================================

describe('readTestLog — mixed fixture', () => {
  it('reads every summary line in order', async () => {
    const records = await readTestLog(path.join(FIXTURES_DIR, 'mixed.txt'));
    expect([...records.keys()]).toEqual([
      'parser::reads_header',
      'parser::rejects_empty',
      'cache::evicts',
      'cache::hits',
    ]);
  });

  it('captures the failure output', async () => {
    const records = await readTestLog(path.join(FIXTURES_DIR, 'mixed.txt'));
    expect(records.get('parser::rejects_empty')?.output).toBe(
      "thread 'parser::rejects_empty' panicked\nexpected Err, got Ok(())"
    );
  });

  it('classifies the ignored test as neither passed nor failed', async () => {
    const records = await readTestLog(path.join(FIXTURES_DIR, 'mixed.txt'));
    expect(records.get('cache::evicts')).toEqual({ name: 'cache::evicts', passed: false, failed: false });
  });
});

describe('readTestLog — errors', () => {
  it('throws when the file does not exist', async () => {
    const missing = path.join(FIXTURES_DIR, 'does-not-exist.txt');
    await expect(readTestLog(missing)).rejects.toThrow(`Input file not found: "${missing}"`);
  });

  it('throws when an output block names an unknown test', async () => {
    await expect(readTestLog(path.join(FIXTURES_DIR, 'unknown-test.txt'))).rejects.toThrow(
      'Unknown test "cache::misses"'
    );
  });
});
