import type { RunSummary, TestOutcome, TestRecord, TestRecords } from '../parsers/types';

/**
 * Counts records by flag. `skipped` is always whatever is left over.
 */
export function summarizeRun(records: TestRecords): RunSummary {
  const all = [...records.values()];

  const total = all.length;
  const passed = all.filter((r) => r.passed).length;
  const failed = all.filter((r) => r.failed).length;

  return {
    total,
    passed,
    failed,
    skipped: total - passed - failed,
  };
}

/** Failed takes precedence over passed. */
export function resultOf(record: TestRecord): TestOutcome {
  if (record.failed) return 'Fail';
  if (record.passed) return 'Pass';
  return 'Skip';
}
