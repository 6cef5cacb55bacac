/**
 * Shared types for the text log parsers and the XML renderer.
 */

export interface TestRecord {
  name: string;
  passed: boolean;
  failed: boolean;
  /** Captured text from the test's `----` output block, if one was present */
  output?: string;
}

/** Keyed by test name; iteration follows first insertion. */
export type TestRecords = Map<string, TestRecord>;

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
}

export type TestOutcome = 'Pass' | 'Fail' | 'Skip';
