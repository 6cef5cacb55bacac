import * as core from '@actions/core';
import { writeFile } from 'fs/promises';
import { readTestLog } from './parsers';
import { summarizeRun } from './report/summary';
import { renderXmlReport } from './report/xml';
import type { ReportPaths } from './config';
import type { RunSummary, TestRecords } from './parsers';

export interface ConversionResult {
  summary: RunSummary;
  records: TestRecords;
  outputPath: string;
}

/**
 * Converts the text log at `inputPath` into the XML report at `outputPath`.
 * The destination is only opened once the whole report has been rendered,
 * and is then overwritten in place.
 */
export async function convertReport(paths: ReportPaths): Promise<ConversionResult> {
  core.info(`📄 Reading ${paths.inputPath}`);
  const records = await readTestLog(paths.inputPath);

  const summary = summarizeRun(records);
  core.info(
    `🧪 ${summary.total} tests: ${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`
  );

  const xml = renderXmlReport(records);

  try {
    await writeFile(paths.outputPath, xml, 'utf-8');
  } catch (error) {
    throw new Error(
      `❌ Failed to write report "${paths.outputPath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  core.info(`✅ Wrote ${paths.outputPath}`);

  return { summary, records, outputPath: paths.outputPath };
}
