import { resultOf, summarizeRun } from './summary';
import type { RunSummary, TestRecord, TestRecords } from '../parsers/types';

// Count attributes stay unquoted and names/output are written unescaped.

function countAttributes(summary: RunSummary): string {
  return `total=${summary.total} passed=${summary.passed} failed=${summary.failed} skipped=${summary.skipped}`;
}

function renderTest(record: TestRecord): string[] {
  const lines = [`\t\t\t<test name="${record.name}" result="${resultOf(record)}">`];

  if (record.failed) {
    if (record.output === undefined) {
      throw new Error(
        `❌ Missing output for failed test "${record.name}"\n\n` +
        `💡 Add a "---- ${record.name}" block with the captured output after the summary section.`
      );
    }

    lines.push(
      '\t\t\t\t<failure>',
      `\t\t\t\t\t<message>${record.output}</message>`,
      '\t\t\t\t</failure>'
    );
  }

  lines.push('\t\t\t</test>');
  return lines;
}

/**
 * Renders the complete report in memory. Nothing is written here, so a
 * failure leaves no partial document behind.
 */
export function renderXmlReport(records: TestRecords): string {
  const counts = countAttributes(summarizeRun(records));

  const lines = [
    '<assemblies>',
    `\t<assembly ${counts}>`,
    `\t\t<collection ${counts}>`,
    ...[...records.values()].flatMap(renderTest),
    '\t\t</collection>',
    '\t</assembly>',
  ];

  return lines.map((line) => `${line}\n`).join('') + '</assemblies>';
}
