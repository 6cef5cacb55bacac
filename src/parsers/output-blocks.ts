import * as core from '@actions/core';
import type { TestRecords } from './types';

const BLOCK_MARKER = '----';

/**
 * Attaches captured output from `---- <name>` blocks to the records parsed
 * from the summary. Blocks without the marker are skipped.
 *
 * The output is stored even for tests that did not fail; the renderer only
 * emits it for failed ones.
 *
 * @param blocks - Every blank-line-delimited block after the summary block.
 * @throws {Error} If a header has no test name, or names a test the summary never listed.
 */
export function attachOutputBlocks(blocks: string[], records: TestRecords): TestRecords {
  blocks.forEach((block, index) => {
    if (block.slice(0, BLOCK_MARKER.length) !== BLOCK_MARKER) return;

    const [header, ...body] = block.split('\n');
    const name = header.split(' ')[1];

    if (name === undefined) {
      throw new Error(
        `❌ Malformed output block header in block ${index + 2}: "${header}"\n\n` +
        `💡 Expected the form: ${BLOCK_MARKER} <name> ...`
      );
    }

    const record = records.get(name);
    if (!record) {
      throw new Error(
        `❌ Unknown test "${name}" in output block ${index + 2}: "${header}"\n\n` +
        '💡 Every output block must name a test listed in the summary section.'
      );
    }

    record.output = body.join('\n');

    if (!record.failed) {
      core.debug(`Output block for ${name} attached to a test that did not fail`);
    }
  });

  return records;
}
