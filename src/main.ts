#!/usr/bin/env node
import * as core from '@actions/core';
import { resolveReportPaths } from './config';
import { convertReport } from './convert';

/**
 * Main entry point
 */
async function run(): Promise<void> {
  try {
    const paths = resolveReportPaths();
    const { summary } = await convertReport(paths);

    core.setOutput('total', summary.total);
    core.setOutput('passed', summary.passed);
    core.setOutput('failed', summary.failed);
    core.setOutput('skipped', summary.skipped);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message.startsWith('❌') ? error.message : `❌ ${error.message}`);
    } else {
      core.setFailed('❌ Unknown error occurred');
    }
  }
}

run();
