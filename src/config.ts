import path from 'path';

/** Fixed input name, read from the working directory */
export const INPUT_FILE = 'test_results.txt';

/** Fixed output name, written to the working directory */
export const OUTPUT_FILE = 'test_results.xml';

export interface ReportPaths {
  inputPath: string;
  outputPath: string;
}

export function resolveReportPaths(cwd: string = process.cwd()): ReportPaths {
  return {
    inputPath: path.join(cwd, INPUT_FILE),
    outputPath: path.join(cwd, OUTPUT_FILE),
  };
}
