import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';

export interface ReportOptions {
  /** Skip the confirmation line, e.g. when stdout carries JSON. */
  quiet?: boolean;
}

/** Write `data` as pretty JSON to `reportPath` (relative to the working directory). */
export async function writeReport(
  reportPath: string,
  data: unknown,
  label = 'Report',
  options: ReportOptions = {}
): Promise<string> {
  const outputPath = path.resolve(process.cwd(), reportPath);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(data, null, 2));
  if (!options.quiet) {
    console.log(chalk.green(`${label} written to ${outputPath}`));
  }
  return outputPath;
}
