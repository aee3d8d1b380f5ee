/**
 * merge command - Reconcile two workbooks on disk and write the joined workbook
 */

import chalk from "chalk";
import ora from "ora";
import * as fs from "node:fs";
import * as path from "node:path";
import { createReconciler, type ReconcileStats } from "../../core/reconciliation/index.js";
import { createSpreadsheetCodec } from "../../core/spreadsheet/index.js";
import { ErrorCode, SheetJoinError } from "../../core/errors.js";
import {
  DEFAULT_RESULT_FILE_NAME,
  ReconcileOptionsSchema,
  createLogger,
  validateConfig,
} from "../../utils/index.js";

const logger = createLogger("cli:merge");

export interface MergeOptions {
  /** Key column of the primary workbook */
  key1: string;
  /** Key column of the secondary workbook */
  key2: string;
  output?: string;
  sheet?: string;
  keyName?: string;
}

export interface MergeSummary {
  outputPath: string;
  stats: ReconcileStats;
}

async function readWorkbook(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    throw new SheetJoinError(`Cannot read ${filePath}`, ErrorCode.FILE_SYSTEM_ERROR, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Reconcile `primaryPath` against `secondaryPath` and write the result
 */
export async function mergeCommand(
  primaryPath: string,
  secondaryPath: string,
  options: MergeOptions
): Promise<MergeSummary> {
  const { keyColumnName, sheetName } = validateConfig(
    ReconcileOptionsSchema,
    { keyColumnName: options.keyName, sheetName: options.sheet },
    "merge options"
  );
  const outputPath = path.resolve(options.output ?? DEFAULT_RESULT_FILE_NAME);

  logger.info({ primaryPath, secondaryPath, outputPath, keyColumnName }, "Merging workbooks");

  const codec = createSpreadsheetCodec();
  const reconciler = createReconciler({ keyColumnName });
  const spinner = ora("Reading workbooks...").start();

  try {
    const [primaryBytes, secondaryBytes] = await Promise.all([
      readWorkbook(primaryPath),
      readWorkbook(secondaryPath),
    ]);
    const [primary, secondary] = await Promise.all([
      codec.read(primaryBytes),
      codec.read(secondaryBytes),
    ]);

    spinner.text = "Reconciling...";
    const { rowSet, stats } = reconciler.reconcile({
      primary,
      secondary,
      primaryKey: options.key1,
      secondaryKey: options.key2,
    });

    spinner.text = "Writing result...";
    const output = await codec.write(rowSet, { sheetName });
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, output);

    spinner.succeed(chalk.green(`Wrote ${path.relative(process.cwd(), outputPath) || outputPath}`));

    console.log();
    console.log(chalk.bold("Reconciliation:"));
    console.log(chalk.dim("─".repeat(40)));
    console.log(`  First file rows:   ${chalk.cyan(stats.primaryRows)} (${stats.primaryMatched} matched)`);
    console.log(`  Second file rows:  ${chalk.cyan(stats.secondaryRows)} (${stats.secondaryMatched} matched)`);
    console.log(`  Common keys:       ${chalk.cyan(stats.commonKeys)}`);
    console.log(`  Result rows:       ${chalk.cyan(stats.resultRows)}`);
    console.log(chalk.dim("─".repeat(40)));

    return { outputPath, stats };
  } catch (error) {
    spinner.fail(chalk.red("Merge failed"));
    logger.error({ err: error }, "Merge failed");
    throw error;
  }
}
