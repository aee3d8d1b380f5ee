/**
 * columns command - List the header names of a workbook
 */

import chalk from "chalk";
import * as fs from "node:fs";
import { createSpreadsheetCodec } from "../../core/spreadsheet/index.js";
import { createLogger } from "../../utils/index.js";

const logger = createLogger("cli:columns");

export interface ColumnsOptions {
  json?: boolean;
}

export async function columnsCommand(filePath: string, options: ColumnsOptions = {}): Promise<string[]> {
  const bytes = await fs.promises.readFile(filePath);
  const columns = await createSpreadsheetCodec().readColumns(bytes);
  logger.debug({ filePath, columns: columns.length }, "Columns read");

  if (options.json) {
    console.log(JSON.stringify({ file: filePath, columns }));
    return columns;
  }

  if (columns.length === 0) {
    console.log(chalk.yellow("No header row found."));
    return columns;
  }

  console.log(chalk.bold(`Columns in ${filePath}:`));
  columns.forEach((column, index) => {
    console.log(`  ${chalk.dim(String(index + 1).padStart(3))}  ${column}`);
  });
  return columns;
}
