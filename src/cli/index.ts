#!/usr/bin/env node

/**
 * sheet-join CLI
 * Reconcile spreadsheets from the command line or start the upload server
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { mergeCommand } from "./commands/merge.js";
import { columnsCommand } from "./commands/columns.js";
import { serveCommand } from "./commands/serve.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Expected a port number between 0 and 65535.");
  }
  return port;
}

const program = new Command();

program
  .name("sheet-join")
  .description("Reconcile two spreadsheets on a normalized key column")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("merge")
  .description("Join two workbooks on their key columns and write the result")
  .argument("<primary>", "First workbook; only its rows whose key exists in the second are kept")
  .argument("<secondary>", "Second workbook")
  .requiredOption("--key1 <column>", "Key column of the first workbook")
  .requiredOption("--key2 <column>", "Key column of the second workbook")
  .option("-o, --output <file>", "Output workbook path (default: dados_completos.xlsx)")
  .option("-s, --sheet <name>", "Name of the result worksheet")
  .option("-k, --key-name <name>", "Name of the shared key column in the result")
  .action(async (primary: string, secondary: string, options: Parameters<typeof mergeCommand>[2]) => {
    await mergeCommand(primary, secondary, options);
  });

program
  .command("columns")
  .description("List the header names of a workbook")
  .argument("<file>", "Workbook to inspect")
  .option("--json", "Print JSON")
  .action(async (file: string, options: Parameters<typeof columnsCommand>[1]) => {
    await columnsCommand(file, options);
  });

program
  .command("serve")
  .description("Start the upload web server")
  .option("-p, --port <port>", "Port to listen on", parsePort)
  .option("-H, --host <host>", "Host to bind to")
  .option("-d, --debug", "Enable debug logging")
  .action(serveCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
