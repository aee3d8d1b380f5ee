/**
 * serve command - Start the upload web server
 *
 * @module
 */

import chalk from "chalk";
import ora from "ora";
import { startReconcileServer } from "../../web/index.js";
import { createLogger, loadServerConfig } from "../../utils/index.js";

export interface ServeOptions {
  port?: number;
  host?: string;
  debug?: boolean;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  if (options.debug) {
    process.env.LOG_LEVEL = "debug";
  }

  const logger = createLogger("cli:serve");
  const config = loadServerConfig(process.env, { port: options.port, host: options.host });
  const spinner = ora("Starting server...").start();

  try {
    const { server, address } = await startReconcileServer(config);
    spinner.succeed(chalk.green("sheet-join is running"));

    console.log();
    console.log(`  ${chalk.cyan("→")} Local:   ${chalk.underline(`http://${config.host}:${address.port}`)}`);
    console.log(`  ${chalk.dim("Key column:")} ${config.keyColumnName}   ${chalk.dim("Result:")} ${config.fileName}`);
    console.log();
    if (options.debug) {
      console.log(chalk.yellow("Debug mode enabled - verbose logging active"));
      console.log();
    }
    console.log(chalk.dim("Press Ctrl+C to stop the server"));

    const shutdown = (signal: string): void => {
      logger.info({ signal }, "Shutting down");
      console.log(chalk.dim("\nShutting down..."));
      server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    spinner.fail(chalk.red("Failed to start server"));
    logger.error({ err: error }, "Serve command failed");
    throw error;
  }
}
