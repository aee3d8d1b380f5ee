/**
 * Reconcile HTTP Server
 *
 * Minimal HTTP front end: an upload form, the reconcile endpoint that
 * returns the joined workbook as an attachment, a column listing used by
 * the form, and a health check. Uses Node's built-in http module.
 *
 * @module
 */

import * as http from "node:http";
import * as fs from "node:fs";
import * as path from "node:path";
import type { AddressInfo } from "node:net";
import { fileURLToPath } from "node:url";
import type { IReconciler } from "../core/reconciliation/index.js";
import { createReconciler } from "../core/reconciliation/index.js";
import type { ISpreadsheetCodec } from "../core/spreadsheet/index.js";
import { XLSX_CONTENT_TYPE, createSpreadsheetCodec } from "../core/spreadsheet/index.js";
import {
  ErrorCode,
  RequestError,
  SpreadsheetError,
  isReconciliationError,
  wrapError,
} from "../core/errors.js";
import type { ServerConfig } from "../utils/validation.js";
import { createLogger, type Logger } from "../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

interface RouteHandler {
  (req: http.IncomingMessage, res: http.ServerResponse): Promise<void>;
}

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

export interface ReconcileServerDeps {
  reconciler?: IReconciler;
  codec?: ISpreadsheetCodec;
  logger?: Logger;
}

/**
 * Multipart field names accepted by POST /reconcile
 */
export const FORM_FIELDS = {
  primaryFile: "file1",
  secondaryFile: "file2",
  primaryKey: "keyColumn1",
  secondaryKey: "keyColumn2",
  columnsFile: "file",
} as const;

// =============================================================================
// ReconcileServer Class
// =============================================================================

export class ReconcileServer {
  private config: ServerConfig;
  private reconciler: IReconciler;
  private codec: ISpreadsheetCodec;
  private logger: Logger;
  private server: http.Server | null = null;
  private routes: Route[] = [];
  private staticDir: string;

  constructor(config: ServerConfig, deps: ReconcileServerDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger("web");
    this.reconciler = deps.reconciler ?? createReconciler({ keyColumnName: config.keyColumnName });
    this.codec = deps.codec ?? createSpreadsheetCodec();

    const __filename = fileURLToPath(import.meta.url);
    this.staticDir = path.join(path.dirname(__filename), "public");

    this.setupRoutes();
  }

  // ===========================================================================
  // Route Setup
  // ===========================================================================

  private setupRoutes(): void {
    this.addRoute("GET", "/", this.handleIndex.bind(this));
    this.addRoute("POST", "/reconcile", this.handleReconcile.bind(this));
    this.addRoute("POST", "/api/columns", this.handleColumns.bind(this));
    this.addRoute("GET", "/api/health", this.handleHealth.bind(this));
  }

  private addRoute(method: string, routePath: string, handler: RouteHandler): void {
    this.routes.push({ method, path: routePath, handler });
  }

  // ===========================================================================
  // Request Handling
  // ===========================================================================

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method || "GET";

    const route = this.routes.find((r) => r.path === url.pathname && r.method === method);
    if (!route) {
      const allowed = this.routes.some((r) => r.path === url.pathname);
      this.sendJSON(
        res,
        { error: allowed ? "Method Not Allowed" : "Not Found", code: ErrorCode.REQUEST_INVALID },
        allowed ? 405 : 404
      );
      return;
    }

    try {
      await route.handler(req, res);
    } catch (error) {
      this.sendFailure(res, error, url.pathname);
    }
  }

  private async handleIndex(_req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const content = await fs.promises.readFile(path.join(this.staticDir, "index.html"));
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(content);
  }

  private async handleReconcile(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const form = await this.readForm(req);
    const primaryKey = this.textField(form, FORM_FIELDS.primaryKey);
    const secondaryKey = this.textField(form, FORM_FIELDS.secondaryKey);
    const [primaryBytes, secondaryBytes] = await Promise.all([
      this.fileField(form, FORM_FIELDS.primaryFile),
      this.fileField(form, FORM_FIELDS.secondaryFile),
    ]);

    const [primary, secondary] = await Promise.all([
      this.codec.read(primaryBytes),
      this.codec.read(secondaryBytes),
    ]);
    this.logger.info(
      { primaryRows: primary.rows.length, secondaryRows: secondary.rows.length, primaryKey, secondaryKey },
      "Workbooks loaded"
    );

    const { rowSet, stats } = this.reconciler.reconcile({ primary, secondary, primaryKey, secondaryKey });
    const output = await this.codec.write(rowSet, { sheetName: this.config.sheetName });

    res.writeHead(200, {
      "Content-Type": XLSX_CONTENT_TYPE,
      "Content-Disposition": `attachment; filename="${this.config.fileName}"`,
      "Content-Length": output.byteLength,
      "X-Result-Rows": String(stats.resultRows),
    });
    res.end(output);
  }

  private async handleColumns(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const form = await this.readForm(req);
    const bytes = await this.fileField(form, FORM_FIELDS.columnsFile);
    const columns = await this.codec.readColumns(bytes);
    this.sendJSON(res, { columns });
  }

  private async handleHealth(_req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    this.sendJSON(res, { status: "ok" });
  }

  // ===========================================================================
  // Multipart Parsing
  // ===========================================================================

  private async readForm(req: http.IncomingMessage): Promise<FormData> {
    const contentType = req.headers["content-type"] ?? "";
    if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
      throw new RequestError("Expected a multipart/form-data request", ErrorCode.REQUEST_INVALID, {
        contentType,
      });
    }

    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    try {
      const request = new Request("http://localhost/", {
        method: "POST",
        headers: { "content-type": contentType },
        body: Buffer.concat(chunks),
      });
      return await request.formData();
    } catch (error) {
      throw new RequestError("Malformed multipart body", ErrorCode.REQUEST_INVALID, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private textField(form: FormData, name: string): string {
    const value = form.get(name);
    if (typeof value !== "string" || value.trim() === "") {
      throw new RequestError(`Missing form field "${name}"`, ErrorCode.REQUEST_MISSING_FIELD, { field: name });
    }
    return value;
  }

  private async fileField(form: FormData, name: string): Promise<Uint8Array> {
    const value = form.get(name);
    if (value === null || typeof value === "string" || value.size === 0) {
      throw new RequestError(`Missing file field "${name}"`, ErrorCode.REQUEST_MISSING_FIELD, { field: name });
    }
    return new Uint8Array(await value.arrayBuffer());
  }

  // ===========================================================================
  // Responses
  // ===========================================================================

  private sendJSON(res: http.ServerResponse, data: unknown, status: number = 200): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(data));
  }

  private sendFailure(res: http.ServerResponse, error: unknown, pathname: string): void {
    const failure = wrapError(error);
    let status = 500;
    if (error instanceof RequestError || error instanceof SpreadsheetError) status = 400;
    else if (isReconciliationError(error)) status = 422;

    if (status === 500) {
      this.logger.error({ err: error, path: pathname }, "Request failed");
    } else {
      this.logger.warn({ code: failure.code, path: pathname }, failure.message);
    }

    if (res.headersSent) {
      res.destroy();
      return;
    }
    this.sendJSON(
      res,
      { error: status === 500 ? "Internal Server Error" : failure.message, code: failure.code },
      status
    );
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start listening; resolves with the bound address (port 0 picks a free port)
   */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error("Server already started");
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.sendFailure(res, error, req.url ?? "/");
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    this.logger.info({ host: address.address, port: address.port }, "Server started");
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.server = null;
    this.logger.info("Server stopped");
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create and start a reconcile server
 */
export async function startReconcileServer(
  config: ServerConfig,
  deps: ReconcileServerDeps = {}
): Promise<{ server: ReconcileServer; address: AddressInfo }> {
  const server = new ReconcileServer(config, deps);
  const address = await server.start();
  return { server, address };
}
