/**
 * CLI Command Tests
 *
 * Runs the merge and columns commands against workbooks in a temp directory.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { mergeCommand } from "../commands/merge.js";
import { columnsCommand } from "../commands/columns.js";
import { createSpreadsheetCodec } from "../../core/spreadsheet/index.js";
import { rowSetFromRecords, rowSetToRecords } from "../../core/table/index.js";
import { ConfigurationError, ErrorCode, SheetJoinError } from "../../core/errors.js";

const codec = createSpreadsheetCodec();

describe("CLI commands", () => {
  let tempDir: string;
  let citiesPath: string;
  let townsPath: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "sheet-join-cli-"));
    citiesPath = path.join(tempDir, "cities.xlsx");
    townsPath = path.join(tempDir, "towns.xlsx");

    await fs.writeFile(
      citiesPath,
      await codec.write(
        rowSetFromRecords([
          { City: "Lisbon", Pop: 500 },
          { City: "Porto", Pop: 200 },
        ])
      )
    );
    await fs.writeFile(
      townsPath,
      await codec.write(
        rowSetFromRecords([
          { Town: " lisbon", Region: "X" },
          { Town: "Faro", Region: "Y" },
        ])
      )
    );
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("mergeCommand", () => {
    it("should write the reconciled workbook and report stats", async () => {
      const output = path.join(tempDir, "out", "result.xlsx");

      const summary = await mergeCommand(citiesPath, townsPath, { key1: "City", key2: "Town", output });

      expect(summary.outputPath).toBe(output);
      expect(summary.stats).toEqual({
        primaryRows: 2,
        secondaryRows: 2,
        commonKeys: 1,
        primaryMatched: 1,
        secondaryMatched: 1,
        resultRows: 1,
      });

      const result = await codec.read(await fs.readFile(output));
      expect(result.columns).toEqual(["comum", "Pop", "Region"]);
      expect(rowSetToRecords(result)).toEqual([{ comum: "LISBON", Pop: 500, Region: "X" }]);
    });

    it("should use a custom key column name", async () => {
      const output = path.join(tempDir, "custom.xlsx");

      await mergeCommand(citiesPath, townsPath, { key1: "City", key2: "Town", output, keyName: "chave" });

      expect(await codec.readColumns(await fs.readFile(output))).toEqual(["chave", "Pop", "Region"]);
    });

    it("should reject an invalid sheet name before reading anything", async () => {
      await expect(
        mergeCommand(citiesPath, townsPath, { key1: "City", key2: "Town", sheet: "a*b" })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("should report unreadable input paths", async () => {
      const missing = path.join(tempDir, "missing.xlsx");
      const merge = mergeCommand(missing, townsPath, {
        key1: "City",
        key2: "Town",
        output: path.join(tempDir, "never.xlsx"),
      });

      await expect(merge).rejects.toBeInstanceOf(SheetJoinError);
      await expect(merge).rejects.toMatchObject({
        code: ErrorCode.FILE_SYSTEM_ERROR,
        context: { filePath: missing },
      });
    });
  });

  describe("columnsCommand", () => {
    it("should return and print the header names", async () => {
      const columns = await columnsCommand(townsPath, { json: true });

      expect(columns).toEqual(["Town", "Region"]);
      expect(console.log).toHaveBeenCalledWith(
        JSON.stringify({ file: townsPath, columns: ["Town", "Region"] })
      );
    });
  });
});
