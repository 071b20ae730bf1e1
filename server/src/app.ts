import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import type { AppConfig } from "./config.js";
import { analyzeInventory } from "./dashboard.js";
import { SchemaError, UploadError, getErrorSummary, isClientError } from "./errors.js";
import { CSV_FILE_NAME, XLSX_CONTENT_TYPE, XLSX_FILE_NAME, toCsv, toXlsxBuffer } from "./exporters.js";
import { REQUIRED_INVENTORY_COLUMNS, REQUIRED_PO_COLUMNS } from "./inventory.js";
import { readTable } from "./reports.js";
import type { InventoryAnalysis, InventoryFilters } from "./types.js";

export type AppOptions = {
  config: AppConfig;
  now?: () => Date;
};

const SAMPLE_ROWS = [
  {
    "SKU Code": "SKU001",
    "SKU Description": "Sample Item 1",
    "SKU Category": "Category A",
    Site: "Factory Name 1",
    Source: "Supplier 1",
    SOH: 100,
    "Safety Stock": 20,
    "Min Qty": 50,
    "Max Qty": 200,
    MOQ: 10,
    "Max Order Qty": 500,
    "Minor Order Multiple": 5,
    "Major Order Multiple": 20
  },
  {
    "SKU Code": "SKU002",
    "SKU Description": "Sample Item 2",
    "SKU Category": "Category B",
    Site: "Distribution Center 1",
    Source: "Supplier 2",
    SOH: 50,
    "Safety Stock": 10,
    "Min Qty": 30,
    "Max Qty": 100,
    MOQ: 10,
    "Max Order Qty": 200,
    "Minor Order Multiple": 5,
    "Major Order Multiple": 20
  },
  {
    "SKU Code": "SKU003",
    "SKU Description": "Sample Item 3",
    "SKU Category": "Category A",
    Site: "Factory Name 2",
    Source: "Supplier 3",
    SOH: 200,
    "Safety Stock": 30,
    "Min Qty": 100,
    "Max Qty": 300,
    MOQ: 20,
    "Max Order Qty": 600,
    "Minor Order Multiple": 10,
    "Major Order Multiple": 40
  }
];

function uploadedFile(req: Request, field: string) {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

// A field sent only with empty values selects nothing; an absent field keeps everything.
function listField(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

function readFilters(body: Record<string, unknown>): InventoryFilters {
  return {
    sites: listField(body.site),
    categories: listField(body.category),
    sources: listField(body.source)
  };
}

export function createApp({ config, now = () => new Date() }: AppOptions) {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes }
  }).fields([
    { name: "inventory", maxCount: 1 },
    { name: "purchaseOrders", maxCount: 1 }
  ]);

  app.use(cors({ origin: config.corsOrigin }));

  function runAnalysis(req: Request): InventoryAnalysis {
    const inventoryFile = uploadedFile(req, "inventory");
    if (!inventoryFile) {
      throw new UploadError("An inventory file is required (form field 'inventory').");
    }
    const poFile = uploadedFile(req, "purchaseOrders");
    const body: Record<string, unknown> = req.body ?? {};
    const suffixOverride = typeof body.forecastSuffix === "string" ? body.forecastSuffix.trim() : "";
    const forecastSuffix = suffixOverride || config.forecastSuffix;

    const analysis = analyzeInventory({
      inventory: readTable(inventoryFile.originalname, inventoryFile.buffer),
      purchaseOrders: poFile ? readTable(poFile.originalname, poFile.buffer) : null,
      filters: readFilters(body),
      forecastSuffix,
      periodLengthDays: config.periodLengthDays,
      today: now()
    });

    console.log(
      `[SOH Watch] Analysed ${inventoryFile.originalname}: ${analysis.rows.length} rows, ` +
        `${analysis.forecastColumns.length} forecast periods` +
        (poFile ? `, PO report ${poFile.originalname}` : "")
    );
    return analysis;
  }

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      forecastSuffix: config.forecastSuffix,
      periodLengthDays: config.periodLengthDays
    });
  });

  app.get("/api/inventory/template", (_req, res) => {
    res.json({
      inventoryColumns: REQUIRED_INVENTORY_COLUMNS,
      purchaseOrderColumns: REQUIRED_PO_COLUMNS,
      forecastSuffix: config.forecastSuffix,
      sample: SAMPLE_ROWS
    });
  });

  app.post("/api/inventory/analyze", upload, (req, res, next) => {
    try {
      res.json(runAnalysis(req));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/inventory/export.csv", upload, (req, res, next) => {
    try {
      const csv = toCsv(runAnalysis(req).display);
      res.attachment(CSV_FILE_NAME);
      res.type("text/csv");
      res.send(csv);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/inventory/export.xlsx", upload, async (req, res, next) => {
    try {
      const buffer = await toXlsxBuffer(runAnalysis(req).display);
      res.attachment(XLSX_FILE_NAME);
      res.type(XLSX_CONTENT_TYPE);
      res.send(buffer);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isClientError(error)) {
      console.warn(`[SOH Watch] Rejected upload: ${error.message}`);
      res.status(400).json({
        error: error.message,
        ...(error instanceof SchemaError ? { missingColumns: error.missingColumns } : {})
      });
      return;
    }
    if (error instanceof multer.MulterError) {
      console.warn(`[SOH Watch] Rejected upload: ${error.message}`);
      res.status(400).json({ error: error.message });
      return;
    }

    console.error(`[SOH Watch] Request failed: ${getErrorSummary(error)}`);
    res.status(500).json({ error: getErrorSummary(error) });
  });

  return app;
}
