import { once } from "node:events";
import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "../app.js";
import { DEFAULT_CONFIG } from "../config.js";
import { XLSX_CONTENT_TYPE } from "../exporters.js";
import { REQUIRED_INVENTORY_COLUMNS } from "../inventory.js";
import { INVENTORY_HEADERS, INVENTORY_ROWS, PO_HEADERS, PO_ROWS, TODAY, toCsvText } from "./fixtures.js";

let server: Server;
let baseUrl = "";

const inventoryCsv = toCsvText(INVENTORY_HEADERS, INVENTORY_ROWS);
const poCsv = toCsvText(PO_HEADERS, PO_ROWS);

function uploadForm(files: { inventory?: [string, string]; purchaseOrders?: [string, string] }, fields: [string, string][] = []) {
  const form = new FormData();
  if (files.inventory) form.append("inventory", new Blob([files.inventory[1]]), files.inventory[0]);
  if (files.purchaseOrders) form.append("purchaseOrders", new Blob([files.purchaseOrders[1]]), files.purchaseOrders[0]);
  fields.forEach(([name, value]) => form.append(name, value));
  return form;
}

function post(path: string, form: FormData) {
  return fetch(`${baseUrl}${path}`, { method: "POST", body: form });
}

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);

  server = createApp({ config: DEFAULT_CONFIG, now: () => TODAY }).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  vi.restoreAllMocks();
});

describe("GET endpoints", () => {
  it("reports health and configuration", async () => {
    const response = await fetch(`${baseUrl}/api/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, forecastSuffix: "-25", periodLengthDays: 7 });
  });

  it("describes the expected upload layout", async () => {
    const response = await fetch(`${baseUrl}/api/inventory/template`);
    expect(await response.json()).toMatchObject({
      inventoryColumns: REQUIRED_INVENTORY_COLUMNS,
      purchaseOrderColumns: ["SKU Code", "Order Qty", "Expected Delivery Date"],
      forecastSuffix: "-25",
      sample: [{ "SKU Code": "SKU001" }, { "SKU Code": "SKU002" }, { "SKU Code": "SKU003" }]
    });
  });
});

describe("POST /api/inventory/analyze", () => {
  it("analyses an inventory file with a PO report", async () => {
    const response = await post(
      "/api/inventory/analyze",
      uploadForm({ inventory: ["stock.csv", inventoryCsv], purchaseOrders: ["po.csv", poCsv] })
    );
    expect(response.status).toBe(200);

    expect(await response.json()).toMatchObject({
      purchaseOrdersLoaded: true,
      display: {
        records: [
          { "SKU Code": "SKU-A", "Next PO Arrival": "2026-10-22", "PO Mitigates OOS?": "Yes" },
          { "SKU Code": "SKU-B", "Next PO Arrival": null, "PO Mitigates OOS?": "N/A" },
          { "SKU Code": "SKU-C", "Next PO Arrival": null, "PO Mitigates OOS?": "N/A" },
          { "SKU Code": "SKU-D", "Next PO Arrival": "2026-11-05", "PO Mitigates OOS?": "No" }
        ]
      },
      summary: [
        { status: "CRITICAL_BELOW_MIN", count: 1 },
        { status: "REORDER_LEVEL", count: 1 },
        { status: "HEALTHY", count: 1 },
        { status: "MISSING_SOH", count: 1 }
      ],
      coverage: { columns: ["W1-25", "W2-25", "W3-25"] }
    });
  });

  it("applies repeated filter fields", async () => {
    const response = await post(
      "/api/inventory/analyze",
      uploadForm({ inventory: ["stock.csv", inventoryCsv] }, [
        ["site", "South"],
        ["site", "North"],
        ["category", "Fasteners"]
      ])
    );
    expect(await response.json()).toMatchObject({ rows: [{ skuCode: "SKU-A" }, { skuCode: "SKU-B" }] });
  });

  it("treats an empty filter field as an empty selection", async () => {
    const response = await post(
      "/api/inventory/analyze",
      uploadForm({ inventory: ["stock.csv", inventoryCsv] }, [["site", ""]])
    );
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      rows: [],
      summary: [],
      messages: ["No inventory rows match the selected filters."]
    });
  });

  it("accepts a forecast suffix override", async () => {
    const response = await post(
      "/api/inventory/analyze",
      uploadForm({ inventory: ["stock.csv", inventoryCsv] }, [["forecastSuffix", "-26"]])
    );
    expect(await response.json()).toMatchObject({
      coverage: null,
      messages: ["No forecast columns found ending with '-26'. Forecast simulation is skipped."]
    });
  });

  it("rejects an inventory file missing required columns", async () => {
    const headers = INVENTORY_HEADERS.filter((header) => header !== "MOQ");
    const rows = INVENTORY_ROWS.map((row) => row.filter((_value, idx) => INVENTORY_HEADERS[idx] !== "MOQ"));
    const response = await post("/api/inventory/analyze", uploadForm({ inventory: ["stock.csv", toCsvText(headers, rows)] }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Inventory file is missing required columns: MOQ",
      missingColumns: ["MOQ"]
    });
  });

  it("requires an inventory file", async () => {
    const response = await post("/api/inventory/analyze", uploadForm({ purchaseOrders: ["po.csv", poCsv] }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "An inventory file is required (form field 'inventory')." });
  });

  it("rejects unsupported file types", async () => {
    const response = await post("/api/inventory/analyze", uploadForm({ inventory: ["stock.pdf", "%PDF"] }));
    expect(response.status).toBe(400);
  });
});

describe("upload limits", () => {
  it("rejects a file over the configured size", async () => {
    const small = createApp({ config: { ...DEFAULT_CONFIG, maxUploadBytes: 16 }, now: () => TODAY }).listen(0, "127.0.0.1");
    await once(small, "listening");
    try {
      const address = small.address();
      if (!address || typeof address === "string") throw new Error("Server has no TCP address");
      const response = await fetch(`http://127.0.0.1:${address.port}/api/inventory/analyze`, {
        method: "POST",
        body: uploadForm({ inventory: ["stock.csv", inventoryCsv] })
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "File too large" });
    } finally {
      small.closeAllConnections();
      await new Promise<void>((resolve, reject) => small.close((error) => (error ? reject(error) : resolve())));
    }
  });
});

describe("exports", () => {
  it("downloads the display table as CSV", async () => {
    const response = await post("/api/inventory/export.csv", uploadForm({ inventory: ["stock.csv", inventoryCsv] }));
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/csv");
    expect(response.headers.get("content-disposition")).toBe('attachment; filename="inventory_status.csv"');

    const lines = (await response.text()).split("\r\n");
    expect(lines[0]).toBe("SKU Code,SKU Description,SKU Category,Site,Source,SOH,Status,Suggested Reorder Qty");
    expect(lines[1]).toBe("SKU-A,Widget A,Fasteners,North,Supplier X,30,🔴 Critical!!! Below Min Qty,20");
    expect(lines).toHaveLength(5);
  });

  it("downloads the styled workbook", async () => {
    const response = await post(
      "/api/inventory/export.xlsx",
      uploadForm({ inventory: ["stock.csv", inventoryCsv], purchaseOrders: ["po.csv", poCsv] })
    );
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe(XLSX_CONTENT_TYPE);
    expect(response.headers.get("content-disposition")).toBe('attachment; filename="inventory_status_colored.xlsx"');

    const bytes = Buffer.from(await response.arrayBuffer());
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
