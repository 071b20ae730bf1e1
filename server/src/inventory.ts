import { SchemaError } from "./errors.js";
import { parseDeliveryDate, parseQuantity, parseText } from "./reports.js";
import type { InventoryRow, PoIndex, PurchaseOrderLine, RawTable } from "./types.js";

export const INVENTORY_TEXT_COLUMNS = {
  skuCode: "SKU Code",
  skuDescription: "SKU Description",
  skuCategory: "SKU Category",
  site: "Site",
  source: "Source"
} as const;

export const INVENTORY_QUANTITY_COLUMNS = {
  soh: "SOH",
  safetyStock: "Safety Stock",
  minQty: "Min Qty",
  maxQty: "Max Qty",
  moq: "MOQ",
  maxOrderQty: "Max Order Qty",
  minorOrderMultiple: "Minor Order Multiple",
  majorOrderMultiple: "Major Order Multiple"
} as const;

export const REQUIRED_INVENTORY_COLUMNS: string[] = [
  ...Object.values(INVENTORY_TEXT_COLUMNS),
  ...Object.values(INVENTORY_QUANTITY_COLUMNS)
];

export const REQUIRED_PO_COLUMNS = ["SKU Code", "Order Qty", "Expected Delivery Date"];

function assertColumns(table: RawTable, required: string[], label: string) {
  const missing = required.filter((column) => !table.headers.includes(column));
  if (missing.length > 0) throw new SchemaError(label, missing);
}

export function findForecastColumns(headers: string[], suffix: string) {
  if (!suffix) return [];
  return headers.filter((header) => header.endsWith(suffix));
}

export function parseInventory(table: RawTable, forecastSuffix: string) {
  assertColumns(table, REQUIRED_INVENTORY_COLUMNS, "Inventory");
  const forecastColumns = findForecastColumns(table.headers, forecastSuffix);

  const rows = table.rows.map((raw): InventoryRow => ({
    skuCode: parseText(raw[INVENTORY_TEXT_COLUMNS.skuCode]),
    skuDescription: parseText(raw[INVENTORY_TEXT_COLUMNS.skuDescription]),
    skuCategory: parseText(raw[INVENTORY_TEXT_COLUMNS.skuCategory]),
    site: parseText(raw[INVENTORY_TEXT_COLUMNS.site]),
    source: parseText(raw[INVENTORY_TEXT_COLUMNS.source]),
    soh: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.soh]),
    safetyStock: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.safetyStock]),
    minQty: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.minQty]),
    maxQty: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.maxQty]),
    moq: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.moq]),
    maxOrderQty: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.maxOrderQty]),
    minorOrderMultiple: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.minorOrderMultiple]),
    majorOrderMultiple: parseQuantity(raw[INVENTORY_QUANTITY_COLUMNS.majorOrderMultiple]),
    forecast: forecastColumns.map((column) => parseQuantity(raw[column]))
  }));

  return { rows, forecastColumns };
}

export function parsePurchaseOrders(table: RawTable): PurchaseOrderLine[] {
  assertColumns(table, REQUIRED_PO_COLUMNS, "Purchase order");

  const lines: PurchaseOrderLine[] = [];
  for (const raw of table.rows) {
    const skuCode = parseText(raw["SKU Code"]);
    const expectedDeliveryDate = parseDeliveryDate(raw["Expected Delivery Date"]);
    if (!skuCode || !expectedDeliveryDate) continue;

    lines.push({
      skuCode,
      orderQty: parseQuantity(raw["Order Qty"]),
      expectedDeliveryDate
    });
  }
  return lines;
}

/**
 * Earliest delivery and total open quantity per SKU. Must be complete before
 * any row is classified.
 */
export function buildPoIndex(lines: PurchaseOrderLine[]): PoIndex {
  const index: PoIndex = new Map();

  for (const line of lines) {
    const current = index.get(line.skuCode);
    const qty = line.orderQty ?? 0;
    if (!current) {
      index.set(line.skuCode, { nextArrival: line.expectedDeliveryDate, totalQty: qty });
      continue;
    }
    current.totalQty += qty;
    if (line.expectedDeliveryDate < current.nextArrival) {
      current.nextArrival = line.expectedDeliveryDate;
    }
  }

  return index;
}
