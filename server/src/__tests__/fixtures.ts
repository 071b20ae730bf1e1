import type { RawTable } from "../types.js";

export const INVENTORY_HEADERS = [
  "SKU Code",
  "SKU Description",
  "SKU Category",
  "Site",
  "Source",
  "SOH",
  "Safety Stock",
  "Min Qty",
  "Max Qty",
  "MOQ",
  "Max Order Qty",
  "Minor Order Multiple",
  "Major Order Multiple",
  "W1-25",
  "W2-25",
  "W3-25"
];

export const INVENTORY_ROWS = [
  ["SKU-A", "Widget A", "Fasteners", "North", "Supplier X", "30", "5", "50", "200", "10", "500", "5", "20", "10", "10", "10"],
  ["SKU-B", "Widget B", "Fasteners", "South", "Supplier Y", "160", "5", "50", "200", "10", "500", "5", "20", "40", "40", "40"],
  ["SKU-C", "Widget C", "Hydraulics", "North", "Supplier X", "", "5", "50", "200", "10", "500", "5", "20", "10", "10", "10"],
  ["SKU-D", "Widget D", "Hydraulics", "South", "Supplier Y", "100", "5", "50", "200", "10", "500", "5", "20", "40", "40", "40"]
];

export const PO_HEADERS = ["SKU Code", "Order Qty", "Expected Delivery Date"];

export const PO_ROWS = [
  ["SKU-A", "25", "22/10/2026"],
  ["SKU-D", "30", "10/11/2026"],
  ["SKU-D", "20", "05/11/2026"],
  ["SKU-Z", "5", "01/11/2026"]
];

export const TODAY = new Date(2026, 9, 19, 9, 0);

export function makeTable(headers: string[], rows: string[][]): RawTable {
  return {
    headers,
    rows: rows.map((values) => Object.fromEntries(headers.map((header, idx) => [header, values[idx] ?? null])))
  };
}

export function toCsvText(headers: string[], rows: string[][]) {
  return [headers, ...rows].map((values) => values.join(",")).join("\n");
}
