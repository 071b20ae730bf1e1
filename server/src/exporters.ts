import ExcelJS from "exceljs";
import Papa from "papaparse";
import { STATUS_STYLES } from "./status.js";
import type { DisplayTable, DisplayValue } from "./types.js";

export const CSV_FILE_NAME = "inventory_status.csv";
export const XLSX_FILE_NAME = "inventory_status_colored.xlsx";
export const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

function recordValues(display: DisplayTable) {
  return display.records.map((record) => display.columns.map((column) => record[column] ?? null));
}

export function toCsv(display: DisplayTable) {
  return Papa.unparse({ fields: display.columns, data: recordValues(display) });
}

function toArgb(hex: string) {
  return `FF${hex.replace("#", "").toUpperCase()}`;
}

// Empty cells and zeros do not count towards the width.
function displayLength(value: DisplayValue) {
  if (value === null || value === "" || value === 0) return 0;
  return Array.from(String(value)).length;
}

export function buildWorkbook(display: DisplayTable) {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Inventory Status", {
    views: [{ state: "frozen", xSplit: 0, ySplit: 1 }]
  });

  sheet.addRow(display.columns);

  recordValues(display).forEach((values, idx) => {
    const row = sheet.addRow(values);
    const argb = toArgb(STATUS_STYLES[display.statuses[idx]].rowFill);
    for (let col = 1; col <= display.columns.length; col += 1) {
      const cell = row.getCell(col);
      cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb }, bgColor: { argb } };
      cell.font = { color: { argb: "FF000000" } };
    }
  });

  display.columns.forEach((column, idx) => {
    const lengths = [column, ...display.records.map((record) => record[column] ?? null)].map(displayLength);
    sheet.getColumn(idx + 1).width = Math.max(...lengths) + 2;
  });

  return workbook;
}

export async function toXlsxBuffer(display: DisplayTable) {
  const data = await buildWorkbook(display).xlsx.writeBuffer();
  return Buffer.from(data);
}
