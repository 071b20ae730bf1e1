import Papa from "papaparse";
import * as XLSX from "xlsx";
import { format, isValid, parse, parseISO } from "date-fns";
import { UploadError } from "./errors.js";
import type { CellValue, RawTable } from "./types.js";

const TEXT_EXTENSIONS = [".csv", ".tsv", ".txt"];
const WORKBOOK_EXTENSIONS = [".xlsx", ".xls"];

function extensionOf(fileName: string) {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot).toLowerCase();
}

function normalizeHeader(header: CellValue) {
  return header === null ? "" : String(header).trim();
}

function toTable(matrix: CellValue[][]): RawTable {
  if (matrix.length === 0) return { headers: [], rows: [] };

  const headers = matrix[0].map(normalizeHeader);

  const rows = matrix.slice(1).map((values) => {
    const row: Record<string, CellValue> = {};
    headers.forEach((header, idx) => {
      row[header] = values[idx] ?? null;
    });
    return row;
  });

  return { headers, rows };
}

export function parseDelimited(content: string): RawTable {
  const result = Papa.parse<string[]>(content.replace(/^\uFEFF/, ""), {
    skipEmptyLines: "greedy"
  });
  return toTable(result.data);
}

// Date-formatted serials are rebuilt from their calendar parts in local time.
function workbookCell(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell || cell.t === "z" || cell.t === "e") return null;
  if (cell.t === "n" && typeof cell.v === "number" && cell.z !== undefined && XLSX.SSF.is_date(cell.z)) {
    const { y, m, d, H, M, S } = XLSX.SSF.parse_date_code(cell.v);
    return new Date(y, m - 1, d, H, M, S);
  }
  return cell.v ?? null;
}

export function parseWorkbook(buffer: Buffer): RawTable {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: false, cellNF: true });
  const firstSheet = workbook.SheetNames[0];
  if (!firstSheet) throw new UploadError("Workbook contains no worksheets");

  const sheet = workbook.Sheets[firstSheet];
  const ref = sheet["!ref"];
  if (!ref) return { headers: [], rows: [] };

  const range = XLSX.utils.decode_range(ref);
  const matrix: CellValue[][] = [];
  for (let r = range.s.r; r <= range.e.r; r++) {
    const values: CellValue[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      values.push(workbookCell(sheet[XLSX.utils.encode_cell({ r, c })]));
    }
    if (values.some((value) => value !== null)) matrix.push(values);
  }
  return toTable(matrix);
}

export function readTable(fileName: string, buffer: Buffer): RawTable {
  const extension = extensionOf(fileName);
  if (TEXT_EXTENSIONS.includes(extension)) {
    return parseDelimited(buffer.toString("utf-8"));
  }
  if (WORKBOOK_EXTENSIONS.includes(extension)) {
    return parseWorkbook(buffer);
  }
  throw new UploadError(
    `Unsupported file type for ${fileName}. Allowed: ${[...TEXT_EXTENSIONS, ...WORKBOOK_EXTENSIONS].join(", ")}`
  );
}

/**
 * Numeric coercion for quantity columns. Anything that is not a finite
 * number becomes `null`, never 0.
 */
export function parseQuantity(value: CellValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const cleaned = value.trim().replace(/,/g, "");
  if (!cleaned) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseText(value: CellValue | undefined) {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return isValid(value) ? format(value, "yyyy-MM-dd") : "";
  return String(value).trim();
}

const DAY_FIRST_PATTERN = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

// Day-first is what the purchasing reports export; ISO is the fallback.
export function parseDeliveryDate(value: CellValue | undefined): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (!text) return null;

  if (DAY_FIRST_PATTERN.test(text)) {
    const dayFirst = parse(text, "d/M/yyyy", new Date(0));
    return isValid(dayFirst) ? dayFirst : null;
  }

  const iso = parseISO(text);
  return isValid(iso) ? iso : null;
}
