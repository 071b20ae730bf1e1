import { format } from "date-fns";
import { classifyRow } from "./health.js";
import { buildPoIndex, parseInventory, parsePurchaseOrders } from "./inventory.js";
import { MITIGATION_LABELS, STATUS_ORDER, STATUS_STYLES } from "./status.js";
import type {
  CoverageTable,
  DisplayTable,
  EnrichedRow,
  FilterOptions,
  InventoryAnalysis,
  InventoryFilters,
  InventoryRow,
  RawTable,
  StatusSummaryEntry
} from "./types.js";

export const BASE_DISPLAY_COLUMNS = [
  "SKU Code",
  "SKU Description",
  "SKU Category",
  "Site",
  "Source",
  "SOH",
  "Status",
  "Suggested Reorder Qty"
];

export const PO_DISPLAY_COLUMNS = ["Next PO Arrival", "PO Mitigates OOS?"];

export type AnalyzeInput = {
  inventory: RawTable;
  purchaseOrders?: RawTable | null;
  filters?: InventoryFilters;
  forecastSuffix: string;
  periodLengthDays: number;
  today: Date;
};

function distinct(values: string[]) {
  return Array.from(new Set(values));
}

export function filterOptions(rows: InventoryRow[]): FilterOptions {
  return {
    sites: distinct(rows.map((row) => row.site)),
    categories: distinct(rows.map((row) => row.skuCategory)),
    sources: distinct(rows.map((row) => row.source))
  };
}

function matches(value: string, selected: string[] | undefined) {
  return selected === undefined || selected.includes(value);
}

export function filterRows<T extends InventoryRow>(rows: T[], filters: InventoryFilters = {}): T[] {
  return rows.filter(
    (row) =>
      matches(row.site, filters.sites) &&
      matches(row.skuCategory, filters.categories) &&
      matches(row.source, filters.sources)
  );
}

export function summarizeStatuses(rows: EnrichedRow[]): StatusSummaryEntry[] {
  const counts = new Map<EnrichedRow["status"], number>();
  rows.forEach((row) => counts.set(row.status, (counts.get(row.status) ?? 0) + 1));

  return STATUS_ORDER.filter((status) => counts.has(status)).map((status) => ({
    status,
    label: STATUS_STYLES[status].label,
    count: counts.get(status) ?? 0,
    color: STATUS_STYLES[status].chartColor
  }));
}

export function buildDisplayTable(rows: EnrichedRow[], includePurchaseOrders: boolean): DisplayTable {
  const columns = includePurchaseOrders ? [...BASE_DISPLAY_COLUMNS, ...PO_DISPLAY_COLUMNS] : [...BASE_DISPLAY_COLUMNS];

  const records = rows.map((row) => {
    const record: DisplayTable["records"][number] = {
      "SKU Code": row.skuCode,
      "SKU Description": row.skuDescription,
      "SKU Category": row.skuCategory,
      Site: row.site,
      Source: row.source,
      SOH: row.soh,
      Status: STATUS_STYLES[row.status].label,
      "Suggested Reorder Qty": row.suggestedReorderQty
    };
    if (includePurchaseOrders) {
      record["Next PO Arrival"] = row.nextPoArrival ? format(row.nextPoArrival, "yyyy-MM-dd") : null;
      record["PO Mitigates OOS?"] = MITIGATION_LABELS[row.poMitigation];
    }
    return record;
  });

  return { columns, records, statuses: rows.map((row) => row.status) };
}

export function buildCoverageTable(rows: EnrichedRow[], forecastColumns: string[]): CoverageTable | null {
  if (forecastColumns.length === 0) return null;
  return {
    columns: forecastColumns,
    rows: rows.map((row) => ({ skuCode: row.skuCode, soh: row.soh, marks: row.coverage }))
  };
}

export function analyzeInventory(input: AnalyzeInput): InventoryAnalysis {
  const { rows: parsed, forecastColumns } = parseInventory(input.inventory, input.forecastSuffix);

  // PO lines are aggregated in full before any row is joined against them.
  const purchaseOrdersLoaded = Boolean(input.purchaseOrders);
  const poIndex = input.purchaseOrders ? buildPoIndex(parsePurchaseOrders(input.purchaseOrders)) : null;

  const visible = filterRows(parsed, input.filters);
  const context = { poIndex, today: input.today, periodLengthDays: input.periodLengthDays };
  const rows: EnrichedRow[] = visible.map((row) => ({ ...row, ...classifyRow(row, context) }));

  const messages: string[] = [];
  if (rows.length === 0) {
    messages.push("No inventory rows match the selected filters.");
  }
  if (forecastColumns.length === 0) {
    messages.push(`No forecast columns found ending with '${input.forecastSuffix}'. Forecast simulation is skipped.`);
  }

  return {
    rows,
    display: buildDisplayTable(rows, purchaseOrdersLoaded),
    summary: summarizeStatuses(rows),
    coverage: buildCoverageTable(rows, forecastColumns),
    filterOptions: filterOptions(parsed),
    forecastColumns,
    purchaseOrdersLoaded,
    messages
  };
}
