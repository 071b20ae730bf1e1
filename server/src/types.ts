export type InventoryStatus =
  | "CRITICAL_BELOW_MIN"
  | "REORDER_LEVEL"
  | "OVERSTOCKED"
  | "HEALTHY"
  | "MISSING_SOH";

export type PoMitigation = "MITIGATES" | "DOES_NOT_MITIGATE" | "UNKNOWN";

export type CellValue = string | number | boolean | Date | null;

export type RawTable = {
  headers: string[];
  rows: Record<string, CellValue>[];
};

export type InventoryRow = {
  skuCode: string;
  skuDescription: string;
  skuCategory: string;
  site: string;
  source: string;
  soh: number | null;
  safetyStock: number | null;
  minQty: number | null;
  maxQty: number | null;
  moq: number | null;
  maxOrderQty: number | null;
  minorOrderMultiple: number | null;
  majorOrderMultiple: number | null;
  forecast: (number | null)[];
};

export type PurchaseOrderLine = {
  skuCode: string;
  orderQty: number | null;
  expectedDeliveryDate: Date;
};

export type PoSummary = {
  nextArrival: Date;
  totalQty: number;
};

export type PoIndex = Map<string, PoSummary>;

export type DerivedFields = {
  status: InventoryStatus;
  suggestedReorderQty: number | null;
  runoutPeriod: number | null;
  nextPoArrival: Date | null;
  nextPoQty: number | null;
  poMitigation: PoMitigation;
  coverage: boolean[];
};

export type EnrichedRow = InventoryRow & DerivedFields;

export type ClassifyContext = {
  poIndex: PoIndex | null;
  today: Date;
  periodLengthDays: number;
};

export type InventoryFilters = {
  sites?: string[];
  categories?: string[];
  sources?: string[];
};

export type FilterOptions = {
  sites: string[];
  categories: string[];
  sources: string[];
};

export type DisplayValue = string | number | null;

export type DisplayTable = {
  columns: string[];
  records: Record<string, DisplayValue>[];
  statuses: InventoryStatus[];
};

export type StatusSummaryEntry = {
  status: InventoryStatus;
  label: string;
  count: number;
  color: string;
};

export type CoverageTable = {
  columns: string[];
  rows: {
    skuCode: string;
    soh: number | null;
    marks: boolean[];
  }[];
};

export type InventoryAnalysis = {
  rows: EnrichedRow[];
  display: DisplayTable;
  summary: StatusSummaryEntry[];
  coverage: CoverageTable | null;
  filterOptions: FilterOptions;
  forecastColumns: string[];
  purchaseOrdersLoaded: boolean;
  messages: string[];
};
