import { addDays, addMilliseconds, startOfDay } from "date-fns";
import type {
  ClassifyContext,
  DerivedFields,
  InventoryRow,
  InventoryStatus,
  PoMitigation
} from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function reorderThreshold(minQty: number, maxQty: number) {
  return maxQty - (maxQty - minQty) / 3;
}

export function assessStatus(soh: number | null, minQty: number | null, maxQty: number | null): InventoryStatus {
  if (soh === null) return "MISSING_SOH";
  if (minQty === null || maxQty === null) return "MISSING_SOH";

  const threshold = reorderThreshold(minQty, maxQty);
  if (soh < minQty) return "CRITICAL_BELOW_MIN";
  if (soh < threshold) return "REORDER_LEVEL";
  if (soh > maxQty) return "OVERSTOCKED";
  return "HEALTHY";
}

// Max Order Qty and Major Order Multiple are not applied here.
export function suggestReorder(
  row: Pick<InventoryRow, "soh" | "minQty" | "maxQty" | "moq" | "minorOrderMultiple">
): number | null {
  const { soh, minQty, maxQty, moq, minorOrderMultiple } = row;
  if (soh === null || minQty === null || maxQty === null || moq === null) return null;
  if (soh >= reorderThreshold(minQty, maxQty)) return null;

  let base = Math.max(moq, minQty - soh, 0);
  if (minorOrderMultiple !== null && minorOrderMultiple > 0) {
    base = Math.ceil(base / minorOrderMultiple) * minorOrderMultiple;
  }
  return Math.trunc(base);
}

/**
 * Index of the first forecast period in which cumulative usage exhausts the
 * stock on hand, or `null` if it lasts the whole horizon. Missing usage
 * values are skipped.
 */
export function estimateRunoutPeriod(soh: number | null, forecast: (number | null)[]): number | null {
  if (soh === null || soh <= 0 || forecast.length === 0) return null;

  let remaining = soh;
  for (let period = 0; period < forecast.length; period += 1) {
    const usage = forecast[period];
    if (usage === null) continue;
    remaining -= usage;
    if (remaining <= 0) return period;
  }
  return null;
}

/**
 * Marks each forecast period as covered while the running stock meets the
 * period's usage. Once a period fails, every later period is uncovered.
 */
export function simulateCoverage(soh: number | null, forecast: (number | null)[]): boolean[] {
  let remaining = soh;
  let exhausted = false;

  return forecast.map((usage) => {
    if (exhausted || remaining === null || usage === null || remaining < usage) {
      exhausted = true;
      return false;
    }
    remaining -= usage;
    return true;
  });
}

export function runoutDate(today: Date, runoutPeriod: number, periodLengthDays: number) {
  const totalDays = runoutPeriod * periodLengthDays;
  const wholeDays = Math.floor(totalDays);
  const start = addDays(startOfDay(today), wholeDays);
  return addMilliseconds(start, Math.round((totalDays - wholeDays) * MS_PER_DAY));
}

export function assessPoMitigation(
  runoutPeriod: number | null,
  nextArrival: Date | null,
  today: Date,
  periodLengthDays: number
): PoMitigation {
  if (runoutPeriod === null || nextArrival === null) return "UNKNOWN";
  const stockout = runoutDate(today, runoutPeriod, periodLengthDays);
  return nextArrival.getTime() <= stockout.getTime() ? "MITIGATES" : "DOES_NOT_MITIGATE";
}

export function classifyRow(row: InventoryRow, context: ClassifyContext): DerivedFields {
  const runoutPeriod = estimateRunoutPeriod(row.soh, row.forecast);
  const po = context.poIndex?.get(row.skuCode) ?? null;
  const nextPoArrival = po?.nextArrival ?? null;

  return {
    status: assessStatus(row.soh, row.minQty, row.maxQty),
    suggestedReorderQty: suggestReorder(row),
    runoutPeriod,
    nextPoArrival,
    nextPoQty: po?.totalQty ?? null,
    poMitigation: assessPoMitigation(runoutPeriod, nextPoArrival, context.today, context.periodLengthDays),
    coverage: simulateCoverage(row.soh, row.forecast)
  };
}
