import type { InventoryStatus, PoMitigation } from "./types.js";

export const STATUS_ORDER: InventoryStatus[] = [
  "CRITICAL_BELOW_MIN",
  "REORDER_LEVEL",
  "OVERSTOCKED",
  "HEALTHY",
  "MISSING_SOH"
];

export const STATUS_STYLES: Record<InventoryStatus, { label: string; chartColor: string; rowFill: string }> = {
  CRITICAL_BELOW_MIN: { label: "🔴 Critical!!! Below Min Qty", chartColor: "#D44444", rowFill: "#FFCCCC" },
  REORDER_LEVEL: { label: "🟠 Reorder Level", chartColor: "#FF9148", rowFill: "#FFE4B3" },
  OVERSTOCKED: { label: "🕣 Overstocked", chartColor: "#7B4FB6", rowFill: "#FFCCFF" },
  HEALTHY: { label: "✅ Healthy", chartColor: "#8CDF8C", rowFill: "#CCFFCC" },
  MISSING_SOH: { label: "❓ Missing SOH", chartColor: "#B0B0B0", rowFill: "#E0E0E0" }
};

export const MITIGATION_LABELS: Record<PoMitigation, string> = {
  MITIGATES: "Yes",
  DOES_NOT_MITIGATE: "No",
  UNKNOWN: "N/A"
};
