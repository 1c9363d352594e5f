import { roundTo } from "../core/math-utils.js";
import type { BuildingResult } from "../types/results.js";

export const RESULT_COLUMNS = [
  "name",
  "acquisitionValue",
  "totalInvestment",
  "debtAmount",
  "equityAmount",
  "monthlyPayment",
  "annualDebtService",
  "totalInterestPaid",
  "finalOccupancy",
  "finalAnnualRevenue",
  "annualNoi",
  "exitValue",
] as const satisfies readonly (keyof BuildingResult)[];

export const CSV_FILENAME = "portfolio-results.csv";
export const CSV_MIME_TYPE = "text/csv;charset=utf-8";

// RFC 4180: quote fields holding a delimiter, quote or line break
function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: string | number): string {
  if (typeof value === "number") {
    return String(roundTo(value, 2));
  }
  return escapeCsvField(value);
}

/**
 * One header row named after the result fields, then one row per building.
 */
export function formatResultsAsCsv(results: readonly BuildingResult[]): string {
  const lines = [RESULT_COLUMNS.join(",")];
  for (const result of results) {
    lines.push(RESULT_COLUMNS.map((column) => formatCell(result[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}
