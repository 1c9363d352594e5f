import type { PortfolioRunResult } from "../types/results.js";

function money(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

/**
 * Create a plain-text summary of a portfolio run
 */
export function createSummaryReport(run: PortfolioRunResult, title = "PORTFOLIO SUMMARY"): string {
  const lines: string[] = ["=".repeat(60), title, "=".repeat(60)];

  if (run.status === "empty") {
    lines.push("", ...run.warnings.map((w) => `  ! ${w}`), "", "=".repeat(60));
    return lines.join("\n");
  }

  lines.push("", "BUILDINGS");
  for (const r of run.results) {
    lines.push(
      `  ${r.name}: invested ${money(r.totalInvestment)} | debt ${money(r.debtAmount)} | equity ${money(r.equityAmount)} | NOI ${money(r.annualNoi)} | exit ${money(r.exitValue)}`,
    );
  }

  const s = run.summary;
  lines.push(
    "",
    "TOTALS",
    `  Buildings: ${s.buildingCount}`,
    `  Equity: ${money(s.totalEquity)}`,
    `  Debt: ${money(s.totalDebt)}`,
    `  NOI: ${money(s.totalNoi)}`,
    `  Exit value: ${money(s.totalExitValue)}`,
  );

  if (run.failures.length > 0) {
    lines.push("", "EXCLUDED");
    for (const failure of run.failures) {
      for (const error of failure.errors) {
        lines.push(`  ${failure.name || `#${failure.index + 1}`}: ${error.path}: ${error.message}`);
      }
    }
  }

  if (run.warnings.length > 0) {
    lines.push("", "WARNINGS");
    for (const warning of run.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  lines.push("", "=".repeat(60));
  return lines.join("\n");
}
