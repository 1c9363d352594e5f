import type { BuildingResult, PortfolioSummary } from "../types/results.js";

export function emptySummary(): PortfolioSummary {
  return {
    buildingCount: 0,
    totalEquity: 0,
    totalDebt: 0,
    totalNoi: 0,
    totalExitValue: 0,
  };
}

// Only successful buildings are passed in; failures never reach the totals.
export function aggregatePortfolio(results: readonly BuildingResult[]): PortfolioSummary {
  return results.reduce<PortfolioSummary>(
    (summary, result) => ({
      buildingCount: summary.buildingCount + 1,
      totalEquity: summary.totalEquity + result.equityAmount,
      totalDebt: summary.totalDebt + result.debtAmount,
      totalNoi: summary.totalNoi + result.annualNoi,
      totalExitValue: summary.totalExitValue + result.exitValue,
    }),
    emptySummary(),
  );
}
