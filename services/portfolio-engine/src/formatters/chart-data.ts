import type { BuildingResult } from "../types/results.js";

export interface ExitValueBar {
  name: string;
  exitValue: number;
}

export interface CapitalStackBar {
  name: string;
  equity: number;
  debt: number;
  total: number;
}

export interface PortfolioChartData {
  exitValues: ExitValueBar[];
  capitalStack: CapitalStackBar[];
}

/** Chart series in submission order: exit value per building and its equity/debt stack. */
export function buildChartData(results: readonly BuildingResult[]): PortfolioChartData {
  return {
    exitValues: results.map((r) => ({ name: r.name, exitValue: r.exitValue })),
    capitalStack: results.map((r) => ({
      name: r.name,
      equity: r.equityAmount,
      debt: r.debtAmount,
      total: r.equityAmount + r.debtAmount,
    })),
  };
}
