import type { BuildingError } from "./module.js";

export interface BuildingResult {
  name: string;
  acquisitionValue: number;
  totalInvestment: number;
  debtAmount: number;
  equityAmount: number;
  monthlyPayment: number;
  annualDebtService: number;
  totalInterestPaid: number;
  finalOccupancy: number;
  finalAnnualRevenue: number;
  annualNoi: number;
  exitValue: number;
}

export interface BuildingFailure {
  index: number;
  name: string;
  errors: BuildingError[];
}

export type BuildingOutcome =
  | { success: true; index: number; result: BuildingResult; warnings: string[] }
  | { success: false; index: number; failure: BuildingFailure };

export interface PortfolioSummary {
  buildingCount: number;
  totalEquity: number;
  totalDebt: number;
  totalNoi: number;
  totalExitValue: number;
}

export type PortfolioRunStatus = "ok" | "empty";

export interface PortfolioRunResult {
  status: PortfolioRunStatus;
  results: BuildingResult[];
  failures: BuildingFailure[];
  summary: PortfolioSummary;
  warnings: string[];
}
