import type {
  BuildingFailure,
  BuildingInput,
  BuildingResult,
  PortfolioSummary,
  ValidationError,
} from "@portfolio-sim/engine";

export type { BuildingInput, BuildingResult, BuildingFailure, PortfolioSummary, ValidationError };

export type OccupancyModel = "logistic" | "linear";

export interface PortfolioForm {
  buildings: BuildingInput[];
  occupancyModel: OccupancyModel;
}

// Mirrors the portfolio.validate_inputs tool output
export type ValidationResult =
  | { status: "ok" }
  | { status: "invalid"; errors: ValidationError[] };

// Mirrors the portfolio.simulate tool output
export interface CompletedSimulation {
  status: "ok" | "empty";
  results: BuildingResult[];
  failures: BuildingFailure[];
  summary: PortfolioSummary;
  warnings: string[];
  report: string;
}

export type SimulationResult =
  | { status: "invalid"; errors: ValidationError[] }
  | CompletedSimulation;

export type RunState =
  | { phase: "idle" }
  | { phase: "running" }
  | { phase: "complete"; simulation: CompletedSimulation }
  | { phase: "failed"; error: string; errors: ValidationError[] };

function hasStatus(value: unknown): value is { status: unknown } {
  return typeof value === "object" && value !== null && "status" in value;
}

function hasErrors(value: object): value is { errors: ValidationError[] } {
  return "errors" in value && Array.isArray(value.errors);
}

export function isValidationResult(value: unknown): value is ValidationResult {
  if (!hasStatus(value)) return false;
  return value.status === "ok" || (value.status === "invalid" && hasErrors(value));
}

export function isSimulationResult(value: unknown): value is SimulationResult {
  if (!hasStatus(value)) return false;
  if (value.status === "invalid") return hasErrors(value);
  return (
    (value.status === "ok" || value.status === "empty") &&
    "results" in value &&
    Array.isArray(value.results) &&
    "summary" in value &&
    typeof value.summary === "object"
  );
}
