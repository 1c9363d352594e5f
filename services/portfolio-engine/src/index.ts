// Core primitives
export { pmt, compound, clamp, pct, annualPctToMonthly, roundTo } from "./core/math-utils.js";
export {
  projectOccupancy,
  projectLogisticOccupancy,
  projectLinearOccupancy,
} from "./core/occupancy.js";
export type { OccupancyModel, OccupancyProjection } from "./core/occupancy.js";
export { aggregatePortfolio, emptySummary } from "./core/rollup.js";

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_OCCUPANCY_GROWTH_RATE,
  MAX_BUILDINGS,
  resolveEngineConfig,
  applyRequestOptions,
} from "./config.js";
export type { EngineConfig } from "./config.js";

// Types (all type-only exports)
export type {
  ContractInput,
  BuildingInput,
  BuildingField,
  PortfolioOptionsInput,
  PortfolioInput,
} from "./types/inputs.js";
export type {
  ValidationResult,
  ValidationError,
  InvalidInput,
  ComputationError,
  BuildingError,
  ModuleResult,
  Module,
} from "./types/module.js";
export type { BuildingContext, BuildingModuleOutputs } from "./types/context.js";
export type {
  BuildingResult,
  BuildingFailure,
  BuildingOutcome,
  PortfolioSummary,
  PortfolioRunStatus,
  PortfolioRunResult,
} from "./types/results.js";

// Modules
export * from "./modules/index.js";

// Engine
export { BuildingEngine } from "./engine/building-engine.js";
export { PortfolioEngine, EMPTY_PORTFOLIO_WARNING } from "./engine/portfolio-engine.js";
export type { PortfolioRequestResult } from "./engine/portfolio-engine.js";

// Validation
export { validateRequest, contractSchemaPath } from "./validate/validate.js";
export type { RequestValidation } from "./validate/validate.js";

// Formatters
export * from "./formatters/index.js";
