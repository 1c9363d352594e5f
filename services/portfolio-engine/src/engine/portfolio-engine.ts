import { DEFAULT_ENGINE_CONFIG, applyRequestOptions, type EngineConfig } from "../config.js";
import { aggregatePortfolio, emptySummary } from "../core/rollup.js";
import type { PortfolioInput } from "../types/inputs.js";
import type { ValidationError } from "../types/module.js";
import type { BuildingFailure, BuildingResult, PortfolioRunResult } from "../types/results.js";
import { validateRequest } from "../validate/validate.js";
import { BuildingEngine } from "./building-engine.js";

export const EMPTY_PORTFOLIO_WARNING = "EmptyPortfolio: no buildings were submitted, nothing to simulate";

export type PortfolioRequestResult =
  | { valid: true; run: PortfolioRunResult }
  | { valid: false; errors: ValidationError[] };

export class PortfolioEngine {
  private readonly config: EngineConfig;

  constructor(config: EngineConfig = DEFAULT_ENGINE_CONFIG) {
    this.config = config;
  }

  /**
   * Run every building independently and total the ones that validated.
   * The building list is owned by the caller; nothing is kept between runs.
   */
  run(input: PortfolioInput): PortfolioRunResult {
    if (input.buildings.length === 0) {
      return {
        status: "empty",
        results: [],
        failures: [],
        summary: emptySummary(),
        warnings: [EMPTY_PORTFOLIO_WARNING],
      };
    }

    const config = applyRequestOptions(this.config, input.options);
    const engine = new BuildingEngine(config);

    const results: BuildingResult[] = [];
    const failures: BuildingFailure[] = [];
    const warnings: string[] = [];

    input.buildings.forEach((building, index) => {
      const outcome = engine.run(building, index);
      if (outcome.success) {
        results.push(outcome.result);
        warnings.push(...outcome.warnings);
      } else {
        failures.push(outcome.failure);
      }
    });

    if (results.length === 0) {
      warnings.push("No building passed validation; portfolio totals are zero");
    }

    return {
      status: "ok",
      results,
      failures,
      summary: aggregatePortfolio(results),
      warnings,
    };
  }

  /**
   * Validate an untyped request against the contract, then run it.
   * Contract errors reject the whole request; domain errors stay per building.
   */
  runRequest(request: unknown): PortfolioRequestResult {
    const validation = validateRequest(request, this.config.maxBuildings);
    if (!validation.valid) {
      return { valid: false, errors: validation.errors };
    }
    return { valid: true, run: this.run(validation.request) };
  }

  /**
   * Contract and domain errors together, without computing anything.
   */
  validateRequest(request: unknown): ValidationError[] {
    const validation = validateRequest(request, this.config.maxBuildings);
    if (!validation.valid) {
      return validation.errors;
    }

    const engine = new BuildingEngine(applyRequestOptions(this.config, validation.request.options));
    return validation.request.buildings.flatMap((building, index) =>
      engine.validate(building).map((error) => ({
        path: `buildings[${index}].${error.path}`,
        message: error.message,
      })),
    );
  }
}
