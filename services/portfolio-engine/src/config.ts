import type { OccupancyModel } from "./core/occupancy.js";
import type { PortfolioOptionsInput } from "./types/inputs.js";

export interface EngineConfig {
  occupancyModel: OccupancyModel;
  // Logistic curve constant. Tunable, not derived from market data.
  occupancyGrowthRate: number;
  maxBuildings: number;
}

export const DEFAULT_OCCUPANCY_GROWTH_RATE = 0.04;
export const MAX_BUILDINGS = 20;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  occupancyModel: "logistic",
  occupancyGrowthRate: DEFAULT_OCCUPANCY_GROWTH_RATE,
  maxBuildings: MAX_BUILDINGS,
});

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  if (config.occupancyModel !== "logistic" && config.occupancyModel !== "linear") {
    throw new RangeError("occupancyModel must be logistic or linear");
  }
  if (!Number.isFinite(config.occupancyGrowthRate) || config.occupancyGrowthRate <= 0) {
    throw new RangeError("occupancyGrowthRate must be a positive finite number");
  }
  if (!Number.isInteger(config.maxBuildings) || config.maxBuildings < 1) {
    throw new RangeError("maxBuildings must be a positive integer");
  }

  return config;
}

/** Request-level options override the engine defaults for one run. */
export function applyRequestOptions(
  config: EngineConfig,
  options: PortfolioOptionsInput | undefined,
): EngineConfig {
  if (!options) {
    return config;
  }
  return resolveEngineConfig({
    ...config,
    ...(options.occupancy_model !== undefined ? { occupancyModel: options.occupancy_model } : {}),
    ...(options.occupancy_growth_rate !== undefined
      ? { occupancyGrowthRate: options.occupancy_growth_rate }
      : {}),
  });
}
