import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../src/config";
import type { BuildingContext } from "../src/types/context";
import type { BuildingInput } from "../src/types/inputs";

export const riverside: BuildingInput = {
  name: "Riverside Offices",
  annual_rent: 100000,
  purchase_cap_rate: 5,
  exit_cap_rate: 6,
  ltv: 60,
  interest_rate: 4,
  loan_term_years: 7,
  initial_occupancy: 95,
  occupancy_drift: 0,
  rent_indexation: 2,
  capex_budget: 50000,
  opex_ratio: 10,
};

export function makeBuilding(overrides: Partial<BuildingInput> = {}): BuildingInput {
  return { ...riverside, ...overrides };
}

export function createTestContext(
  building: BuildingInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): BuildingContext {
  return {
    building,
    config,
    outputs: {},
    warnings: [],
  };
}
