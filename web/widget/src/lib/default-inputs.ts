import { MAX_BUILDINGS } from "@portfolio-sim/engine/config";
import type { BuildingInput, PortfolioForm } from "./types";

export function createBuilding(index: number): BuildingInput {
  return {
    name: `Building ${index + 1}`,
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
}

export const defaultForm: PortfolioForm = {
  buildings: [createBuilding(0)],
  occupancyModel: "logistic",
};

/** Grow with default buildings or drop from the end to reach `count` (1..MAX_BUILDINGS). */
export function resizeBuildings(buildings: BuildingInput[], count: number): BuildingInput[] {
  const target = Math.min(MAX_BUILDINGS, Math.max(1, Math.trunc(count)));
  if (target <= buildings.length) {
    return buildings.slice(0, target);
  }
  const added = Array.from({ length: target - buildings.length }, (_, i) =>
    createBuilding(buildings.length + i),
  );
  return [...buildings, ...added];
}
