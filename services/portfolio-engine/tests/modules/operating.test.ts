import { describe, expect, it } from "vitest";

import { resolveEngineConfig } from "../../src/config";
import { AcquisitionModule } from "../../src/modules/acquisition/acquisition-module";
import { DebtModule } from "../../src/modules/debt/debt-module";
import { OperatingModule } from "../../src/modules/operating/operating-module";
import type { EngineConfig } from "../../src/config";
import type { BuildingInput } from "../../src/types/inputs";
import { createTestContext, makeBuilding } from "../helpers";

function computeOperating(building: BuildingInput, config?: EngineConfig) {
  const context = createTestContext(building, config);
  new AcquisitionModule().compute(context);
  new DebtModule().compute(context);
  const result = new OperatingModule().compute(context);
  return { context, result };
}

describe("OperatingModule", () => {
  const module = new OperatingModule();

  describe("validation", () => {
    it("accepts negative occupancy drift", () => {
      expect(module.validate(makeBuilding({ occupancy_drift: -4 }))).toEqual([]);
    });

    it("rejects out-of-range ratios and negative indexation", () => {
      const errors = module.validate(
        makeBuilding({ initial_occupancy: 101, rent_indexation: -1, opex_ratio: -5 }),
      );
      expect(errors.map((e) => e.field)).toEqual(["initial_occupancy", "rent_indexation", "opex_ratio"]);
    });
  });

  describe("compute", () => {
    it("fails when debt has not run", () => {
      const result = module.compute(createTestContext(makeBuilding()));
      expect(result.success).toBe(false);
    });

    it("indexes rent and applies the projected occupancy", () => {
      const { context } = computeOperating(makeBuilding());
      const operating = context.outputs.operating;

      expect(operating?.finalOccupancy).toBeCloseTo(95, 10);
      expect(operating?.indexedRent).toBeCloseTo(114868.56676492801, 6);
      expect(operating?.realizedRevenue).toBeCloseTo(109125.13842668159, 6);
    });

    it("subtracts operating costs and annual debt service from revenue", () => {
      const { context } = computeOperating(makeBuilding());
      const operating = context.outputs.operating;

      expect(operating?.operatingCosts).toBeCloseTo(10912.513842668159, 6);
      expect(operating?.annualDebtService).toBeCloseTo(201751.58152658617, 6);
      expect(operating?.netOperatingIncome).toBeCloseTo(-103538.95694257275, 4);
    });

    it("warns when debt service exceeds net revenue", () => {
      const { context } = computeOperating(makeBuilding());
      expect(context.warnings).toEqual([
        "Riverside Offices: annual debt service exceeds net revenue (NOI -103539)",
      ]);
    });

    it("has no debt-service term at zero LTV", () => {
      const { context } = computeOperating(
        makeBuilding({ ltv: 0, initial_occupancy: 100, rent_indexation: 0, opex_ratio: 20, capex_budget: 0 }),
      );
      expect(context.outputs.operating?.annualDebtService).toBe(0);
      expect(context.outputs.operating?.netOperatingIncome).toBeCloseTo(80_000, 6);
      expect(context.warnings).toEqual([]);
    });

    it("uses the linear occupancy rule when configured", () => {
      const { context } = computeOperating(
        makeBuilding({ initial_occupancy: 90, occupancy_drift: -3, loan_term_years: 5 }),
        resolveEngineConfig({ occupancyModel: "linear" }),
      );
      expect(context.outputs.operating?.finalOccupancy).toBe(75);
    });
  });
});
