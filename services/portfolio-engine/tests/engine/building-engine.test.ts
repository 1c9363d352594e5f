import { afterEach, describe, expect, it, vi } from "vitest";

import { BuildingEngine } from "../../src/engine/building-engine";
import { OperatingModule } from "../../src/modules/operating/operating-module";
import { makeBuilding } from "../helpers";

describe("BuildingEngine", () => {
  const engine = new BuildingEngine();

  it("produces a result for a valid building", () => {
    const outcome = engine.run(makeBuilding());
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;

    const r = outcome.result;
    expect(r.name).toBe("Riverside Offices");
    expect(r.acquisitionValue).toBeCloseTo(2_000_000, 6);
    expect(r.totalInvestment).toBeCloseTo(2_050_000, 6);
    expect(r.debtAmount).toBeCloseTo(1_230_000, 6);
    expect(r.equityAmount).toBeCloseTo(820_000, 6);
    expect(r.equityAmount + r.debtAmount).toBeCloseTo(r.totalInvestment, 6);
    expect(r.finalAnnualRevenue).toBeCloseTo(109125.13842668159, 6);
    expect(r.annualNoi).toBeCloseTo(-103538.95694257275, 4);
    expect(r.exitValue).toBeCloseTo(1818752.30711136, 4);
    expect(outcome.warnings).toHaveLength(1);
  });

  it("keeps equity plus debt equal to total investment across LTVs", () => {
    for (const ltv of [0, 35, 60, 100]) {
      const outcome = engine.run(makeBuilding({ ltv }));
      if (!outcome.success) throw new Error("expected success");
      expect(outcome.result.equityAmount + outcome.result.debtAmount).toBeCloseTo(outcome.result.totalInvestment, 6);
    }
  });

  it("collects every invalid field with the building name and index", () => {
    const outcome = engine.run(makeBuilding({ name: "Dock 7", purchase_cap_rate: 0, capex_budget: -10 }), 3);
    expect(outcome.success).toBe(false);
    if (outcome.success) return;

    expect(outcome.index).toBe(3);
    expect(outcome.failure.name).toBe("Dock 7");
    expect(outcome.failure.errors.map((e) => e.path)).toEqual([
      "buildings[3].purchase_cap_rate",
      "buildings[3].capex_budget",
    ]);
    expect(outcome.failure.errors.every((e) => e.kind === "InvalidInput" && e.building === "Dock 7")).toBe(true);
  });

  it("rejects a blank name", () => {
    const errors = engine.validate(makeBuilding({ name: "   " }));
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("name");
  });

  it("reports an invalid exit cap rate", () => {
    const errors = engine.validate(makeBuilding({ exit_cap_rate: 0 }));
    expect(errors.map((e) => e.field)).toEqual(["exit_cap_rate"]);
  });

  describe("computation failures", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("fails a building whose indexed rent overflows", () => {
      const outcome = engine.run(
        makeBuilding({ name: "Overflow Tower", annual_rent: 1e290, rent_indexation: 1000, loan_term_years: 30, ltv: 0 }),
        1,
      );
      expect(outcome.success).toBe(false);
      if (outcome.success) return;

      expect(outcome.failure.errors).toEqual([
        {
          kind: "ComputationError",
          building: "Overflow Tower",
          module: "operating",
          path: "buildings[1].operating",
          message:
            "Module operating produced non-finite values: indexedRent, realizedRevenue, operatingCosts, netRevenue, netOperatingIncome",
        },
      ]);
    });

    it("fails a building whose exit value divides out to Infinity", () => {
      const outcome = engine.run(makeBuilding({ exit_cap_rate: 1e-320 }));
      if (outcome.success) throw new Error("expected a failure");

      expect(outcome.failure.errors[0]).toMatchObject({
        kind: "ComputationError",
        module: "exit",
        path: "buildings[0].exit",
        message: "Module exit produced non-finite values: exitValue",
      });
    });

    it("turns a thrown module error into a failure", () => {
      vi.spyOn(OperatingModule.prototype, "compute").mockImplementation(() => {
        throw new Error("occupancy curve unavailable");
      });

      const outcome = engine.run(makeBuilding({ name: "Dock 7" }), 2);
      if (outcome.success) throw new Error("expected a failure");

      expect(outcome.index).toBe(2);
      expect(outcome.failure.errors).toEqual([
        {
          kind: "ComputationError",
          building: "Dock 7",
          module: "operating",
          path: "buildings[2].operating",
          message: "Module operating threw: occupancy curve unavailable",
        },
      ]);
    });

    it("fails when a module reports unsuccessful", () => {
      vi.spyOn(OperatingModule.prototype, "compute").mockReturnValue({
        success: false,
        errors: ["missing debt outputs", "missing acquisition outputs"],
      });

      const outcome = engine.run(makeBuilding());
      if (outcome.success) throw new Error("expected a failure");
      expect(outcome.failure.errors[0].message).toBe("missing debt outputs; missing acquisition outputs");
    });
  });
});
