import { describe, expect, it } from "vitest";

import { resolveEngineConfig } from "../../src/config";
import { EMPTY_PORTFOLIO_WARNING, PortfolioEngine } from "../../src/engine/portfolio-engine";
import { makeBuilding, riverside } from "../helpers";

describe("PortfolioEngine", () => {
  const engine = new PortfolioEngine();

  it("warns and computes nothing for an empty portfolio", () => {
    const run = engine.run({ buildings: [] });

    expect(run).toEqual({
      status: "empty",
      results: [],
      failures: [],
      summary: {
        buildingCount: 0,
        totalEquity: 0,
        totalDebt: 0,
        totalNoi: 0,
        totalExitValue: 0,
      },
      warnings: [EMPTY_PORTFOLIO_WARNING],
    });
  });

  it("computes the reference scenario", () => {
    const run = engine.run({ buildings: [riverside] });

    expect(run.status).toBe("ok");
    expect(run.results).toHaveLength(1);
    expect(run.summary.buildingCount).toBe(1);
    expect(run.summary.totalDebt).toBeCloseTo(1_230_000, 6);
    expect(run.summary.totalEquity).toBeCloseTo(820_000, 6);
  });

  it("excludes invalid buildings without aborting the run", () => {
    const good = makeBuilding({ name: "Good" });
    const alsoGood = makeBuilding({ name: "Also Good", annual_rent: 50_000, ltv: 0 });
    const bad = makeBuilding({ name: "Bad", exit_cap_rate: 0 });

    const run = engine.run({ buildings: [good, bad, alsoGood] });

    expect(run.results.map((r) => r.name)).toEqual(["Good", "Also Good"]);
    expect(run.failures).toHaveLength(1);
    expect(run.failures[0].index).toBe(1);
    expect(run.failures[0].errors[0].path).toBe("buildings[1].exit_cap_rate");

    const [first, second] = run.results;
    expect(run.summary.buildingCount).toBe(2);
    expect(run.summary.totalEquity).toBeCloseTo(first.equityAmount + second.equityAmount, 6);
    expect(run.summary.totalDebt).toBeCloseTo(first.debtAmount + second.debtAmount, 6);
    expect(run.summary.totalNoi).toBeCloseTo(first.annualNoi + second.annualNoi, 6);
    expect(run.summary.totalExitValue).toBeCloseTo(first.exitValue + second.exitValue, 6);
  });

  it("keeps running when one building's computation overflows", () => {
    const good = makeBuilding({ name: "Good" });
    const overflow = makeBuilding({
      name: "Overflow Tower",
      annual_rent: 1e290,
      rent_indexation: 1000,
      loan_term_years: 30,
      ltv: 0,
    });
    const tinyExitCap = makeBuilding({ name: "Tiny Exit Cap", exit_cap_rate: 1e-320 });

    const run = engine.run({ buildings: [overflow, good, tinyExitCap] });

    expect(run.results.map((r) => r.name)).toEqual(["Good"]);
    expect(run.failures.map((f) => [f.index, f.errors[0].kind, f.errors[0].path])).toEqual([
      [0, "ComputationError", "buildings[0].operating"],
      [2, "ComputationError", "buildings[2].exit"],
    ]);
    expect(run.summary.buildingCount).toBe(1);
    expect(run.summary.totalNoi).toBeCloseTo(-103538.95694257275, 4);
    expect(run.summary.totalExitValue).toBeCloseTo(1818752.30711136, 4);
  });

  it("returns zero totals when every building is invalid", () => {
    const run = engine.run({ buildings: [makeBuilding({ purchase_cap_rate: -2 })] });

    expect(run.status).toBe("ok");
    expect(run.results).toEqual([]);
    expect(run.summary.totalExitValue).toBe(0);
    expect(run.warnings).toEqual(["No building passed validation; portfolio totals are zero"]);
  });

  it("applies per-request occupancy options", () => {
    const building = makeBuilding({ initial_occupancy: 90, occupancy_drift: -3, loan_term_years: 5 });

    const linear = engine.run({ buildings: [building], options: { occupancy_model: "linear" } });
    expect(linear.results[0].finalOccupancy).toBe(75);

    const logistic = new PortfolioEngine(resolveEngineConfig({ occupancyGrowthRate: 0.1 })).run({ buildings: [building] });
    expect(logistic.results[0].finalOccupancy).toBeLessThan(90);
    expect(logistic.results[0].finalOccupancy).toBeGreaterThan(0);
  });

  describe("runRequest", () => {
    it("rejects a request that breaks the contract", () => {
      const outcome = engine.runRequest({ buildings: [{ name: "No numbers" }] });
      expect(outcome.valid).toBe(false);
      if (outcome.valid) return;
      expect(outcome.errors.some((e) => e.path === "/buildings/0" && e.message.includes("annual_rent"))).toBe(true);
    });

    it("rejects more than twenty buildings", () => {
      const buildings = Array.from({ length: 21 }, (_, i) => makeBuilding({ name: `B${i + 1}` }));
      const outcome = engine.runRequest({ buildings });
      expect(outcome).toEqual({
        valid: false,
        errors: [{ path: "/buildings", message: "must NOT have more than 20 items" }],
      });
    });

    it("runs a valid request", () => {
      const outcome = engine.runRequest({
        contract: { contract_version: "PORTFOLIO_V1" },
        buildings: [riverside],
      });
      expect(outcome.valid).toBe(true);
      if (!outcome.valid) return;
      expect(outcome.run.results[0].exitValue).toBeCloseTo(1818752.30711136, 4);
    });
  });

  describe("validateRequest", () => {
    it("lists domain errors with request paths", () => {
      expect(engine.validateRequest({ buildings: [riverside, makeBuilding({ ltv: 150 })] })).toEqual([
        { path: "buildings[1].ltv", message: "ltv must be between 0 and 100" },
      ]);
    });

    it("returns no errors for a valid request", () => {
      expect(engine.validateRequest({ buildings: [riverside] })).toEqual([]);
    });
  });
});
