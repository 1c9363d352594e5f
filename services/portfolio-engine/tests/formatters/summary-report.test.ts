import { describe, expect, it } from "vitest";

import { PortfolioEngine } from "../../src/engine/portfolio-engine";
import { createSummaryReport } from "../../src/formatters/summary-report";
import { makeBuilding } from "../helpers";

describe("createSummaryReport", () => {
  const engine = new PortfolioEngine();

  it("reports an empty portfolio", () => {
    const report = createSummaryReport(engine.run({ buildings: [] }));
    expect(report.split("\n")).toContain(
      "  ! EmptyPortfolio: no buildings were submitted, nothing to simulate",
    );
    expect(report).not.toContain("TOTALS");
  });

  it("lists buildings, totals and excluded buildings", () => {
    const run = engine.run({
      buildings: [
        makeBuilding({ name: "Unlevered", ltv: 0, initial_occupancy: 100, rent_indexation: 0, opex_ratio: 20, capex_budget: 0 }),
        makeBuilding({ name: "Broken", purchase_cap_rate: 0 }),
      ],
    });
    const lines = createSummaryReport(run).split("\n");

    expect(lines).toContain(
      "  Unlevered: invested 2,000,000 | debt 0 | equity 2,000,000 | NOI 80,000 | exit 1,666,667",
    );
    expect(lines).toContain("  Buildings: 1");
    expect(lines).toContain("  Equity: 2,000,000");
    expect(lines).toContain("  Exit value: 1,666,667");
    expect(lines).toContain("  Broken: buildings[1].purchase_cap_rate: purchase_cap_rate must be greater than 0");
  });
});
