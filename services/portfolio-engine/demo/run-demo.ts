/**
 * Portfolio Engine Demo Script
 *
 * Run with: npx tsx demo/run-demo.ts
 */

import { PortfolioEngine, createSummaryReport, formatResultsAsCsv } from "../src/index.js";
import type { PortfolioInput } from "../src/types/inputs.js";

const officePortfolio: PortfolioInput = {
  contract: { contract_version: "PORTFOLIO_V1", engine_version: "1.0.0" },
  buildings: [
    {
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
    },
    {
      name: "Station Square",
      annual_rent: 240000,
      purchase_cap_rate: 6.5,
      exit_cap_rate: 6,
      ltv: 50,
      interest_rate: 4.5,
      loan_term_years: 10,
      initial_occupancy: 70,
      occupancy_drift: 2,
      rent_indexation: 1.5,
      capex_budget: 400000,
      opex_ratio: 15,
    },
    {
      name: "Broken Inputs House",
      annual_rent: 80000,
      purchase_cap_rate: 0,
      exit_cap_rate: 6,
      ltv: 60,
      interest_rate: 4,
      loan_term_years: 7,
      initial_occupancy: 90,
      occupancy_drift: 0,
      rent_indexation: 2,
      capex_budget: -1,
      opex_ratio: 10,
    },
  ],
};

function main() {
  console.log("Portfolio Engine Demo");
  console.log("=====================\n");

  const engine = new PortfolioEngine();
  const outcome = engine.runRequest(officePortfolio);

  if (!outcome.valid) {
    console.error("Request rejected:");
    outcome.errors.forEach((e) => console.error(`  - ${e.path}: ${e.message}`));
    process.exit(1);
  }

  console.log(createSummaryReport(outcome.run));
  console.log("\nCSV EXPORT");
  console.log("-".repeat(60));
  console.log(formatResultsAsCsv(outcome.run.results));
}

main();
