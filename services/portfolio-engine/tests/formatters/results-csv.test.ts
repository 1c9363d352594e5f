import { describe, expect, it } from "vitest";

import { RESULT_COLUMNS, formatResultsAsCsv } from "../../src/formatters/results-csv";
import type { BuildingResult } from "../../src/types/results";

const result: BuildingResult = {
  name: "Riverside Offices",
  acquisitionValue: 2_000_000,
  totalInvestment: 2_050_000,
  debtAmount: 1_230_000,
  equityAmount: 820_000,
  monthlyPayment: 16812.63179388218,
  annualDebtService: 201751.58152658617,
  totalInterestPaid: 182261.0706861033,
  finalOccupancy: 94.99999999999999,
  finalAnnualRevenue: 109125.13842668159,
  annualNoi: -103538.95694257275,
  exitValue: 1818752.30711136,
};

describe("formatResultsAsCsv", () => {
  it("writes only the header for no results", () => {
    expect(formatResultsAsCsv([])).toBe(`${RESULT_COLUMNS.join(",")}\n`);
  });

  it("names the header after the result fields", () => {
    const [header] = formatResultsAsCsv([result]).split("\n");
    expect(header).toBe(
      "name,acquisitionValue,totalInvestment,debtAmount,equityAmount,monthlyPayment,annualDebtService,totalInterestPaid,finalOccupancy,finalAnnualRevenue,annualNoi,exitValue",
    );
  });

  it("rounds values to cents", () => {
    const [, row] = formatResultsAsCsv([result]).split("\n");
    expect(row).toBe(
      "Riverside Offices,2000000,2050000,1230000,820000,16812.63,201751.58,182261.07,95,109125.14,-103538.96,1818752.31",
    );
  });

  it("quotes names holding commas or quotes", () => {
    const csv = formatResultsAsCsv([
      { ...result, name: 'Dock 7, "North"' },
    ]);
    expect(csv.split("\n")[1].startsWith('"Dock 7, ""North""",2000000,')).toBe(true);
  });
});
