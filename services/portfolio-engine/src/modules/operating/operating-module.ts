import { compound, pct } from "../../core/math-utils.js";
import { projectOccupancy } from "../../core/occupancy.js";
import type { BuildingContext } from "../../types/context.js";
import type { BuildingInput } from "../../types/inputs.js";
import type { InvalidInput, Module, ModuleResult } from "../../types/module.js";
import { checkFields, finite, nonNegative, percentage } from "../../validate/building-checks.js";

export interface OperatingModuleOutputs {
  finalOccupancy: number;
  indexedRent: number;
  realizedRevenue: number;
  operatingCosts: number;
  netRevenue: number;
  annualDebtService: number;
  netOperatingIncome: number;
}

export class OperatingModule implements Module<OperatingModuleOutputs> {
  readonly name = "operating";
  readonly version = "1.0.0";
  readonly dependencies: readonly string[] = ["debt"];

  validate(building: BuildingInput): InvalidInput[] {
    return checkFields(building, [
      ["initial_occupancy", percentage],
      ["occupancy_drift", finite],
      ["rent_indexation", nonNegative],
      ["opex_ratio", percentage],
    ]);
  }

  compute(context: BuildingContext): ModuleResult<OperatingModuleOutputs> {
    const debt = context.outputs.debt;
    if (!debt) {
      return {
        success: false,
        errors: ["DebtModule must be computed before OperatingModule"],
      };
    }

    const building = context.building;
    const years = building.loan_term_years;

    const finalOccupancy = projectOccupancy(
      {
        initialPct: building.initial_occupancy,
        driftPctPerYear: building.occupancy_drift,
        years,
      },
      context.config.occupancyModel,
      context.config.occupancyGrowthRate,
    );

    // Rent indexed over the hold, then collected at the projected occupancy
    const indexedRent = compound(building.annual_rent, pct(building.rent_indexation), years);
    const realizedRevenue = indexedRent * pct(finalOccupancy);

    const operatingCosts = realizedRevenue * pct(building.opex_ratio);
    const netRevenue = realizedRevenue - operatingCosts;
    const annualDebtService = debt.annualDebtService;
    const netOperatingIncome = netRevenue - annualDebtService;

    if (netOperatingIncome < 0) {
      context.warnings.push(
        `${building.name}: annual debt service exceeds net revenue (NOI ${Math.round(netOperatingIncome)})`,
      );
    }

    const outputs: OperatingModuleOutputs = {
      finalOccupancy,
      indexedRent,
      realizedRevenue,
      operatingCosts,
      netRevenue,
      annualDebtService,
      netOperatingIncome,
    };
    context.outputs.operating = outputs;

    return { success: true, outputs };
  }
}
