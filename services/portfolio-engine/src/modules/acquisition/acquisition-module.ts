import { pct } from "../../core/math-utils.js";
import type { BuildingContext } from "../../types/context.js";
import type { BuildingInput } from "../../types/inputs.js";
import type { InvalidInput, Module, ModuleResult } from "../../types/module.js";
import { checkFields, nonNegative, positive } from "../../validate/building-checks.js";

export interface AcquisitionModuleOutputs {
  acquisitionValue: number;
  capexBudget: number;
  totalInvestment: number;
}

export class AcquisitionModule implements Module<AcquisitionModuleOutputs> {
  readonly name = "acquisition";
  readonly version = "1.0.0";
  readonly dependencies: readonly string[] = [];

  validate(building: BuildingInput): InvalidInput[] {
    return checkFields(building, [
      ["annual_rent", nonNegative],
      ["purchase_cap_rate", positive],
      ["capex_budget", nonNegative],
    ]);
  }

  compute(context: BuildingContext): ModuleResult<AcquisitionModuleOutputs> {
    const { annual_rent, purchase_cap_rate, capex_budget } = context.building;

    // Value the rent roll at the going-in cap rate
    const acquisitionValue = annual_rent / pct(purchase_cap_rate);
    const totalInvestment = acquisitionValue + capex_budget;

    const outputs: AcquisitionModuleOutputs = {
      acquisitionValue,
      capexBudget: capex_budget,
      totalInvestment,
    };
    context.outputs.acquisition = outputs;

    return { success: true, outputs };
  }
}
