import { pct } from "../../core/math-utils.js";
import type { BuildingContext } from "../../types/context.js";
import type { BuildingInput } from "../../types/inputs.js";
import type { InvalidInput, Module, ModuleResult } from "../../types/module.js";
import { checkFields, positive } from "../../validate/building-checks.js";

export interface ExitModuleOutputs {
  exitRevenue: number;
  exitCapRate: number;
  exitValue: number;
}

export class ExitModule implements Module<ExitModuleOutputs> {
  readonly name = "exit";
  readonly version = "1.0.0";
  readonly dependencies: readonly string[] = ["operating"];

  validate(building: BuildingInput): InvalidInput[] {
    return checkFields(building, [["exit_cap_rate", positive]]);
  }

  compute(context: BuildingContext): ModuleResult<ExitModuleOutputs> {
    const operating = context.outputs.operating;
    if (!operating) {
      return {
        success: false,
        errors: ["OperatingModule must be computed before ExitModule"],
      };
    }

    // Capitalize the final year's collected revenue at the exit cap rate
    const exitRevenue = operating.realizedRevenue;
    const exitValue = exitRevenue / pct(context.building.exit_cap_rate);

    const outputs: ExitModuleOutputs = {
      exitRevenue,
      exitCapRate: context.building.exit_cap_rate,
      exitValue,
    };
    context.outputs.exit = outputs;

    return { success: true, outputs };
  }
}
