import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config.js";
import type { BuildingContext } from "../types/context.js";
import type { BuildingInput } from "../types/inputs.js";
import type { BuildingError, InvalidInput, Module } from "../types/module.js";
import type { BuildingOutcome, BuildingResult } from "../types/results.js";
import { AcquisitionModule } from "../modules/acquisition/acquisition-module.js";
import { DebtModule } from "../modules/debt/debt-module.js";
import { OperatingModule } from "../modules/operating/operating-module.js";
import { ExitModule } from "../modules/exit/exit-module.js";
import { checkName } from "../validate/building-checks.js";

function withIndex<T extends BuildingError>(error: T, index: number): T {
  return { ...error, path: `buildings[${index}].${error.path}` };
}

// Names of numeric outputs that overflowed to Infinity or became NaN
function nonFiniteOutputs(outputs: unknown): string[] {
  if (typeof outputs !== "object" || outputs === null) {
    return [];
  }
  return Object.entries(outputs)
    .filter(([, value]) => typeof value === "number" && !Number.isFinite(value))
    .map(([key]) => key);
}

export class BuildingEngine {
  private readonly modules: Module[];
  private readonly config: EngineConfig;

  constructor(config: EngineConfig = DEFAULT_ENGINE_CONFIG) {
    this.config = config;
    // Execution order
    this.modules = [
      new AcquisitionModule(),
      new DebtModule(),
      new OperatingModule(),
      new ExitModule(),
    ];
  }

  /**
   * Every domain error of one building, so the form can show them all at once
   */
  validate(building: BuildingInput): InvalidInput[] {
    const errors: InvalidInput[] = [...checkName(building)];
    for (const module of this.modules) {
      errors.push(...module.validate(building));
    }
    return errors;
  }

  /**
   * Run one building. Never throws: a bad building becomes a failure outcome.
   */
  run(building: BuildingInput, index = 0): BuildingOutcome {
    const invalid = this.validate(building);
    if (invalid.length > 0) {
      return {
        success: false,
        index,
        failure: {
          index,
          name: building.name,
          errors: invalid.map((error) => withIndex(error, index)),
        },
      };
    }

    const context: BuildingContext = {
      building,
      config: this.config,
      outputs: {},
      warnings: [],
    };

    for (const module of this.modules) {
      let failure: string | null = null;
      try {
        const result = module.compute(context);
        if (!result.success) {
          failure = result.errors.join("; ");
        } else {
          const overflowed = nonFiniteOutputs(result.outputs);
          if (overflowed.length > 0) {
            failure = `Module ${module.name} produced non-finite values: ${overflowed.join(", ")}`;
          }
        }
      } catch (e) {
        failure = `Module ${module.name} threw: ${e instanceof Error ? e.message : String(e)}`;
      }

      if (failure !== null) {
        return {
          success: false,
          index,
          failure: {
            index,
            name: building.name,
            errors: [
              withIndex(
                {
                  kind: "ComputationError",
                  building: building.name,
                  module: module.name,
                  path: module.name,
                  message: failure,
                },
                index,
              ),
            ],
          },
        };
      }
    }

    return {
      success: true,
      index,
      result: toBuildingResult(context),
      warnings: context.warnings,
    };
  }
}

function toBuildingResult(context: BuildingContext): BuildingResult {
  const { acquisition, debt, operating, exit } = context.outputs;
  if (!acquisition || !debt || !operating || !exit) {
    throw new Error("Building context is missing module outputs");
  }

  return {
    name: context.building.name,
    acquisitionValue: acquisition.acquisitionValue,
    totalInvestment: acquisition.totalInvestment,
    debtAmount: debt.loanAmount,
    equityAmount: debt.equityAmount,
    monthlyPayment: debt.monthlyPayment,
    annualDebtService: debt.annualDebtService,
    totalInterestPaid: debt.totalInterestPaid,
    finalOccupancy: operating.finalOccupancy,
    finalAnnualRevenue: operating.realizedRevenue,
    annualNoi: operating.netOperatingIncome,
    exitValue: exit.exitValue,
  };
}
