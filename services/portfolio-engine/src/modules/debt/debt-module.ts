import { annualPctToMonthly, pct, pmt } from "../../core/math-utils.js";
import type { BuildingContext } from "../../types/context.js";
import type { BuildingInput } from "../../types/inputs.js";
import type { InvalidInput, Module, ModuleResult } from "../../types/module.js";
import { checkFields, percentage, wholeYears } from "../../validate/building-checks.js";

export interface DebtModuleOutputs {
  loanAmount: number;
  equityAmount: number;
  periods: number;
  monthlyRate: number;
  monthlyPayment: number;
  annualDebtService: number;
  totalInterestPaid: number;
}

export interface AmortizationSummary {
  periods: number;
  monthlyRate: number;
  monthlyPayment: number;
  totalInterestPaid: number;
}

/**
 * Fixed-rate, fully amortizing loan with monthly payments.
 * A zero rate repays principal in equal instalments.
 */
export function amortize(loanAmount: number, annualRatePct: number, termYears: number): AmortizationSummary {
  const periods = termYears * 12;
  const monthlyRate = annualPctToMonthly(annualRatePct);

  if (loanAmount === 0) {
    return { periods, monthlyRate, monthlyPayment: 0, totalInterestPaid: 0 };
  }

  const monthlyPayment = -pmt(monthlyRate, periods, loanAmount);
  const totalInterestPaid = monthlyRate === 0 ? 0 : monthlyPayment * periods - loanAmount;

  return { periods, monthlyRate, monthlyPayment, totalInterestPaid };
}

export class DebtModule implements Module<DebtModuleOutputs> {
  readonly name = "debt";
  readonly version = "1.0.0";
  readonly dependencies: readonly string[] = ["acquisition"];

  validate(building: BuildingInput): InvalidInput[] {
    return checkFields(building, [
      ["ltv", percentage],
      ["interest_rate", percentage],
      ["loan_term_years", wholeYears],
    ]);
  }

  compute(context: BuildingContext): ModuleResult<DebtModuleOutputs> {
    const acquisition = context.outputs.acquisition;
    if (!acquisition) {
      return {
        success: false,
        errors: ["AcquisitionModule must be computed before DebtModule"],
      };
    }

    const { ltv, interest_rate, loan_term_years } = context.building;
    const totalInvestment = acquisition.totalInvestment;

    const loanAmount = totalInvestment * pct(ltv);
    const equityAmount = totalInvestment - loanAmount;
    const schedule = amortize(loanAmount, interest_rate, loan_term_years);

    const outputs: DebtModuleOutputs = {
      loanAmount,
      equityAmount,
      periods: schedule.periods,
      monthlyRate: schedule.monthlyRate,
      monthlyPayment: schedule.monthlyPayment,
      annualDebtService: schedule.monthlyPayment * 12,
      totalInterestPaid: schedule.totalInterestPaid,
    };
    context.outputs.debt = outputs;

    return { success: true, outputs };
  }
}
