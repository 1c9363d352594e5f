export { AcquisitionModule } from "./acquisition/acquisition-module.js";
export type { AcquisitionModuleOutputs } from "./acquisition/acquisition-module.js";
export { DebtModule, amortize } from "./debt/debt-module.js";
export type { DebtModuleOutputs, AmortizationSummary } from "./debt/debt-module.js";
export { OperatingModule } from "./operating/operating-module.js";
export type { OperatingModuleOutputs } from "./operating/operating-module.js";
export { ExitModule } from "./exit/exit-module.js";
export type { ExitModuleOutputs } from "./exit/exit-module.js";
