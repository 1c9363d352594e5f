import type { EngineConfig } from "../config.js";
import type { AcquisitionModuleOutputs } from "../modules/acquisition/acquisition-module.js";
import type { DebtModuleOutputs } from "../modules/debt/debt-module.js";
import type { OperatingModuleOutputs } from "../modules/operating/operating-module.js";
import type { ExitModuleOutputs } from "../modules/exit/exit-module.js";
import type { BuildingInput } from "./inputs.js";

export interface BuildingModuleOutputs {
  acquisition: AcquisitionModuleOutputs;
  debt: DebtModuleOutputs;
  operating: OperatingModuleOutputs;
  exit: ExitModuleOutputs;
}

export interface BuildingContext {
  building: BuildingInput;
  config: EngineConfig;
  outputs: Partial<BuildingModuleOutputs>;
  warnings: string[];
}
