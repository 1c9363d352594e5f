import type { BuildingContext } from "./context.js";
import type { BuildingInput } from "./inputs.js";

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
}

/** A building input that failed a domain check. */
export interface InvalidInput extends ValidationError {
  kind: "InvalidInput";
  building: string;
  field: keyof BuildingInput;
}

/** A module that failed, threw, or overflowed on an otherwise valid building. */
export interface ComputationError extends ValidationError {
  kind: "ComputationError";
  building: string;
  module: string;
}

export type BuildingError = InvalidInput | ComputationError;

export type ModuleResult<T> =
  | { success: true; outputs: T }
  | { success: false; errors: string[] };

export interface Module<T = unknown> {
  name: string;
  version: string;
  dependencies: readonly string[];
  validate(building: BuildingInput): InvalidInput[];
  compute(context: BuildingContext): ModuleResult<T>;
}
