import type { BuildingField, BuildingInput } from "../types/inputs.js";
import type { InvalidInput } from "../types/module.js";

type Check = (value: number) => string | null;

export const finite: Check = (value) =>
  typeof value === "number" && Number.isFinite(value) ? null : "must be a finite number";

export const nonNegative: Check = (value) => finite(value) ?? (value < 0 ? "must not be negative" : null);

export const positive: Check = (value) => finite(value) ?? (value <= 0 ? "must be greater than 0" : null);

export const percentage: Check = (value) =>
  finite(value) ?? (value < 0 || value > 100 ? "must be between 0 and 100" : null);

export const wholeYears: Check = (value) =>
  finite(value) ?? (!Number.isInteger(value) || value < 1 ? "must be a whole number of years, at least 1" : null);

export function invalidInput(
  building: BuildingInput,
  field: keyof BuildingInput,
  message: string,
): InvalidInput {
  return {
    kind: "InvalidInput",
    building: building.name,
    field,
    path: field,
    message: `${field} ${message}`,
  };
}

export function checkFields(
  building: BuildingInput,
  checks: readonly (readonly [BuildingField, Check])[],
): InvalidInput[] {
  const errors: InvalidInput[] = [];
  for (const [field, check] of checks) {
    const message = check(building[field]);
    if (message !== null) {
      errors.push(invalidInput(building, field, message));
    }
  }
  return errors;
}

export function checkName(building: BuildingInput): InvalidInput[] {
  if (typeof building.name !== "string" || building.name.trim().length === 0) {
    return [invalidInput(building, "name", "must be a non-empty string")];
  }
  return [];
}
