import Ajv2020 from "ajv/dist/2020.js";
import type { SchemaObject, ValidateFunction } from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { MAX_BUILDINGS } from "../config.js";
import type { PortfolioInput } from "../types/inputs.js";
import type { ValidationError } from "../types/module.js";

export type RequestValidation =
  | { valid: true; request: PortfolioInput }
  | { valid: false; errors: ValidationError[] };

let validator: ValidateFunction<PortfolioInput> | null = null;

export function contractSchemaPath(): string {
  const rootDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");
  return join(rootDir, "contracts", "portfolio_v1.schema.json");
}

function getValidator(): ValidateFunction<PortfolioInput> {
  if (validator) {
    return validator;
  }

  const schema: SchemaObject = JSON.parse(readFileSync(contractSchemaPath(), "utf8"));

  const ajv = new Ajv2020({ strict: true, allErrors: true });
  addFormats(ajv);

  validator = ajv.compile<PortfolioInput>(schema);
  return validator;
}

export function validateRequest(request: unknown, maxBuildings = MAX_BUILDINGS): RequestValidation {
  let validate: ValidateFunction<PortfolioInput>;
  try {
    validate = getValidator();
  } catch (error) {
    return {
      valid: false,
      errors: [{ path: "/", message: error instanceof Error ? error.message : "Validation failed" }],
    };
  }

  if (!validate(request)) {
    const errors = (validate.errors ?? []).map((error) => {
      const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
      const message = error.message ?? "invalid";
      return { path, message };
    });
    return { valid: false, errors };
  }

  if (request.buildings.length > maxBuildings) {
    return {
      valid: false,
      errors: [{ path: "/buildings", message: `must NOT have more than ${maxBuildings} items` }],
    };
  }

  return { valid: true, request };
}
