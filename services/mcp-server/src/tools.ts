import { z } from "zod";
import {
  PortfolioEngine,
  createSummaryReport,
  type BuildingFailure,
  type BuildingResult,
  type PortfolioSummary,
  type ValidationError,
} from "@portfolio-sim/engine";
import { log } from "./logger.js";

// Tool input shapes (Zod for runtime validation). Building fields are checked
// against the JSON Schema contract in the engine, not here.
export const validateInputsInputShape = {
  inputs: z.record(z.unknown()),
};

export const simulateInputShape = {
  buildings: z.array(z.record(z.unknown())),
  options: z.record(z.unknown()).optional(),
};

const simulateArgsSchema = z.object(simulateInputShape);
const validateArgsSchema = z.object(validateInputsInputShape);

export type SimulateArgs = z.infer<typeof simulateArgsSchema>;
export type ValidateArgs = z.infer<typeof validateArgsSchema>;

export type ValidateToolResult =
  | { status: "ok" }
  | { status: "invalid"; errors: ValidationError[] };

export type SimulateToolResult =
  | { status: "invalid"; errors: ValidationError[] }
  | {
      status: "ok" | "empty";
      results: BuildingResult[];
      failures: BuildingFailure[];
      summary: PortfolioSummary;
      warnings: string[];
      report: string;
    };

export type ToolResult = ValidateToolResult | SimulateToolResult;

function newRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

export function handleValidateInputs(engine: PortfolioEngine, args: ValidateArgs): ValidateToolResult {
  const errors = engine.validateRequest(args.inputs);
  if (errors.length > 0) {
    return { status: "invalid", errors };
  }
  return { status: "ok" };
}

export function handleSimulate(engine: PortfolioEngine, args: SimulateArgs): SimulateToolResult {
  const requestId = newRequestId();
  const request = args.options === undefined
    ? { buildings: args.buildings }
    : { buildings: args.buildings, options: args.options };

  log.info("simulate called", { requestId, buildingCount: args.buildings.length });

  const outcome = engine.runRequest(request);
  if (!outcome.valid) {
    log.warn("simulate rejected by contract", { requestId, errorCount: outcome.errors.length });
    return { status: "invalid", errors: outcome.errors };
  }

  const run = outcome.run;
  log.info("simulate complete", {
    requestId,
    status: run.status,
    resultCount: run.results.length,
    failureCount: run.failures.length,
  });

  return {
    status: run.status,
    results: run.results,
    failures: run.failures,
    summary: run.summary,
    warnings: run.warnings,
    report: createSummaryReport(run),
  };
}

export function buildToolResponse(result: ToolResult) {
  // The summary report reads better than JSON for the model
  const text = "report" in result ? result.report : JSON.stringify(result);
  return {
    content: [{ type: "text" as const, text }],
    structuredContent: { ...result },
  };
}
