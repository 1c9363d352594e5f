import { z } from "zod";
import {
  DEFAULT_OCCUPANCY_GROWTH_RATE,
  resolveEngineConfig,
  type EngineConfig,
} from "@portfolio-sim/engine";

export const MCP_PATH = "/mcp";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  WIDGET_PUBLIC_URL: z.string().url().optional(),
  // Legacy name, still honoured
  WIDGET_URL: z.string().url().optional(),
  MCP_PUBLIC_URL: z.string().url().optional(),
  OCCUPANCY_MODEL: z.enum(["logistic", "linear"]).default("logistic"),
  OCCUPANCY_GROWTH_RATE: z.coerce.number().positive().default(DEFAULT_OCCUPANCY_GROWTH_RATE),
});

export interface ServerConfig {
  port: number;
  widgetPublicUrl: string;
  // MCP server public URL for CSP connect-src
  mcpPublicUrl: string;
  usesLegacyWidgetUrl: boolean;
  engine: EngineConfig;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid server configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    widgetPublicUrl: vars.WIDGET_PUBLIC_URL ?? vars.WIDGET_URL ?? "http://localhost:3001",
    mcpPublicUrl: vars.MCP_PUBLIC_URL ?? `http://localhost:${vars.PORT}`,
    usesLegacyWidgetUrl: vars.WIDGET_URL !== undefined && vars.WIDGET_PUBLIC_URL === undefined,
    engine: resolveEngineConfig({
      occupancyModel: vars.OCCUPANCY_MODEL,
      occupancyGrowthRate: vars.OCCUPANCY_GROWTH_RATE,
    }),
  };
}
