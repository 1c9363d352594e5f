import {
  isSimulationResult,
  isValidationResult,
  type PortfolioForm,
  type SimulationResult,
  type ValidationResult,
} from "./types";
import type { WidgetState } from "./widget-state";

const MCP_URL = process.env.NEXT_PUBLIC_MCP_URL || "http://localhost:8000/mcp";

// OpenAI Apps SDK window.openai interface
interface OpenAIBridge {
  callTool: (name: string, args: Record<string, unknown>) => Promise<{ structuredContent: unknown }>;
  setWidgetState?: (state: WidgetState) => void;
  getWidgetState?: () => WidgetState | null;
}

declare global {
  interface Window {
    openai?: OpenAIBridge;
  }
}

interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: number;
  result?: {
    content: { type: string; text: string }[];
    structuredContent: unknown;
  };
  error?: {
    code: number;
    message: string;
  };
}

let requestId = 0;

function getBridge(): OpenAIBridge | undefined {
  return typeof window === "undefined" ? undefined : window.openai;
}

/**
 * Call tool via direct MCP HTTP request (for local dev)
 */
async function callToolViaFetch(name: string, args: Record<string, unknown>): Promise<unknown> {
  const response = await fetch(MCP_URL, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
    },
    body: JSON.stringify({
      jsonrpc: "2.0",
      id: ++requestId,
      method: "tools/call",
      params: { name, arguments: args },
    }),
  });

  if (!response.ok) {
    throw new Error(`MCP request failed: ${response.status} ${response.statusText}`);
  }

  const data: JsonRpcResponse = await response.json();

  if (data.error) {
    throw new Error(`MCP error: ${data.error.message}`);
  }
  if (!data.result) {
    throw new Error("MCP response missing result");
  }

  return data.result.structuredContent;
}

/**
 * Call MCP tool - uses OpenAI bridge if available, otherwise direct HTTP
 */
async function callTool<T>(
  name: string,
  args: Record<string, unknown>,
  guard: (value: unknown) => value is T,
): Promise<T> {
  const bridge = getBridge();
  const content = bridge ? (await bridge.callTool(name, args)).structuredContent : await callToolViaFetch(name, args);

  if (!guard(content)) {
    throw new Error(`Unexpected response from ${name}`);
  }
  return content;
}

function toRequest(form: PortfolioForm) {
  return {
    buildings: form.buildings,
    options: { occupancy_model: form.occupancyModel },
  };
}

export async function validateInputs(form: PortfolioForm): Promise<ValidationResult> {
  return callTool("portfolio.validate_inputs", { inputs: toRequest(form) }, isValidationResult);
}

export async function simulate(form: PortfolioForm): Promise<SimulationResult> {
  return callTool("portfolio.simulate", toRequest(form), isSimulationResult);
}

/**
 * Save widget state to ChatGPT for persistence across sessions
 */
export function saveWidgetState(state: WidgetState): void {
  getBridge()?.setWidgetState?.(state);
}

/**
 * Load widget state from ChatGPT
 */
export function loadWidgetState(): WidgetState | null {
  return getBridge()?.getWidgetState?.() ?? null;
}
