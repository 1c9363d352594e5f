import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { PortfolioEngine } from "@portfolio-sim/engine";
import type { ServerConfig } from "./config.js";
import {
  buildToolResponse,
  handleSimulate,
  handleValidateInputs,
  simulateInputShape,
  validateInputsInputShape,
} from "./tools.js";

export const WIDGET_URI = "ui://widget/portfolio";

// Build CSP directives for the widget HTML (legacy meta tag)
export function buildCsp(config: ServerConfig): string {
  const widgetOrigin = new URL(config.widgetPublicUrl).origin;
  const mcpOrigin = new URL(config.mcpPublicUrl).origin;

  return [
    `default-src 'none'`,
    `script-src 'self' ${widgetOrigin} 'unsafe-inline'`,
    `style-src 'self' 'unsafe-inline'`,
    `connect-src ${mcpOrigin}`,
    `img-src 'self' data:`,
  ].join("; ");
}

// CSP object for MCP resource metadata
function buildWidgetCsp(config: ServerConfig): Record<string, unknown> {
  return {
    // resource_domains: where widget assets (JS/CSS) are loaded from
    resource_domains: [new URL(config.widgetPublicUrl).origin],
    // connect_domains: where widget can make API calls (MCP server)
    connect_domains: [new URL(config.mcpPublicUrl).origin],
  };
}

export function getWidgetHtml(config: ServerConfig): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta http-equiv="Content-Security-Policy" content="${buildCsp(config)}">
  <title>Portfolio Simulator</title>
</head>
<body>
  <div id="root"></div>
  <script src="${config.widgetPublicUrl}/widget.js"></script>
</body>
</html>`;
}

export function createPortfolioServer(config: ServerConfig): McpServer {
  const server = new McpServer({ name: "portfolio-mcp", version: "1.0.0" });
  const engine = new PortfolioEngine(config.engine);

  const widgetMeta = {
    "openai/widgetCSP": buildWidgetCsp(config),
    "openai/widgetDomain": new URL(config.widgetPublicUrl).origin,
    "openai/widgetDescription": "Office portfolio simulator: building form, results table and charts.",
    "openai/widgetPrefersBorder": true,
  };

  server.registerResource(
    "portfolio-widget",
    WIDGET_URI,
    {
      description: "Portfolio simulator widget UI",
      mimeType: "text/html+skybridge",
      _meta: widgetMeta,
    },
    async () => ({
      contents: [
        {
          uri: WIDGET_URI,
          mimeType: "text/html+skybridge",
          text: getWidgetHtml(config),
          _meta: widgetMeta,
        },
      ],
    }),
  );

  // Tool 1: validate_inputs (widget-only, hidden from model selection)
  server.registerTool(
    "portfolio.validate_inputs",
    {
      title: "Validate Portfolio Inputs (Widget Internal)",
      description:
        "Check a portfolio request against the input contract and every building's field ranges without running the simulation.",
      inputSchema: validateInputsInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        openWorldHint: false,
        idempotentHint: true,
      },
      _meta: {
        "openai/visibility": "private",
        "openai/widgetAccessible": true,
      },
    },
    async (args) => buildToolResponse(handleValidateInputs(engine, args)),
  );

  // Tool 2: simulate
  server.registerTool(
    "portfolio.simulate",
    {
      title: "Simulate Office Portfolio",
      description:
        "Compute acquisition value, debt, equity, NOI and exit value for up to 20 buildings and total them. Rates are percentages (5 means 5%). Invalid buildings are reported and left out of the totals.",
      inputSchema: simulateInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        openWorldHint: false,
        idempotentHint: true,
      },
      _meta: {
        "openai/outputTemplate": WIDGET_URI,
        "openai/widgetAccessible": true,
        "openai/toolInvocation/invoking": "Running portfolio simulation...",
        "openai/toolInvocation/invoked": "Portfolio simulation complete",
      },
    },
    async (args) => buildToolResponse(handleSimulate(engine, args)),
  );

  return server;
}
