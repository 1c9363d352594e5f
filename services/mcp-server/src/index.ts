import { createServer } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { MCP_PATH, loadConfig } from "./config.js";
import { log } from "./logger.js";
import { createPortfolioServer } from "./server.js";

const config = loadConfig();

if (config.usesLegacyWidgetUrl) {
  log.warn("Using legacy WIDGET_URL. Please migrate to WIDGET_PUBLIC_URL");
}

const MCP_METHODS = new Set(["POST", "GET", "DELETE"]);

const httpServer = createServer(async (req, res) => {
  if (!req.url) {
    res.writeHead(400).end("Missing URL");
    return;
  }

  const url = new URL(req.url, `http://${req.headers.host ?? "localhost"}`);

  if (req.method === "OPTIONS" && url.pathname === MCP_PATH) {
    res.writeHead(204, {
      "Access-Control-Allow-Origin": "*",
      "Access-Control-Allow-Methods": "POST, GET, DELETE, OPTIONS",
      "Access-Control-Allow-Headers": "content-type, mcp-session-id",
      "Access-Control-Expose-Headers": "Mcp-Session-Id",
    });
    res.end();
    return;
  }

  if (req.method === "GET" && url.pathname === "/health") {
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: true }));
    return;
  }

  if (url.pathname === MCP_PATH && req.method && MCP_METHODS.has(req.method)) {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Expose-Headers", "Mcp-Session-Id");

    // Stateless: a fresh server and transport per request
    const server = createPortfolioServer(config);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on("close", () => {
      transport.close().catch((error: unknown) => log.warn("transport close failed", { error: String(error) }));
      server.close().catch((error: unknown) => log.warn("server close failed", { error: String(error) }));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res);
    } catch (error) {
      log.error("Error handling MCP request", { error: String(error) });
      if (!res.headersSent) {
        res.writeHead(500).end("Internal server error");
      }
    }
    return;
  }

  res.writeHead(404).end("Not Found");
});

httpServer.listen(config.port, () => {
  log.info(`Portfolio MCP server listening on http://localhost:${config.port}${MCP_PATH}`, {
    occupancyModel: config.engine.occupancyModel,
    occupancyGrowthRate: config.engine.occupancyGrowthRate,
  });
});
