import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { MarketIntelService } from "@market-intel/agents";
import { registerRunTools } from "./tools/runs.js";

export function createMcpServer(
  service: MarketIntelService,
  options: { includeVoiceDefault?: boolean } = {},
): McpServer {
  const server = new McpServer({
    name: "market-intel-mcp",
    version: "0.1.0",
  });

  registerRunTools(server, service, options);
  return server;
}
