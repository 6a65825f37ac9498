#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServiceFromConfig, loadConfig } from "@market-intel/agents";
import { createMcpServer } from "./server.js";

const config = loadConfig();
const service = createServiceFromConfig(config);
const server = createMcpServer(service, {
  includeVoiceDefault: config.pipeline.includeVoiceDefault,
});

const transport = new StdioServerTransport();
await server.connect(transport);
