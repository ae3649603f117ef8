#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { KeywordCatalog, createReportRepository } from "@valuation-qa/engine";
import { createQaToolContext, registerQaTools } from "./tools/qa.js";

const server = new McpServer({
  name: "valuation-qa-mcp",
  version: "0.1.0",
});

// Catalog warnings go to stderr; stdout carries the protocol
const catalog = KeywordCatalog.load();
const repository = await createReportRepository();

registerQaTools(server, createQaToolContext(catalog, repository));

const transport = new StdioServerTransport();
await server.connect(transport);
