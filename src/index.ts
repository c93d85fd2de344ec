#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BenchConfig } from "./config/config.js";
import { createConsoleLogger } from "./core/logger.js";
import { openDatabase } from "./db/bootstrap.js";
import { createDb } from "./db/connection.js";
import { FileDefinitionResolver } from "./definitions/fileResolver.js";
import { DockerEngine } from "./execution/backends/dockerEngine.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const configPath = process.env.BENCHDOCK_CONFIG_PATH ?? "config/default.config.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  const logger = createConsoleLogger("benchdock");

  const config = await BenchConfig.loadFromFile(configPath);
  const pool = await openDatabase({ databaseUrl: process.env.DATABASE_URL, schemaPath: "db/schema.sql", autoSchema });

  const store = new PostgresStore(createDb(pool));
  const resolver = new FileDefinitionResolver(config.resourcesDir());
  const engine = new DockerEngine(config.engineBin());

  const server = createGatewayServer({ config, store, resolver, engine, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("benchdock gateway ready (config %s)", config.configHash);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
