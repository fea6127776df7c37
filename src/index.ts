#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createBackend } from "./storage/index.js";
import { PostgresStore } from "./storage/postgres.js";
import { Driver } from "./driver.js";
import { registerTools } from "./tools.js";

async function main() {
  const backend = createBackend();

  // Auto-initialize schema if DRIVE_AUTO_INIT=true
  if (process.env.DRIVE_AUTO_INIT === "true" && backend instanceof PostgresStore) {
    await backend.initSchema();
    console.error("[drive] Schema initialized successfully");
  }

  const rootDirectory = process.env.DRIVE_ROOT ?? "";
  const driver = await Driver.create(backend, { rootDirectory });
  console.error(`[drive] Root: /${rootDirectory} (${driver.root.id})`);

  const server = new McpServer({
    name: "mcp-drive-tree",
    version: "1.0.0",
  });

  registerTools(server, driver);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    backend.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[drive] Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
