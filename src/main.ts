#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createTimerServer } from "./server.js";

async function bootstrap() {
  const config = loadConfig();
  const app = await createApp(config);
  const { server } = createTimerServer(app);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  app.logger.info({ settingsPath: config.settingsPath, soundsDir: config.soundsDir }, "tickbar MCP server ready on stdio");

  let closing = false;
  const shutdown = async () => {
    if (closing) {
      return;
    }
    closing = true;
    app.logger.info("Shutting down tickbar...");
    try {
      await server.close();
      await app.shutdown();
    } catch (error) {
      app.logger.error({ err: error }, "Error during shutdown");
      process.exitCode = 1;
    }
    process.exit();
  };

  server.server.onclose = () => {
    shutdown().catch(error => app.logger.error({ err: error }, "Shutdown failed"));
  };
  process.on("SIGINT", () => {
    shutdown().catch(error => app.logger.error({ err: error }, "Shutdown failed"));
  });
  process.on("SIGTERM", () => {
    shutdown().catch(error => app.logger.error({ err: error }, "Shutdown failed"));
  });
}

bootstrap().catch(error => {
  createLogger().fatal({ err: error }, "Failed to start tickbar");
  process.exit(1);
});
