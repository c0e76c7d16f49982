import { createServer } from "http";
import { loadConfig } from "../ingest/config";
import { createOrchestrator } from "../ingest/pipeline/orchestrator";
import { EnvSecretStore } from "../ingest/secrets";
import type { PipelineKind } from "../ingest/types";
import { createApp } from "./app";
import { HourlyScheduler } from "./scheduler";

async function startServer() {
  const config = loadConfig(process.env);
  const orchestrator = createOrchestrator(config, new EnvSecretStore(process.env, config.secrets.vault));

  const pipelines: PipelineKind[] = [];
  if (config.run.enableBatched) pipelines.push("batched");
  if (config.run.enablePerCall) pipelines.push("per-call");

  const scheduler = new HourlyScheduler({
    minute: config.schedule.minute,
    pipelines,
    runOnStartup: config.schedule.runOnStartup,
    run: (pipeline, runAt) => orchestrator.run(pipeline, runAt)
  });

  const app = createApp(orchestrator);
  const server = createServer(app);

  server.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}/`, {
      storage: config.storage.backend,
      container: config.storage.container,
      pipelines
    });
    scheduler.start();
  });

  const shutdown = () => {
    scheduler.stop();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

startServer().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
