/**
 * Supervisor process: loads config and workflows, binds the control and
 * execution endpoints, and drains on SIGTERM/SIGINT.
 */

import "dotenv/config";
import { createNodeJSLogger } from "./logger.js";
import { loadConfig } from "./config.js";
import { loadWorkflowModule } from "./loader.js";
import { WorkflowRegistry } from "./registry.js";
import { Supervisor } from "./supervisor.js";
import { sampleHandlerSets } from "./workflows/index.js";

const SERVICE_NAME = "flowhost-supervisor";

async function main(): Promise<void> {
  const config = loadConfig();
  const loggerFactory = createNodeJSLogger(SERVICE_NAME, { level: config.logLevel });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const sets = config.workflowsModule
    ? await loadWorkflowModule(config.workflowsModule, log)
    : sampleHandlerSets;
  const registry = WorkflowRegistry.fromHandlerSets({ sets, version: config.handlerSetVersion });

  const supervisor = new Supervisor({ registry, config, loggerFactory });
  await supervisor.start();
  log.info(
    { workflows: registry.list().map((w) => w.name), endpoints: supervisor.endpoints },
    `${SERVICE_NAME}:main - Started`
  );

  const shutdown = (signal: string): void => {
    log.info({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    supervisor
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, `${SERVICE_NAME}:main - Drain failed`);
        process.exit(1);
      });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
