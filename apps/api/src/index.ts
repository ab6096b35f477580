import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import {
  getLogger,
  JsonLayoutProvider,
  loadEngineConfig,
  PdfLayoutProvider,
  ProcessorExecutor,
  ProcessorRunner,
} from "@layout-rules/core";
import { createApp } from "./app";
import { ProcessorService } from "./service";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");
const config = loadEngineConfig();
const API_PORT = Number(process.env.API_PORT ?? 3001);
const API_BODY_LIMIT = process.env.API_BODY_LIMIT ?? "10mb";

const executor = new ProcessorExecutor({ config, log: getLogger("engine") });
const runner = new ProcessorRunner(
  {
    json: new JsonLayoutProvider(config.fingerprintBlocks),
    pdf: new PdfLayoutProvider({ fingerprintBlocks: config.fingerprintBlocks }),
  },
  executor
);
const service = new ProcessorService(executor, runner, logger);
const app = createApp({ service, log: logger, bodyLimit: API_BODY_LIMIT, fingerprintBlocks: config.fingerprintBlocks });

app.listen(API_PORT, () => {
  logger.info("api.listen", { port: API_PORT });
});
