/**
 * @file server.ts
 * @description Main server entry point
 */

import os from "os";
import path from "path";
import { Logger } from "./utils/logger";
import { getEnvConfig } from "./utils/checkEnv";
import { createApp } from "./app";
import { CoverController } from "./controllers/coverController";
import { CoverWorkflow } from "./core/coverWorkflow";
import { UploadClient } from "./clients/uploadClient";
import { GenerationClient } from "./clients/generationClient";
import { MediaFetcher } from "./services/mediaFetcher";
import { AudioArtifactStore } from "./services/audioArtifacts";

// Initialize environment configuration
const config = getEnvConfig();

const workflow = new CoverWorkflow({
  mediaFetcher: new MediaFetcher({
    outputDir: path.resolve(config.DOWNLOAD_DIR),
    binaryPath: config.YT_DLP_PATH,
  }),
  uploadClient: new UploadClient({
    apiKey: config.MINIMAX_API_KEY,
    baseUrl: config.MINIMAX_BASE_URL,
    timeout: config.UPLOAD_TIMEOUT,
  }),
  generationClient: new GenerationClient({
    apiKey: config.MINIMAX_API_KEY,
    baseUrl: config.MINIMAX_BASE_URL,
    timeout: config.GENERATION_TIMEOUT,
  }),
  artifactStore: new AudioArtifactStore(path.join(os.tmpdir(), "ai-covers")),
});

const app = createApp(new CoverController(workflow));

// Start server
app.listen(config.PORT, config.HOST, () => {
  Logger.info(`Server running at http://${config.HOST}:${config.PORT}`);
  Logger.info(`Environment: ${config.NODE_ENV}`);
  Logger.info(`Log level: ${config.LOG_LEVEL}`);
});
