/**
 * HTTP Server Entry Point
 * Loads configuration, wires the yt-dlp extractor and starts the Express application.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createYtDlpExtractor } from "./services/external/ytdlp.js";

const config = loadConfig();

const extractor = createYtDlpExtractor({
  binaryPath: config.ytdlpPath,
  timeoutMs: config.extractionTimeoutMs,
  cookiesPath: config.cookiesPath,
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(createApp({ config, extractor }));

server.listen(config.port, "0.0.0.0", () => {
  console.log(`[server] Running on 0.0.0.0:${config.port} (${config.nodeEnv})`);
  console.log(`[server] Max video duration: ${config.maxDurationSeconds}s, extraction timeout: ${config.extractionTimeoutMs}ms`);
});

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
