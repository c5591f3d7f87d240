// ===========================================================================
//  src/server/main.ts   (process entry: config → index → HTTP)
// ===========================================================================

import { createServer } from "node:http";

import { createApp, REST_ROOT } from "./app";
import { loadConfig } from "./config";
import { TextFile } from "./core/text-file";
import {
  logger,
  startupLogger,
  logError,
  logPerformance
} from "./utils/logger";

const startTime = Date.now();

try {
  const config = loadConfig();
  startupLogger.info({ ...config }, 'Starting textframe server');

  const textFile = TextFile.open({
    path: config.textPath,
    indexPath: config.indexPath,
    mode: config.mode,
    stride: config.stride,
  });
  startupLogger.info({
    chars: textFile.length,
    bytes: textFile.byteLength,
    lines: textFile.hasLineIndex ? textFile.lineCount : null,
    checksum: textFile.checksumDigest,
  }, 'Text file indexed');

  const http = createServer(createApp(textFile, config));

  http.listen(config.httpPort, () => {
    logPerformance(startupLogger, 'server-startup', startTime);
    startupLogger.info({
      port: config.httpPort,
      restRoot: REST_ROOT,
      textPath: config.textPath,
    }, `Server listening on port ${config.httpPort}`);
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');

    http.close((error) => {
      if (error) {
        logError(logger, error, { context: 'shutdown' });
        process.exit(1);
      }
      logger.info('Cleanup completed successfully');
      process.exit(0);
    });
  });

} catch (error) {
  logError(startupLogger, error, { context: 'startup-failure' });
  process.exit(1);
}
