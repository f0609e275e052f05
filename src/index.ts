#!/usr/bin/env node

/**
 * Transcription Queue - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { TranscriptionService } from './application/services/TranscriptionService.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { JobHistoryRepository } from './infrastructure/database/repositories/JobHistoryRepository.js';
import { WhisperEngine } from './infrastructure/engine/WhisperEngine.js';
import { ConsoleObserver } from './infrastructure/logging/ConsoleObserver.js';
import { TranscriptWriter } from './infrastructure/storage/TranscriptWriter.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let service: TranscriptionService | null = null;
  let webServer: WebServer | null = null;
  let mcpServer: McpServer | null = null;
  let dbConnection: DatabaseConnection | null = null;
  let shuttingDown = false;

  const shutdown = async (signal: string, exitCode: number = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

    try {
      if (mcpServer) {
        await mcpServer.shutdown();
      }
      if (webServer) {
        await webServer.stop();
      }
      if (service) {
        await service.shutdown();
      }
    } catch (error) {
      console.error('[Main] ✗ Error during shutdown:', error);
      exitCode = 1;
    } finally {
      dbConnection?.close();
    }

    console.error('👋 Goodbye!\n');
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // Also handle uncaught errors
  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('💥 Unhandled Rejection at:', promise, 'reason:', reason);
    void shutdown('UNHANDLED_REJECTION', 1);
  });

  try {
    const config = getConfig();
    printConfigInfo(config);

    const debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    let historyRepo: JobHistoryRepository | undefined;
    if (config.history.enabled) {
      dbConnection = new DatabaseConnection(config.history.databasePath);
      historyRepo = new JobHistoryRepository(dbConnection.getDatabase());
      debugLog(`Database initialized at: ${dbConnection.getDatabasePath()}`);
    }

    const engine = new WhisperEngine(config.whisper, debugLog);
    const sink = new TranscriptWriter(config.output.header);

    service = new TranscriptionService(engine, sink, historyRepo, config.queue, debugLog);
    service.subscribe(new ConsoleObserver(config.server.debug));

    if (config.webUI.enabled) {
      webServer = new WebServer(service, config.webUI.port);
      service.subscribe(webServer);
      await webServer.start();
    }

    if (config.mcp.enabled) {
      mcpServer = new McpServer(config, service, engine, dbConnection, debugLog);
      await mcpServer.start();
    }

    // Model loads in the background; jobs queue up meanwhile
    void service.start();
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    await shutdown('FATAL', 1);
  }
}

// Start the server
void main();
