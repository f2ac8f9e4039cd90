#!/usr/bin/env node
/**
 * CLI entry point for the chat archive export.
 *
 * Pulls every selected chat from the Desktop API and writes a static site:
 * one page and one media gallery per chat plus a root index.
 *
 * Required environment variables:
 *   BEEPER_ACCESS_TOKEN — Desktop API access token.
 *
 * Optional environment variables:
 *   BEEPER_API_URL      — Desktop API base URL (default: http://localhost:23373).
 *   LOG_LEVEL           — Pino log level (default: "info").
 */

import process from 'node:process';

import { buildConfig, parseCommandLine, USAGE } from './archive/config.js';
import { deriveErrorCode, exitCodeFor, ExportError } from './archive/errors.js';
import { createLogger } from './archive/logger.js';
import { exportChats } from './archive/services/orchestrator.js';
import { DesktopApiClient } from './archive/services/sourceClient.js';

const logger = createLogger();

// ── Interruption ──────────────────────────────────────────────────────

const controller = new AbortController();

function handleShutdown(signal: string): void {
  if (controller.signal.aborted) {
    logger.warn({ signal }, 'Second interrupt, exiting immediately');
    process.exit(130);
  }
  logger.warn({ signal }, 'Interrupt received, stopping after the current chat');
  controller.abort();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

// ── Main ──────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const cli = parseCommandLine(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }
  const config = buildConfig(cli);

  logger.info(
    { outputDir: config.outputDir, apiBaseUrl: config.apiBaseUrl, filters: config.filters.length },
    'Starting export run',
  );

  const client = new DesktopApiClient({
    baseUrl: config.apiBaseUrl,
    accessToken: config.accessToken,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child({ component: 'source' }),
  });

  const result = await exportChats({ client, config, logger, signal: controller.signal });

  logger.info(
    {
      chatsExported: result.chatsExported,
      chatsSkipped: result.chatsSkipped,
      messagesExported: result.messagesExported,
      attachmentsArchived: result.attachmentsArchived,
      attachmentsUnresolved: result.attachmentsUnresolved,
      thumbnailsWritten: result.thumbnailsWritten,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime(),
    },
    'Export run complete',
  );
}

main().catch((err: unknown) => {
  const code = deriveErrorCode(err);
  if (code === 'ABORTED') {
    logger.error('Export aborted by user');
  } else if (err instanceof ExportError) {
    logger.fatal({ code, cause: err.cause }, err.message);
  } else {
    logger.fatal({ err }, 'Export failed');
  }
  process.exitCode = exitCodeFor(err);
});
