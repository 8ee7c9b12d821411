#!/usr/bin/env node
/**
 * CLI: evaluate one website and stream NDJSON updates on stdout.
 *
 * Usage: run-evaluation <url> [node_id ...]
 *
 * Launches a headless chromium browser and an HTTP session, runs the node
 * pipeline against the target, and writes one `{"type":"update",...}` line per
 * message so an upstream process can forward them as they arrive. Diagnostics
 * go to stderr through pino. With EVAL_RUN_DIR set, the messages and a
 * markdown summary are also written there.
 */

import { join } from 'node:path';

import { loadConfig } from '../config/config.js';
import { HttpSession } from '../engines/http-session.js';
import { launchBrowser, type LaunchedBrowser } from '../engines/playwright-engine.js';
import { createLogger } from '../logging/logger.js';
import { RunLogger, encodeMessage } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { DEFAULT_PIPELINE, createBuiltinRegistry } from '../nodes/index.js';
import { Orchestrator } from '../runner/orchestrator.js';

function emit(line: string): void {
  process.stdout.write(line);
}

async function main(): Promise<void> {
  const [target, ...selected] = process.argv.slice(2);
  if (!target) {
    process.stderr.write('Usage: run-evaluation <url> [node_id ...]\n');
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const logger = createLogger({
    name: 'run-evaluation',
    level: config.logLevel,
    prettyPrint: config.mode === 'dev',
  });

  // Registration problems surface here, before any browser is started.
  const registry = createBuiltinRegistry();
  const nodes = registry.createPipeline(selected.length > 0 ? selected : DEFAULT_PIPELINE, { logger });
  const orchestrator = new Orchestrator(nodes, { logger });

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  const timer = setTimeout(() => {
    logger.warn({ timeoutMs: config.runTimeoutMs }, 'Run timed out');
    controller.abort();
  }, config.runTimeoutMs);

  let browser: LaunchedBrowser | undefined;
  try {
    browser = await launchBrowser(config);
    const session = new HttpSession({
      userAgent: config.userAgent,
      defaultTimeoutMs: config.requestTimeoutMs,
    });

    const runId = `run-${Date.now()}`;
    const runLogger = config.runDir ? new RunLogger(join(config.runDir, runId)) : undefined;
    const run = orchestrator.run(target, { session, browser: browser.engine }, {
      runId,
      signal: controller.signal,
    });

    for await (const message of run) {
      emit(encodeMessage(message));
      await runLogger?.logMessage(message);
    }

    const summary = run.value;
    if (runLogger) {
      await writeSummary(runLogger.getRunDir(), summary);
    }
    if (summary.cancelled) {
      process.exitCode = 130;
    }
  } catch (err) {
    logger.error({ err }, 'Evaluation run failed');
    process.exitCode = 1;
  } finally {
    clearTimeout(timer);
    process.off('SIGINT', onSigint);
    if (browser) {
      await browser.close().catch((err: unknown) => logger.warn({ err }, 'Failed to close browser'));
    }
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
