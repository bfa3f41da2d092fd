#!/usr/bin/env node

/**
 * semconv-gate CLI
 *
 * Usage:
 *   semconv-gate [--config <file>] [--one-shot] [--port <n>]
 *
 * Service mode keeps serving and rejects non-compliant export calls.
 * One-shot mode exits after the first export call: 0 clean, 100 violations.
 */

import type { Logger } from 'pino';
import type { CheckerConfig } from '../config/loader.ts';
import type { BuiltSemconvGate } from '../core/SemconvGate.ts';
import { exitCodeFor } from '../core/Verdict.ts';
import { isConfigError } from '../util/errors.ts';
import { createLogger } from '../util/logger.ts';
import {
  EXIT_STARTUP_FAILURE,
  HELP_TEXT,
  buildGate,
  firstVerdict,
  parseArgs,
  resolveConfig,
  serverStopper,
} from './runtime.ts';

/** Upper bound on waiting for keep-alive connections after the one-shot verdict. */
const ONE_SHOT_GRACE_MS = 1000;

async function main(argv: string[]): Promise<void> {
  const bootLogger = createLogger();
  let config: CheckerConfig;
  let gate: BuiltSemconvGate;
  let logger: Logger;
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(HELP_TEXT);
      return;
    }
    config = resolveConfig(args);
    logger = createLogger({ level: config.log.level });
    gate = buildGate(config, logger);
  } catch (err) {
    if (!isConfigError(err)) throw err;
    bootLogger.fatal({ err: err.toObject() }, 'invalid configuration');
    process.exitCode = EXIT_STARTUP_FAILURE;
    return;
  }

  // Subscribe before listening so no call can slip past in one-shot mode.
  const verdict = config.oneShot ? firstVerdict(gate) : undefined;
  const server = await gate.serve(config.server);
  logger.info(
    {
      address: server.address(),
      path: config.server.path,
      rules: gate.table.length,
      schemaUrl: gate.resourceSchema.expectedVersion,
      oneShot: config.oneShot,
    },
    'listening for OTLP metrics'
  );

  const stop = serverStopper(server, logger);
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'shutting down');
    void stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  if (verdict) {
    const result = await verdict;
    process.exitCode = exitCodeFor(result);
    logger.info(
      { violationCount: result.violationCount, exitCode: process.exitCode },
      'one-shot check finished'
    );
    void stop();
    setTimeout(() => process.exit(), ONE_SHOT_GRACE_MS).unref();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err);
  process.exit(EXIT_STARTUP_FAILURE);
});
