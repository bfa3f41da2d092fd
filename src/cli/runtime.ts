/**
 * CLI argument parsing and gate assembly, kept apart from the entry point so
 * they can be tested without starting a server.
 */

import type { Server } from 'node:http';
import type { Logger } from 'pino';
import { closeServer } from '../adapters/node.ts';
import { loadConfig, parseConfig } from '../config/loader.ts';
import type { CheckerConfig } from '../config/loader.ts';
import { SemconvCatalog, DEFAULT_REGISTRY_PATH } from '../semconv/Catalog.ts';
import { SemconvGate } from '../core/SemconvGate.ts';
import type { BuiltSemconvGate } from '../core/SemconvGate.ts';
import type { Verdict } from '../types/schema.ts';
import { ConfigError } from '../util/errors.ts';

export const EXIT_STARTUP_FAILURE = 1;

export interface CliArgs {
  config?: string;
  oneShot: boolean;
  port?: number;
  help: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { oneShot: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = args[++i];
        if (value === undefined) throw new ConfigError('INVALID_CONFIG', `${arg} needs a file path`);
        result.config = value;
        break;
      }
      case '--port': {
        const value = Number(args[++i]);
        if (!Number.isInteger(value) || value < 0 || value > 65535) {
          throw new ConfigError('INVALID_CONFIG', '--port needs an integer between 0 and 65535');
        }
        result.port = value;
        break;
      }
      case '--one-shot':
        result.oneShot = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new ConfigError('INVALID_CONFIG', `Unknown argument: ${String(arg)}`);
    }
  }

  return result;
}

export const HELP_TEXT = `
semconv-gate - check OTLP metrics against semantic-convention attribute rules

USAGE:
  semconv-gate [options]

OPTIONS:
  -c, --config <file>   YAML config (defaults apply when omitted)
  --one-shot            Exit after the first export call (0 clean, 100 violations)
  --port <n>            Override server.port
  -h, --help            Show this help
`;

/** Merge CLI flags over the config file. */
export function resolveConfig(args: CliArgs): CheckerConfig {
  const config = args.config !== undefined ? loadConfig(args.config) : parseConfig({});
  return {
    ...config,
    server: { ...config.server, port: args.port ?? config.server.port },
    oneShot: args.oneShot || config.oneShot,
  };
}

export function buildGate(config: CheckerConfig, logger: Logger): BuiltSemconvGate {
  const catalog = SemconvCatalog.fromFile(
    config.semconv.registry ?? DEFAULT_REGISTRY_PATH,
    config.semconv.schemaUrl
  );
  return new SemconvGate()
    .catalog(catalog)
    .resource(config.resource)
    .metrics(config.metrics)
    .reportUnmatched(config.reportUnmatched)
    .logger(logger)
    .build();
}

/** Resolves with the verdict of the first checked export call; later calls are ignored. */
export function firstVerdict(gate: BuiltSemconvGate): Promise<Verdict> {
  return new Promise((resolve) => {
    const off = gate.onVerdict((verdict) => {
      off();
      resolve(verdict);
    });
  });
}

/**
 * Closes the server on the first call; later calls (a signal arriving during
 * the one-shot grace period) return the same promise. Close failures are
 * logged, never rejected.
 */
export function serverStopper(server: Server, logger: Logger): () => Promise<void> {
  let closing: Promise<void> | undefined;
  return () => {
    closing ??= closeServer(server).catch((err: unknown) => {
      logger.error({ err }, 'server close failed');
    });
    return closing;
  };
}
