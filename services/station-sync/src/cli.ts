#!/usr/bin/env -S node --import tsx

import { Command, InvalidArgumentError } from 'commander';
import { clampIntervalSeconds, loadServiceConfig, parseList, type ServiceConfig } from './config/serviceConfig';
import { createStandaloneLogger } from './logger';
import { createSyncRuntime, type RuntimeOverrides } from './runtime';

export interface ProgramOptions {
  loadConfig?: () => ServiceConfig;
  overrides?: RuntimeOverrides;
  write?: (line: string) => void;
  signals?: NodeJS.Signals[];
}

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const loadConfig = options.loadConfig ?? loadServiceConfig;
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];

  const program = new Command();
  program
    .name('station-sync')
    .description('Synchronize processed weather station results into ThingsBoard')
    .version('0.1.0');

  program
    .command('sync')
    .description('Run one synchronization cycle and print its summary')
    .option('-e, --experiments <names>', 'Comma separated experiment names')
    .option('-b, --batch-size <size>', 'Records per telemetry request', parsePositiveInteger)
    .action(async (opts: { experiments?: string; batchSize?: number }) => {
      const base = loadConfig();
      const config: ServiceConfig = {
        ...base,
        sync: { ...base.sync, batchSize: opts.batchSize ?? base.sync.batchSize }
      };
      const logger = createStandaloneLogger(config.logLevel);
      const { orchestrator } = createSyncRuntime(config, logger, undefined, options.overrides);
      const summary = await orchestrator.runCycle(parseList(opts.experiments, config.sync.experiments));
      write(JSON.stringify(summary, null, 2));
    });

  program
    .command('watch')
    .description('Poll experiments continuously until interrupted')
    .option('-e, --experiments <names>', 'Comma separated experiment names')
    .option('-i, --interval <seconds>', 'Seconds between cycles', parsePositiveInteger)
    .action(async (opts: { experiments?: string; interval?: number }) => {
      const config = loadConfig();
      const logger = createStandaloneLogger(config.logLevel);
      const { orchestrator } = createSyncRuntime(config, logger, undefined, options.overrides);
      const intervalSeconds = clampIntervalSeconds(opts.interval ?? config.sync.intervalSeconds);

      const onSignal = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'stop requested');
        if (orchestrator.running) {
          orchestrator.stop().catch((error: unknown) => {
            logger.error({ err: error }, 'failed to stop synchronization loop');
          });
        }
      };
      for (const signal of signals) {
        process.once(signal, onSignal);
      }

      try {
        await orchestrator.start({
          groups: parseList(opts.experiments, config.sync.experiments),
          intervalMs: intervalSeconds * 1_000,
          continuous: true
        });
        await orchestrator.wait();
      } finally {
        for (const signal of signals) {
          process.removeListener(signal, onSignal);
        }
      }
      write(JSON.stringify(orchestrator.status(), null, 2));
    });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
