/**
 * mediasync CLI
 *
 * Commands:
 *   mediasync sessions
 *   mediasync watch [--json]
 *   mediasync status
 *   mediasync send <deviceKey> <command> [name=value...]
 *   mediasync config show|validate|path
 *   mediasync config set <key> <value>
 */

import { Command } from 'commander';
import { ConfigManager, type MediaSyncConfig } from '../config/config.js';
import { ConfigurationError, TransportUnavailableError } from '../errors/sync-error.js';
import { createLogger, setLogger, type Logger } from '../logging/logger.js';
import { buildBaseUrl } from '../transport/client.js';
import type { CommandArgs } from '../transport/types.js';
import { createSyncEngine, type SyncEngine, type SyncEngineOverrides } from '../sync/engine.js';
import { OutputFormatter } from './formatter.js';
import { VERSION } from '../version.js';

export type EngineFactory = (config: MediaSyncConfig, overrides?: SyncEngineOverrides) => SyncEngine;

/** `Volume=40 Muted=true` → { Volume: 40, Muted: true } */
export function parseCommandArgs(pairs: string[]): CommandArgs {
  const args: CommandArgs = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new ConfigurationError(`Command argument must look like name=value, got: ${pair}`);
    }
    const name = pair.slice(0, index);
    const raw = pair.slice(index + 1);
    if (raw === 'true' || raw === 'false') {
      args[name] = raw === 'true';
    } else if (raw.trim() !== '' && !Number.isNaN(Number(raw))) {
      args[name] = Number(raw);
    } else {
      args[name] = raw;
    }
  }
  return args;
}

export class MediaSyncCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;
  private readonly engineFactory: EngineFactory;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter(),
    engineFactory: EngineFactory = createSyncEngine
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.engineFactory = engineFactory;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('mediasync')
      .version(VERSION, '-V, --version', 'Print version')
      .description('Keep a live view of media server sessions');

    // ── sessions ───────────────────────────────────────────────────────────
    program
      .command('sessions')
      .description('Poll the server once and list controllable sessions')
      .action(async () => {
        try {
          const config = this.configManager.loadValidated();
          const engine = this.createEngine({ ...config, sync: { ...config.sync, pushEnabled: false } });
          try {
            await this.startEngine(engine);
            console.log(this.formatter.formatSessionList([...engine.coordinator.currentState().values()]));
          } finally {
            await engine.stop();
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── watch ──────────────────────────────────────────────────────────────
    program
      .command('watch')
      .description('Run the sync engine and print events until interrupted')
      .option('--json', 'Print each event as a JSON line')
      .action(async (opts: { json?: boolean }) => {
        try {
          const config = this.configManager.loadValidated();
          const engine = this.createEngine(config);
          engine.coordinator.subscribeAll((event) => {
            console.log(opts.json ? this.formatter.formatEventJson(event) : this.formatter.formatEvent(event));
          });
          try {
            await this.startEngine(engine);
            await this.waitForShutdown();
          } finally {
            await engine.stop();
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── status ─────────────────────────────────────────────────────────────
    program
      .command('status')
      .description('Check that the server is reachable and count sessions')
      .action(async () => {
        try {
          const config = this.configManager.loadValidated();
          const engine = this.createEngine({ ...config, sync: { ...config.sync, pushEnabled: false } });
          try {
            const startedAt = Date.now();
            const server = await engine.transport.probe();
            const latencyMs = Date.now() - startedAt;
            const records = await engine.transport.listSessions();
            await this.startEngine(engine);
            console.log(
              this.formatter.formatStatus({
                server,
                url: buildBaseUrl(config.server),
                latencyMs,
                sessionCount: records.length,
                controllableCount: engine.coordinator.currentState().size,
              })
            );
          } finally {
            await engine.stop();
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── send ───────────────────────────────────────────────────────────────
    program
      .command('send <deviceKey> <command> [args...]')
      .description('Send a remote-control command, e.g. `send <device> SetVolume Volume=40`')
      .action(async (deviceKey: string, command: string, rawArgs: string[] = []) => {
        try {
          const args = parseCommandArgs(rawArgs);
          const config = this.configManager.loadValidated();
          const engine = this.createEngine({ ...config, sync: { ...config.sync, pushEnabled: false } });
          try {
            await this.startEngine(engine);
            await engine.coordinator.sendCommand(deviceKey, command, args);
            console.log(`Sent ${command} to ${deviceKey}`);
          } finally {
            await engine.stop();
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── config ─────────────────────────────────────────────────────────────
    const configCommand = program.command('config').description('Inspect or change the configuration');

    configCommand
      .command('show')
      .description('Print the effective configuration (API key masked)')
      .action(() => {
        try {
          const effective = this.configManager.loadWithEnvOverrides();
          console.log(this.formatter.formatConfig(ConfigManager.redact(effective), this.configManager.path));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    configCommand
      .command('validate')
      .description('Check the effective configuration')
      .action(() => {
        try {
          const result = this.configManager.validate(this.configManager.loadWithEnvOverrides());
          console.log(this.formatter.formatValidation(result));
          if (!result.valid) process.exitCode = 1;
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    configCommand
      .command('set <key> <value>')
      .description('Store one setting, e.g. `config set sync.pollIntervalSeconds 30`')
      .action((key: string, value: string) => {
        try {
          this.configManager.set(key, value);
          console.log(`Set ${key}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    configCommand
      .command('path')
      .description('Print the config file location')
      .action(() => {
        console.log(this.configManager.path);
      });

    return program;
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createLogger(config: MediaSyncConfig): Logger {
    const logger = createLogger('mediasync', { level: config.logging.level, pretty: config.logging.pretty });
    setLogger(logger);
    return logger;
  }

  private createEngine(config: MediaSyncConfig): SyncEngine {
    return this.engineFactory(config, { logger: this.createLogger(config) });
  }

  /** Start the engine; throws when its first poll did not reach the server. */
  private async startEngine(engine: SyncEngine): Promise<void> {
    await engine.start();
    const { coordinator } = engine;
    if (coordinator.isPaused || coordinator.lastSuccessfulPollAt === undefined) {
      throw coordinator.lastError ?? new TransportUnavailableError('Could not list sessions from the media server');
    }
  }

  /** Resolves on SIGINT or SIGTERM. */
  protected waitForShutdown(): Promise<void> {
    return new Promise((resolve) => {
      const onSignal = (): void => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        resolve();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    });
  }
}
