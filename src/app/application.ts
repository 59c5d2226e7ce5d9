import { ConfigProvider } from '../core/config/config-provider.js';
import type { ConfigEnvironment, RuntimeFlags, TetherConfig } from '../core/config/runtime-config.js';
import { ConfigError } from '../core/errors.js';
import { EventBus } from '../core/kernel/event-bus.js';
import { describeError } from '../core/kernel/logger.js';
import type { KernelLogger } from '../core/kernel/logger.js';
import { Orchestrator } from '../core/orchestrator/orchestrator.js';
import { createEngineRunners } from '../core/runner/engines/index.js';
import { Router } from '../core/runner/router.js';
import { FileSessionStore } from '../core/sessions/session-store.js';
import { DirectoryWorkspaceProvider } from '../core/workspace/workspace.js';
import type { DirectoryWorkspaceOptions } from '../core/workspace/workspace.js';
import { InjectWatcher } from '../plugins/inject/watcher.js';
import type { InjectSettings } from '../plugins/inject/watcher.js';
import { TelegramConnector } from '../plugins/telegram/index.js';

export interface ApplicationOptions {
  flags: RuntimeFlags;
  logger: KernelLogger;
  env?: Omit<ConfigEnvironment, 'logger'>;
  /** Invoked once intake halts for good; the caller decides how to exit. */
  onFatal: (reason: string) => void;
}

function workspaceOptions(config: TetherConfig, cwd: string): DirectoryWorkspaceOptions {
  return {
    projects: config.workspace.projects,
    defaultProject: config.workspace.defaultProject,
    fallbackDirectory: cwd
  };
}

function injectSettings(config: TetherConfig): InjectSettings | undefined {
  const { enabled, dir, pollIntervalMs, chatId } = config.inject;
  if (!enabled || chatId === undefined) return undefined;
  return { dir, pollIntervalMs, chatId, defaultEngine: config.defaultEngine };
}

/**
 * Application container: builds every component from the loaded config and
 * re-applies config on reload.
 */
export class TetherApplication {
  private injectWatcher: InjectWatcher | null = null;
  private readonly disposers: Array<() => void> = [];

  private constructor(
    private readonly provider: ConfigProvider,
    readonly events: EventBus,
    readonly router: Router,
    readonly sessions: FileSessionStore,
    readonly workspace: DirectoryWorkspaceProvider,
    readonly connector: TelegramConnector,
    readonly orchestrator: Orchestrator,
    private readonly options: ApplicationOptions
  ) {}

  static async create(options: ApplicationOptions): Promise<TetherApplication> {
    const { logger } = options;
    const cwd = options.env?.cwd ?? process.cwd();
    const provider = await ConfigProvider.load(options.flags, { ...options.env, logger });
    const config = provider.current();
    logger.setLevel(config.logging.level);

    const botToken = config.transport.telegram.botToken || process.env.TELEGRAM_BOT_TOKEN || '';
    if (!botToken) {
      throw new ConfigError('transport.telegram.botToken is required (or set TELEGRAM_BOT_TOKEN)');
    }

    const events = new EventBus();
    const router = new Router(createEngineRunners(config, { logger }), {
      availabilityTtlMs: config.router.availabilityTtlMs,
      logger
    });
    const sessions = new FileSessionStore({
      dir: config.sessions.dir,
      maxPerEngine: config.sessions.maxPerEngine,
      logger
    });
    const workspace = new DirectoryWorkspaceProvider(workspaceOptions(config, cwd));
    const connector = new TelegramConnector({
      botToken,
      events,
      logger,
      onPollingStopped: (error) => options.onFatal(`telegram polling stopped: ${describeError(error)}`)
    });
    const orchestrator = new Orchestrator({
      config: provider,
      router,
      sessions,
      transport: connector.transport,
      workspace,
      events,
      logger
    });

    const app = new TetherApplication(provider, events, router, sessions, workspace, connector, orchestrator, options);
    app.wire(cwd);
    return app;
  }

  get config(): TetherConfig {
    return this.provider.current();
  }

  async start(): Promise<void> {
    const { orchestrator, router, options } = this;
    await this.connector.start({
      bridge: orchestrator,
      config: this.provider,
      engines: () => router.engines(),
      formatResume: (session) => router.get(session.engine)?.formatResume(session.resumeToken),
      logger: options.logger
    });
    await this.applyInject(this.config);
    options.logger.info('tether started', { engines: router.engines() });
  }

  reload(): Promise<TetherConfig> {
    return this.provider.reload();
  }

  async shutdown(reason: string): Promise<void> {
    this.injectWatcher?.stop();
    this.connector.stop(reason);
    await this.orchestrator.shutdown();
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
    this.options.logger.info('tether stopped', { reason });
  }

  private wire(cwd: string): void {
    const { logger } = this.options;
    this.disposers.push(
      this.provider.onChange((config) => {
        logger.setLevel(config.logging.level);
        this.router.reload(createEngineRunners(config, { logger }));
        this.orchestrator.applyConfig(config);
        this.sessions.setMaxPerEngine(config.sessions.maxPerEngine);
        this.workspace.configure(workspaceOptions(config, cwd));
        this.applyInject(config).catch((err: unknown) => {
          logger.error('Inject watcher restart failed', { error: describeError(err) });
        });
        this.events.publish('config:reloaded', { engines: this.router.engines() });
      }),
      this.events.subscribe('orchestrator:halted', ({ payload }) => {
        this.options.onFatal(payload.reason);
      })
    );
  }

  private async applyInject(config: TetherConfig): Promise<void> {
    const settings = injectSettings(config);
    if (!settings) {
      this.injectWatcher?.stop();
      this.injectWatcher = null;
      return;
    }
    if (this.injectWatcher) {
      this.injectWatcher.configure(settings);
      return;
    }
    this.injectWatcher = new InjectWatcher({
      ...settings,
      target: this.orchestrator,
      logger: this.options.logger,
      events: this.events
    });
    await this.injectWatcher.start();
  }
}
