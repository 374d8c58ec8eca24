// Main Application Entry Point - Voice Command Dispatcher
import 'dotenv/config';
import { createDefaultRegistry } from './components';
import {
  ComponentRegistry,
  ConfigurationManagerImpl,
  Dispatcher,
  ErrorHandler,
  FailureWarning,
  StatusServer
} from './services';

export class VoiceCommandDispatcherApp {
  private configManager: ConfigurationManagerImpl;
  private registry: ComponentRegistry;
  private errorHandler: ErrorHandler;
  private dispatcher: Dispatcher | null = null;
  private statusServer: StatusServer | null = null;

  constructor(configDir?: string, registry?: ComponentRegistry) {
    this.configManager = new ConfigurationManagerImpl(configDir);
    this.registry = registry ?? createDefaultRegistry();
    this.errorHandler = new ErrorHandler();

    this.errorHandler.on('warning', (warning: FailureWarning) => {
      console.warn(`[WARNING] ${warning.message}`);
    });
  }

  /**
   * Load configuration and build every component. Nothing is started yet.
   */
  public async initialize(): Promise<Dispatcher> {
    const config = await this.configManager.loadConfiguration();

    for (const problem of this.configManager.validateConfiguration()) {
      console.warn(`Configuration problem: ${problem}`);
    }

    this.dispatcher = Dispatcher.fromConfiguration(config, this.registry, {
      errorHandler: this.errorHandler
    });

    if (config.httpPort > 0) {
      this.statusServer = new StatusServer(this.dispatcher);
    }
    return this.dispatcher;
  }

  /**
   * Run until stopped. Resolves after a graceful shutdown; rejects if any
   * component fails to start.
   */
  public async run(): Promise<void> {
    const dispatcher = this.dispatcher ?? await this.initialize();

    if (this.statusServer) {
      await this.statusServer.start(this.configManager.getHttpPort());
    }

    try {
      await dispatcher.run();
    } finally {
      if (this.statusServer) {
        await this.statusServer.stop();
      }
    }
  }

  public stop(): void {
    this.dispatcher?.stop();
  }

  public interrupt(): void {
    this.dispatcher?.interrupt();
  }

  public getDispatcher(): Dispatcher | null {
    return this.dispatcher;
  }

  public getStatusServer(): StatusServer | null {
    return this.statusServer;
  }
}

if (require.main === module) {
  const app = new VoiceCommandDispatcherApp();

  process.on('SIGINT', () => app.interrupt());
  process.on('SIGTERM', () => app.stop());

  app.run()
    .then(() => {
      console.log('Dispatcher stopped');
    })
    .catch((error) => {
      console.error('Failed to start dispatcher:', error);
      process.exit(1);
    });
}
