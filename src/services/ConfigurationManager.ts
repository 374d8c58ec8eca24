// Configuration Manager - loads key phrases and components from config.json
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationManager as IConfigurationManager, Configuration } from '../interfaces';
import { ConfigurationModel } from '../models';

export class ConfigurationManagerImpl extends EventEmitter implements IConfigurationManager {
  private config: ConfigurationModel;
  private readonly configFilePath: string;
  private isLoaded: boolean = false;

  constructor(configDir?: string) {
    super();
    this.config = new ConfigurationModel();
    this.configFilePath = process.env.CONFIG_PATH
      ? path.resolve(process.env.CONFIG_PATH)
      : path.join(configDir || process.cwd(), 'config.json');
  }

  public getConfigFilePath(): string {
    return this.configFilePath;
  }

  public async loadConfiguration(): Promise<Configuration> {
    try {
      const data = await fs.readFile(this.configFilePath, 'utf-8');
      const parsed: unknown = JSON.parse(data);

      this.config = ConfigurationModel.fromJSON(parsed);
      this.applyEnvOverrides();
      this.isLoaded = true;

      this.emit('config_loaded', this.config.toJSON());
      return this.config.toJSON();
    } catch (error) {
      this.config = new ConfigurationModel();
      this.applyEnvOverrides();
      this.isLoaded = true;

      if (isMissingFile(error)) {
        console.log(`Config file ${this.configFilePath} not found, using defaults`);
        this.emit('config_defaults_applied', this.config.toJSON());
        return this.config.toJSON();
      }

      // Parse error or other issue - use defaults but log warning
      const message = error instanceof Error ? error.message : String(error);
      console.warn('Error loading config, using defaults:', message);
      this.emit('config_load_error', { error: message });
      return this.config.toJSON();
    }
  }

  private applyEnvOverrides(): void {
    if (process.env.KEY_PHRASES) {
      const phrases = process.env.KEY_PHRASES
        .split(',')
        .map(phrase => phrase.trim())
        .filter(phrase => phrase.length > 0);
      if (phrases.length > 0) {
        this.config.keyPhrases = phrases;
      }
    }

    if (process.env.POLL_INTERVAL_MS) {
      const interval = parseInt(process.env.POLL_INTERVAL_MS, 10);
      if (!isNaN(interval) && interval > 0) {
        this.config.pollIntervalMs = interval;
      }
    }

    if (process.env.HTTP_PORT) {
      const port = parseInt(process.env.HTTP_PORT, 10);
      if (!isNaN(port) && port >= 0) {
        this.config.httpPort = port;
      }
    }
  }

  public getConfiguration(): Configuration {
    return this.config.toJSON();
  }

  public getKeyPhrases(): string[] {
    return [...this.config.keyPhrases];
  }

  public getPollInterval(): number {
    return this.config.pollIntervalMs;
  }

  public getHttpPort(): number {
    return this.config.httpPort;
  }

  public isConfigLoaded(): boolean {
    return this.isLoaded;
  }

  public validateConfiguration(): string[] {
    return this.config.validate();
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
