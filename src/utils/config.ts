import { existsSync, promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { type AppConfig, type AppConfigInput, AppConfigSchema } from '../types/config.js';
import { ValidationError, FileError } from './errors.js';

export class ConfigManager {
  private configPath: string;
  private configDir: string;

  constructor(customPath?: string) {
    customPath ??= process.env['SCRIPTORIUM_CONFIG_PATH'];
    if (customPath) {
      this.configPath = path.resolve(customPath);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = this.getDefaultConfigDir();
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  private getDefaultConfigDir(): string {
    return path.join(os.homedir(), '.scriptorium');
  }

  /**
   * The database lives beside the configuration file unless configured otherwise
   */
  getDefaultDatabasePath(): string {
    return path.join(this.configDir, 'library.db');
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * Read and validate the configuration file. Throws FileError when it is missing.
   */
  async load(): Promise<AppConfig> {
    if (!this.exists()) {
      throw new FileError('Configuration file not found. Run "scriptorium init" to create one.');
    }

    let data: unknown;
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      data = JSON.parse(content);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ValidationError('Configuration file contains invalid JSON');
      }
      throw new FileError(`Failed to load configuration: ${String(error)}`);
    }

    return this.parse(data);
  }

  /**
   * Load the configuration file, or defaults when none exists yet
   */
  async loadOrDefault(): Promise<AppConfig> {
    return this.exists() ? this.load() : this.parse({});
  }

  /**
   * Validate raw data and fill in defaults
   */
  parse(data: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    if (!result.data.database.path) {
      result.data.database.path = this.getDefaultDatabasePath();
    }

    return result.data;
  }

  /**
   * Validate, fill defaults and write the file. Returns what was written.
   */
  async save(config: AppConfigInput): Promise<AppConfig> {
    const validated = this.parse(config);

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(validated, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }

    return validated;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * Load errors as a list instead of an exception
   */
  async validate(): Promise<{ valid: boolean; errors: string[] }> {
    try {
      await this.load();
      return { valid: true, errors: [] };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { valid: false, errors: [message] };
    }
  }
}
