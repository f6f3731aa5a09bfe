import { ConfigManager } from '../../utils/config.js';
import type { AppConfig } from '../../types/config.js';
import { createLibrary, type Library, type LibraryOverrides } from '../../app.js';
import { ConfigurationError } from '../../utils/errors.js';

export interface ConfigOptions {
  configPath?: string;
}

/**
 * Load the configuration a command runs with. Commands other than init require one to exist.
 */
export async function loadCliConfig(options: ConfigOptions): Promise<{ manager: ConfigManager; config: AppConfig }> {
  const manager = new ConfigManager(options.configPath);
  if (!manager.exists()) {
    throw new ConfigurationError('Configuration not found. Run "scriptorium init" first.');
  }
  return { manager, config: await manager.load() };
}

/**
 * Open the library, run `fn`, and close the database whatever happens
 */
export async function withLibrary<T>(
  options: ConfigOptions,
  fn: (library: Library, config: AppConfig) => Promise<T>,
  overrides: LibraryOverrides = {}
): Promise<T> {
  const { config } = await loadCliConfig(options);
  const library = createLibrary(config, overrides);
  try {
    return await fn(library, config);
  } finally {
    library.close();
  }
}
