import { Command } from 'commander';
import { ConfigManager } from '../../utils/config.js';
import type { AppConfig, AppConfigInput, ProviderName } from '../../types/config.js';
import { ProviderFactory } from '../../providers/factory.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptChoice, promptConfirm, promptInteger, promptSecure, promptUser } from '../utils/input.js';
import { formatCliError, validateApiKey } from '../utils/validation.js';
import { ValidationError } from '../../utils/errors.js';

interface InitOptions {
  configPath?: string;
  force?: boolean;
  defaults?: boolean;
  provider?: string;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the configuration file with an interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .option('--defaults', 'Write the default configuration without prompting')
    .option('--provider <name>', 'Provider for embeddings and answers (openai|ollama)')
    .action(async (options: InitOptions) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: InitOptions): Promise<void> {
  console.log('🚀 Scriptorium Configuration Setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);

  if (configManager.exists() && !options.force) {
    const overwrite = await promptConfirm('Configuration already exists. Do you want to overwrite it?', false);
    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  let providerChoice: ProviderName | undefined;
  if (options.provider !== undefined) {
    if (!ProviderFactory.isValidProvider(options.provider)) {
      throw new ValidationError(
        `Unknown provider "${options.provider}". Supported: ${ProviderFactory.getSupportedProviders().join(', ')}`
      );
    }
    providerChoice = options.provider;
  }

  const input: AppConfigInput = options.defaults
    ? { embedding: { provider: providerChoice }, generation: { provider: providerChoice } }
    : await runWizard(configManager, providerChoice);

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();

  let config: AppConfig;
  try {
    config = await configManager.save(input);
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  if (!options.defaults && await promptConfirm('Would you like to test the provider connection?', true)) {
    await testConfiguration(config);
  }

  console.log('');
  console.log('✅ Setup complete!');
  console.log('');
  console.log('Next steps:');
  console.log('  1. Initialize the database: scriptorium db-init');
  console.log('  2. Add documents: scriptorium add <file-or-directory>');
  console.log('  3. Ask a question: scriptorium query "<question>"');
  console.log('');
}

async function runWizard(configManager: ConfigManager, preset: ProviderName | undefined): Promise<AppConfigInput> {
  console.log('This wizard writes the configuration used by every scriptorium command.');
  console.log('');

  const provider = preset ?? await promptChoice<ProviderName>(
    '🔧 Which provider should embed documents and generate answers?',
    [
      { label: 'Ollama (Recommended)', value: 'ollama', description: 'Local models, no API key' },
      { label: 'OpenAI', value: 'openai', description: 'Hosted models, requires an API key' },
    ],
    0
  );

  const providers: NonNullable<AppConfigInput['providers']> = {};
  if (provider === 'openai') {
    console.log('📋 OpenAI Configuration');
    const apiKey = await promptSecure('Enter your OpenAI API key: ');
    validateApiKey(apiKey, 'OpenAI');
    providers.openai = { apiKey };
  } else {
    console.log('📋 Ollama Configuration');
    const baseUrl = await promptUser('Ollama URL (http://localhost:11434): ');
    const chatModel = await promptUser('Chat model (llama3.2:3b): ');
    providers.ollama = {
      ...(baseUrl ? { baseUrl } : {}),
      ...(chatModel ? { chatModel } : {}),
    };
  }
  console.log('');

  console.log('📋 Document Processing Configuration');
  const maxChunkSize = await promptInteger('Words per chunk', 1500, value => value > 0 && value <= 10000);
  const overlap = await promptInteger('Words of overlap', Math.min(100, maxChunkSize - 1), value => value >= 0 && value < maxChunkSize);
  console.log('');

  const databasePath = await promptUser(`Database path (${configManager.getDefaultDatabasePath()}): `);

  return {
    providers,
    embedding: { provider },
    generation: { provider },
    chunking: { maxChunkSize, overlap },
    database: databasePath ? { path: databasePath } : {},
  };
}

async function testConfiguration(config: AppConfig): Promise<void> {
  const progress = new ProgressIndicator(`Testing ${config.embedding.provider} connection...`);
  progress.start();

  try {
    const provider = ProviderFactory.createProvider(config.embedding.provider, config.providers);
    if (await provider.validateConnection()) {
      progress.stop(`${provider.name}: connection successful`);
    } else {
      progress.fail(`${provider.name}: connection failed`);
    }
  } catch (error) {
    progress.fail('Connection test failed');
    console.log(`  Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}
