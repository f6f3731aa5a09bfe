import { Command } from 'commander';
import { promptConfirm } from '../utils/input.js';
import { withLibrary } from '../utils/library.js';
import { formatCliError } from '../utils/validation.js';

interface ClearOptions {
  configPath?: string;
  yes?: boolean;
  cleanup?: boolean;
}

export function createClearCommand(): Command {
  return new Command('clear')
    .description('Delete every document, chunk, vector, index row and query from the library')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--cleanup', 'Only remove orphaned chunks and vectors')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: ClearOptions) => {
      try {
        await clearLibrary(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function clearLibrary(options: ClearOptions): Promise<void> {
  if (options.cleanup) {
    const removed = await withLibrary(options, async library => library.store.cleanup());
    console.log(`🧹 Removed ${removed.chunks} orphaned chunks and ${removed.vectors} stray vectors`);
    return;
  }

  if (!options.yes) {
    const confirmed = await promptConfirm('This deletes the whole library. Continue?', false);
    if (!confirmed) {
      console.log('Clear cancelled.');
      return;
    }
  }

  const before = await withLibrary(options, async library => {
    const stats = library.store.stats();
    library.processor.clearAll();
    return stats;
  });

  console.log(`🗑️  Removed ${before.document_count} documents and ${before.chunk_count} chunks`);
}
