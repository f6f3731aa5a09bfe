import { Command } from 'commander';
import type { RebuildSummary } from '../../types/document.js';
import { ValidationError } from '../../utils/errors.js';
import { ProgressIndicator, formatDuration } from '../utils/progress.js';
import { withLibrary } from '../utils/library.js';
import { formatCliError } from '../utils/validation.js';

interface RebuildOptions {
  configPath?: string;
  scriptureOnly?: boolean;
  conceptsOnly?: boolean;
}

export function createRebuildIndexCommand(): Command {
  return new Command('rebuild-index')
    .description('Rebuild the scripture reference and concept indexes from stored chunks')
    .option('--scripture-only', 'Rebuild only the scripture reference index')
    .option('--concepts-only', 'Rebuild only the concept index')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: RebuildOptions) => {
      try {
        await rebuildIndexes(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function rebuildIndexes(options: RebuildOptions): Promise<void> {
  if (options.scriptureOnly && options.conceptsOnly) {
    throw new ValidationError('--scripture-only and --concepts-only cannot be combined');
  }

  const startTime = Date.now();
  const progress = new ProgressIndicator('Rebuilding indexes...');

  const result = await withLibrary(options, async library => {
    progress.start();
    try {
      const rebuilt = library.processor.rebuildIndexes({
        scripture: !options.conceptsOnly,
        concepts: !options.scriptureOnly,
      });
      progress.stop(`Indexes rebuilt in ${formatDuration(Date.now() - startTime)}`);
      return rebuilt;
    } catch (error) {
      progress.fail('Index rebuild failed');
      throw error;
    }
  });

  console.log('');
  if (result.scripture) printSummary('📖 Scripture index', result.scripture);
  if (result.concepts) printSummary('💡 Concept index', result.concepts);

  if (result.scripture?.success === false || result.concepts?.success === false) {
    process.exitCode = 1;
  }
}

function printSummary(label: string, summary: RebuildSummary): void {
  const status = summary.success ? '✅' : '⚠️ ';
  console.log(`${status} ${label}: ${summary.succeeded}/${summary.total} documents indexed, ${summary.failed} failed`);
}
