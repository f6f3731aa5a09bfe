import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import type { ProcessingSummary } from '../../services/document-processor.js';
import { ProgressBar, formatDuration } from '../utils/progress.js';
import { withLibrary } from '../utils/library.js';
import { formatCliError, validatePathArgument } from '../utils/validation.js';

interface AddOptions {
  configPath?: string;
  dryRun?: boolean;
}

const OUTCOME_ICONS = {
  processed: '✅',
  skipped: '⏭️ ',
  error: '❌',
} as const;

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add files or directories to the library and index them')
    .argument('<paths...>', 'Files or directories to ingest')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--dry-run', 'List the files that would be ingested without processing them')
    .action(async (paths: string[], options: AddOptions) => {
      try {
        await addPaths(paths, options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function addPaths(paths: string[], options: AddOptions): Promise<void> {
  const startTime = Date.now();
  paths.forEach(validatePathArgument);

  console.log('📄 Scriptorium Document Ingestion');
  console.log('');

  let progress: ProgressBar | undefined;

  const summary = await withLibrary(options, async library => {
    const files: string[] = [];
    for (const target of paths) {
      const absolutePath = path.resolve(target);
      const stats = await fs.stat(absolutePath);
      if (stats.isDirectory()) {
        const pending = await library.processor.findUnprocessedFiles(absolutePath);
        console.log(`📁 ${absolutePath}: ${pending.length} new files`);
        files.push(...pending);
      } else {
        files.push(absolutePath);
      }
    }

    if (options.dryRun) {
      files.forEach(file => console.log(`  • ${file}`));
      console.log('');
      console.log('👆 Run without --dry-run to ingest these files');
      return null;
    }

    progress = new ProgressBar(files.length);
    return library.processor.processFiles(files);
  }, {
    onFile: result => {
      const detail = result.outcome === 'processed'
        ? `${result.chunkCount ?? 0} chunks`
        : result.message ?? '';
      const line = progress?.tick(path.basename(result.filepath)) ?? path.basename(result.filepath);
      console.log(`${OUTCOME_ICONS[result.outcome]} ${line}${detail ? ` (${detail})` : ''}`);
    },
  });

  if (summary !== null) {
    printSummary(summary, Date.now() - startTime);
    if (summary.errors > 0) {
      process.exitCode = 1;
    }
  }
}

function printSummary(summary: ProcessingSummary, elapsedMs: number): void {
  console.log('');
  console.log('📋 Ingestion Results:');
  console.log(`  ✅ Processed: ${summary.processed}`);
  console.log(`  ⏭️  Skipped: ${summary.skipped}`);
  console.log(`  ❌ Errors: ${summary.errors}`);
  console.log(`  ⏱️  Time: ${formatDuration(elapsedMs)}`);
}
