import { Command } from 'commander';
import { formatDuration, formatFileSize } from '../utils/progress.js';
import { withLibrary } from '../utils/library.js';
import { formatCliError, parsePositiveInt } from '../utils/validation.js';

interface StatsOptions {
  configPath?: string;
  top: number;
  json?: boolean;
}

interface HistoryOptions {
  configPath?: string;
  limit: number;
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show library, scripture reference and concept statistics')
    .option('--top <number>', 'Number of top references and concepts to list', value => parsePositiveInt(value), 10)
    .option('--json', 'Print statistics as JSON')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: StatsOptions) => {
      try {
        await showStats(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show recent queries')
    .option('-l, --limit <number>', 'Number of queries to show', value => parsePositiveInt(value), 10)
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: HistoryOptions) => {
      try {
        await showHistory(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function showStats(options: StatsOptions): Promise<void> {
  const stats = await withLibrary(options, async library => ({
    content: library.store.stats(),
    scripture: library.scripture.getStatistics(options.top),
    concepts: library.concepts.getStatistics(options.top),
  }));

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  const { content, scripture, concepts } = stats;
  console.log('📊 Library Statistics');
  console.log('');
  console.log(`  📄 Documents: ${content.document_count}`);
  console.log(`  📝 Chunks: ${content.chunk_count}`);
  console.log(`  🔢 Vectors: ${content.vector_count}`);
  console.log(`  💾 Total size: ${formatFileSize(content.total_size)}`);
  for (const [fileType, count] of Object.entries(content.type_distribution)) {
    console.log(`     ${fileType}: ${count}`);
  }

  console.log('');
  console.log(`📖 Scripture references: ${scripture.total_references} rows, ${scripture.unique_references} unique`);
  for (const entry of scripture.top_references) {
    console.log(`  • ${entry.normalized_reference} (${entry.document_count} documents)`);
  }

  console.log('');
  console.log(`💡 Concepts: ${concepts.total_entries} rows, ${concepts.unique_concepts} unique`);
  for (const entry of concepts.top_concepts) {
    console.log(`  • ${entry.concept} (${entry.document_count} documents, ${entry.total_frequency} mentions)`);
  }
}

async function showHistory(options: HistoryOptions): Promise<void> {
  const history = await withLibrary(options, async library => library.queryEngine.getQueryHistory(options.limit));

  if (history.length === 0) {
    console.log('No queries recorded yet.');
    return;
  }

  console.log('🕘 Recent Queries');
  console.log('');
  for (const record of history) {
    console.log(`  ${record.created_at}  "${record.query_text}"`);
    console.log(`     ${record.results_count} results in ${formatDuration(record.execution_time)}`);
  }
}
