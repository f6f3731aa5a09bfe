import { Command } from 'commander';
import type { QueryResponse } from '../../services/query-engine.js';
import { ValidationError } from '../../utils/errors.js';
import { ProgressIndicator, formatDuration } from '../utils/progress.js';
import { withLibrary } from '../utils/library.js';
import { formatCliError, parsePositiveInt, validateQueryString } from '../utils/validation.js';

interface QueryOptions {
  configPath?: string;
  reference?: string;
  concept?: string;
  limit?: number;
  generate: boolean;
  json?: boolean;
}

export function createQueryCommand(): Command {
  return new Command('query')
    .description('Ask a question of the library, optionally filtered by scripture reference and concept')
    .argument('<text>', 'Question or search text')
    .option('-r, --reference <reference>', 'Only search documents citing this scripture reference')
    .option('-c, --concept <concept>', 'Only search documents containing this concept (requires --reference)')
    .option('-l, --limit <number>', 'Maximum number of results', value => parsePositiveInt(value))
    .option('--no-generate', 'Return search results without generating an answer')
    .option('--json', 'Print the full response as JSON')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (text: string, options: QueryOptions) => {
      try {
        await runQuery(text, options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function runQuery(text: string, options: QueryOptions): Promise<void> {
  validateQueryString(text);
  if (options.concept !== undefined && options.reference === undefined) {
    throw new ValidationError('--concept must be combined with --reference');
  }

  const response = await withLibrary(options, async library => {
    const engine = library.queryEngine;
    const progress = options.json ? undefined : new ProgressIndicator('Searching the library...');
    progress?.start();

    try {
      let result: QueryResponse;
      if (options.concept !== undefined && options.reference !== undefined) {
        result = await engine.queryWithConceptAndReferenceFilter(
          text,
          options.concept,
          options.reference,
          options.generate,
          options.limit
        );
      } else if (options.reference !== undefined) {
        result = await engine.queryWithReferenceFilter(text, options.reference, options.generate, options.limit);
      } else {
        result = await engine.query(text, options.generate, options.limit);
      }
      progress?.stop();
      return result;
    } catch (error) {
      progress?.fail('Query failed');
      throw error;
    }
  });

  if (options.json) {
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  printResponse(response);
}

function printResponse(response: QueryResponse): void {
  console.log(`\n🔍 Query: "${response.query}"`);
  if (response.referenceFilter !== undefined) {
    console.log(`📖 Reference: ${response.referenceFilter} (${response.referenceMatches?.length ?? 0} documents)`);
  }
  if (response.conceptFilter !== undefined) {
    console.log(`💡 Concept: ${response.conceptFilter} (${response.conceptMatches?.length ?? 0} documents)`);
  }
  console.log(`⏱️  ${formatDuration(response.executionTime)}`);
  console.log('');

  if (response.answer !== null) {
    console.log('💬 Answer:');
    console.log(response.answer);
    console.log('');
  }

  const results = response.results;
  if (results.length === 0) {
    console.log('❌ No matching passages found.');
    return;
  }

  console.log(`📋 ${results.length} passages:`);
  results.forEach((result, index) => {
    const preview = result.content.length > 200 ? `${result.content.slice(0, 200)}...` : result.content;
    console.log(`\n${index + 1}. ${result.metadata.filename} (similarity ${result.similarity.toFixed(3)})`);
    console.log(`   ${preview}`);
  });

  if (response.sources.length > 0) {
    console.log('\n📚 Sources:');
    const seen = new Set<string>();
    for (const source of response.sources) {
      if (seen.has(source.filepath)) continue;
      seen.add(source.filepath);
      console.log(`  • ${source.filename} (${source.filepath})`);
    }
  }
}
