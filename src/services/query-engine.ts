import { ContentStore, type SimilarityResult } from './content-store.js';
import { ScriptureIndexer, type ReferenceSearchResult } from './scripture-indexer.js';
import { ConceptIndexer, type ConceptSearchResult } from './concept-indexer.js';
import type { ScriptureTextLookup } from './scripture-lookup.js';
import type { GenerationOptions, GenerationProvider } from '../types/provider.js';
import type { QueryHistoryRecord } from '../types/document.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const GENERATION_FAILED_MESSAGE = 'Error generating answer. Vector search results available.';
export const NO_COMBINED_MATCH_MESSAGE = 'No documents found meeting both filter criteria.';

export interface QueryEngineOptions {
  /** Results returned per query */
  maxResults: number;
  /** Results placed in the generation context */
  contextResults: number;
  includeSources: boolean;
  generation?: GenerationOptions;
}

export interface SourceReference {
  document_id: number;
  filename: string;
  filepath: string;
  similarity: number;
}

export interface QueryResponse {
  query: string;
  results: SimilarityResult[];
  /** Generated answer, a no-match message, or null when generation was not requested */
  answer: string | null;
  /** Milliseconds */
  executionTime: number;
  sources: SourceReference[];
  referenceFilter?: string;
  conceptFilter?: string;
  referenceMatches?: ReferenceSearchResult[];
  conceptMatches?: ConceptSearchResult[];
}

const DEFAULT_OPTIONS: QueryEngineOptions = {
  maxResults: 10,
  contextResults: 5,
  includeSources: true,
};

/**
 * Answers questions from the library: vector search, optional index filters and optional generation
 */
export class QueryEngine {
  private store: ContentStore;
  private scripture: ScriptureIndexer;
  private concepts: ConceptIndexer;
  private generator: GenerationProvider | null;
  private lookup: ScriptureTextLookup | null;
  private options: QueryEngineOptions;
  private logger: Logger;

  constructor(
    store: ContentStore,
    scripture: ScriptureIndexer,
    concepts: ConceptIndexer,
    generator: GenerationProvider | null,
    lookup: ScriptureTextLookup | null = null,
    options: Partial<QueryEngineOptions> = {},
    logger?: Logger
  ) {
    this.store = store;
    this.scripture = scripture;
    this.concepts = concepts;
    this.generator = generator;
    this.lookup = lookup;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger ?? createLogger('query-engine');
  }

  /**
   * Whether answers can be generated at all
   */
  canGenerate(): boolean {
    return this.generator !== null;
  }

  async query(text: string, useGeneration: boolean = true, topK?: number): Promise<QueryResponse> {
    const startTime = Date.now();
    const results = await this.store.searchSimilar(text, topK ?? this.options.maxResults);

    const response = await this.answer(
      { query: text, results, answer: null, executionTime: 0, sources: [] },
      useGeneration,
      () => this.buildGeneralPrompt(text, results)
    );

    return this.finish(response, startTime);
  }

  /**
   * Search only the documents that mention a scripture reference
   */
  async queryWithReferenceFilter(
    text: string,
    reference: string,
    useGeneration: boolean = true,
    topK?: number
  ): Promise<QueryResponse> {
    const startTime = Date.now();
    const referenceMatches = this.scripture.searchByReference(reference);

    if (referenceMatches.length === 0) {
      return this.finish({
        query: text,
        results: [],
        answer: `No documents found containing scripture reference: ${reference}`,
        executionTime: 0,
        sources: [],
        referenceFilter: reference,
        referenceMatches,
      }, startTime);
    }

    const results = await this.store.searchSimilarFiltered(
      text,
      referenceMatches.map(match => match.document_id),
      topK ?? this.options.maxResults
    );

    const response = await this.answer(
      { query: text, results, answer: null, executionTime: 0, sources: [], referenceFilter: reference, referenceMatches },
      useGeneration,
      () => this.buildReferencePrompt(text, results, reference, referenceMatches)
    );

    return this.finish(response, startTime);
  }

  /**
   * Search only the documents that contain both a theological concept and a scripture reference
   */
  async queryWithConceptAndReferenceFilter(
    text: string,
    concept: string,
    reference: string,
    useGeneration: boolean = true,
    topK?: number
  ): Promise<QueryResponse> {
    const startTime = Date.now();
    const base = { query: text, results: [], executionTime: 0, sources: [], conceptFilter: concept, referenceFilter: reference };

    const conceptMatches = this.concepts.searchByConcepts([concept]);
    if (conceptMatches.length === 0) {
      return this.finish({
        ...base,
        answer: `No documents found containing theological concept: ${concept}`,
        conceptMatches,
      }, startTime);
    }

    const referenceMatches = this.scripture.searchByReference(reference);
    if (referenceMatches.length === 0) {
      return this.finish({
        ...base,
        answer: `No documents found containing scripture reference: ${reference}`,
        conceptMatches,
        referenceMatches,
      }, startTime);
    }

    const referenceIds = new Set(referenceMatches.map(match => match.document_id));
    const documentIds = conceptMatches
      .map(match => match.document_id)
      .filter(id => referenceIds.has(id));

    if (documentIds.length === 0) {
      return this.finish({ ...base, answer: NO_COMBINED_MATCH_MESSAGE, conceptMatches, referenceMatches }, startTime);
    }

    const results = await this.store.searchSimilarFiltered(text, documentIds, topK ?? this.options.maxResults);

    const response = await this.answer(
      { ...base, results, answer: null, conceptMatches, referenceMatches },
      useGeneration,
      () => this.buildCombinedPrompt(text, results, concept, conceptMatches, reference, referenceMatches)
    );

    return this.finish(response, startTime);
  }

  searchByReference(reference: string): ReferenceSearchResult[] {
    return this.scripture.searchByReference(reference);
  }

  searchByConcepts(concepts: readonly string[], minFrequency: number = 1): ConceptSearchResult[] {
    return this.concepts.searchByConcepts(concepts, minFrequency);
  }

  getQueryHistory(limit: number = 10): QueryHistoryRecord[] {
    return this.store.getQueryHistory(limit);
  }

  /**
   * Fill in the answer when there are results and generation is wanted and available
   */
  private async answer(
    response: QueryResponse,
    useGeneration: boolean,
    buildPrompt: () => string
  ): Promise<QueryResponse> {
    if (response.results.length === 0 || !useGeneration || this.generator === null) {
      return response;
    }

    try {
      const answer = await this.generator.generate(buildPrompt(), this.options.generation);
      return {
        ...response,
        answer,
        sources: this.options.includeSources ? this.extractSources(response.results) : [],
      };
    } catch (error) {
      this.logger.error(`Answer generation failed: ${String(error)}`);
      return { ...response, answer: GENERATION_FAILED_MESSAGE };
    }
  }

  private finish(response: QueryResponse, startTime: number): QueryResponse {
    const executionTime = Date.now() - startTime;
    this.store.recordQuery(response.query, response.results.length, executionTime);
    return { ...response, executionTime };
  }

  private extractSources(results: readonly SimilarityResult[]): SourceReference[] {
    return results.map(result => ({
      document_id: result.metadata.document_id,
      filename: result.metadata.filename,
      filepath: result.metadata.filepath,
      similarity: result.similarity,
    }));
  }

  private formatEntry(result: SimilarityResult, content: string = result.content): string {
    return `Document "${result.metadata.filename}" (relevance: ${result.similarity.toFixed(3)}):\n${content}\n`;
  }

  private contextResults(results: readonly SimilarityResult[]): SimilarityResult[] {
    return results.slice(0, this.options.contextResults);
  }

  /**
   * Append the passage text of every reference in the content that the lookup knows
   */
  enrichWithScripture(content: string): string {
    const lookup = this.lookup;
    if (lookup === null) return content;

    const additions: string[] = [];
    for (const reference of this.scripture.extract(content).references.values()) {
      const passage = lookup.getText(reference.normalizedReference);
      if (passage !== null) {
        additions.push(`\n\n${reference.normalizedReference}: "${passage}"`);
      }
    }

    return additions.length > 0
      ? `${content}\n\nReferenced Scriptures:${additions.join('')}`
      : content;
  }

  buildGeneralPrompt(query: string, results: readonly SimilarityResult[]): string {
    const context = this.contextResults(results)
      .map(result => this.formatEntry(result, this.enrichWithScripture(result.content)))
      .join('\n');

    return `You are a document analysis assistant. Answer the user's question using the information provided in the context below. Be comprehensive and helpful while staying within the bounds of the provided content.

GUIDELINES:
- Base your answer primarily on the information provided in the context below
- When citing information, reference the actual document filenames (e.g., "As explained in 'notes.md'...")
- Do NOT use phrases like "the documents suggest", "according to the documents", "the documents state"
- Answer directly and naturally using the provided information
- If the context provides relevant information but not a complete answer, work with what's available and indicate where information might be limited
- Only say you don't have enough information if the context is completely unrelated to the question

Context from sources:
${context}

User question: ${query}

Provide a comprehensive answer based on the information provided above.`;
  }

  buildReferencePrompt(
    query: string,
    results: readonly SimilarityResult[],
    reference: string,
    matches: readonly ReferenceSearchResult[]
  ): string {
    const context = this.contextResults(results).map(result => this.formatEntry(result)).join('\n');
    const referenceInfo = matches.slice(0, 3).flatMap(match => {
      const lines = [`Scripture ${match.normalized_reference} found in ${match.filename}`];
      const [firstContext] = match.contexts;
      if (firstContext !== undefined) {
        lines.push(`Context: ${firstContext.slice(0, 200)}...`);
      }
      return lines;
    }).join('\n');

    return `Based on the following documents that contain the scripture reference "${reference}", please answer the user's question.

Scripture Reference Context:
${referenceInfo}

Document Content:
${context}

User question: ${query}

Please provide a comprehensive answer that specifically addresses how the scripture reference "${reference}" relates to the question, based on the information in the documents.`;
  }

  buildCombinedPrompt(
    query: string,
    results: readonly SimilarityResult[],
    concept: string,
    conceptMatches: readonly ConceptSearchResult[],
    reference: string,
    referenceMatches: readonly ReferenceSearchResult[]
  ): string {
    const context = this.contextResults(results).map(result => this.formatEntry(result)).join('\n');

    const conceptInfo = [
      `Theological concept '${concept}' found in documents:`,
      ...conceptMatches.slice(0, 3).map(match => {
        const contexts = this.concepts.getDocumentConcepts(match.document_id)
          .filter(stored => match.concepts.includes(stored.concept))
          .flatMap(stored => stored.contexts)
          .slice(0, 2);
        return `- ${match.filename} - Context: ${contexts.join(',')}`;
      }),
    ].join('\n');

    const referenceInfo = [
      `Scripture references for '${reference}' found in documents:`,
      ...referenceMatches.slice(0, 3).map(match => `- ${match.filename} - Context: ${match.contexts.slice(0, 2).join(',')}`),
    ].join('\n');

    return `Based on the documents containing the theological concept "${concept}" and the scripture reference "${reference}", please answer the user's question.

Theological Context:
${conceptInfo}

Scripture Reference Context:
${referenceInfo}

Document Content:
${context}

User question: ${query}

Provide a detailed answer how the theological concept and the scripture are related to the user's query.`;
  }
}
