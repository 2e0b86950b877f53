import { DataProcessor } from './dataProcessor';
import { AppError, errorMessage } from './errors';
import type { LLMService } from './llmService';
import type { WebSearch } from './searchService';
import type { SessionStore } from './sessionStore';
import type { Dataset, QueryRequest, QueryResponse, SearchResult } from './types';

export function buildSystemContext(
  dataset: Dataset,
  searchResults: SearchResult[],
  mainColumn?: string
): string {
  let context = DataProcessor.optimizeDataForLLM(dataset);

  if (mainColumn && dataset.headers.includes(mainColumn)) {
    context += `\nMain column for analysis: ${mainColumn}`;
  }

  if (searchResults.length > 0) {
    const webContext = searchResults.map(r => `- ${r.snippet}`).join('\n');
    context += `\nWeb search results:\n${webContext}`;
  }
  return context;
}

export class QueryService {
  constructor(
    private readonly llmService: LLMService,
    private readonly store: SessionStore,
    // null when no search API key is configured
    private readonly webSearch: WebSearch | null,
    private readonly now: () => Date = () => new Date()
  ) {}

  async askAboutData(request: QueryRequest): Promise<QueryResponse> {
    const question = request.question.trim();
    if (!question) {
      throw new AppError('question must not be empty', 400);
    }

    const session = this.store.get(request.dataId);
    const warnings: string[] = [];
    let searchResults: SearchResult[] = [];

    if (request.useWebSearch) {
      searchResults = await this.searchWeb(question, warnings);
    }

    console.log('🤖 Asking LLM:', question);
    const answer = await this.llmService.answer({
      system: buildSystemContext(session.dataset, searchResults, request.mainColumn),
      user: question,
    });
    console.log('✅ Answer generated, length:', answer.length);

    const timestamp = this.now().toISOString();
    this.store.addResult(session.id, { question, answer, timestamp });

    return { question, answer, timestamp, searchResults, warnings };
  }

  private async searchWeb(question: string, warnings: string[]): Promise<SearchResult[]> {
    if (!this.webSearch) {
      warnings.push('SERPAPI_KEY not found in environment variables');
      return [];
    }

    try {
      const results = await this.webSearch.search(question);
      if (results.length === 0) {
        warnings.push('No web search results found');
      }
      return results;
    } catch (error) {
      console.error('Search error:', error);
      const details = error instanceof AppError && error.details ? error.details : errorMessage(error);
      warnings.push(`Search error: ${details}`);
      return [];
    }
  }
}
