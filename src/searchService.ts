import axios, { type AxiosInstance } from 'axios';
import { SearchError, errorMessage } from './errors';
import type { SearchResult } from './types';

const SERPAPI_BASE_URL = 'https://serpapi.com';
const NO_RESULTS_MARKER = "hasn't returned any results";

export interface WebSearch {
  search(query: string, numResults?: number): Promise<SearchResult[]>;
}

export interface SearchServiceOptions {
  apiKey: string;
  numResults: number;
  timeoutMs: number;
  http?: Pick<AxiosInstance, 'get'>;
}

export class SearchService implements WebSearch {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly apiKey: string;
  private readonly numResults: number;

  constructor(options: SearchServiceOptions) {
    this.apiKey = options.apiKey;
    this.numResults = options.numResults;
    this.http = options.http ?? axios.create({ baseURL: SERPAPI_BASE_URL, timeout: options.timeoutMs });
  }

  async search(query: string, numResults = this.numResults): Promise<SearchResult[]> {
    console.log('🔎 Searching for:', query);

    let body: unknown;
    try {
      const response = await this.http.get('/search.json', {
        params: {
          q: query,
          api_key: this.apiKey,
          num: numResults,
          engine: 'google',
        },
      });
      body = response.data;
    } catch (error) {
      throw new SearchError('Search error', describeAxiosError(error));
    }

    const results = parseOrganicResults(body, numResults);
    console.log(`✅ Found ${results.length} results`);
    return results;
  }
}

export function parseOrganicResults(body: unknown, limit: number): SearchResult[] {
  if (!isRecord(body)) {
    throw new SearchError('Search error', 'Unexpected response from search API');
  }

  const organic = body.organic_results;
  if (!Array.isArray(organic)) {
    const apiError = typeof body.error === 'string' ? body.error : undefined;
    if (apiError && !apiError.includes(NO_RESULTS_MARKER)) {
      throw new SearchError('Search error', apiError);
    }
    console.warn('⚠️ No organic results found in API response');
    return [];
  }

  return organic.slice(0, limit).filter(isRecord).map(result => ({
    title: stringField(result, 'title'),
    snippet: stringField(result, 'snippet'),
    link: stringField(result, 'link'),
  }));
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (isRecord(data) && typeof data.error === 'string') {
      return data.error;
    }
  }
  return errorMessage(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}
