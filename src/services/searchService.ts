/**
 * Web search through the Brave Search API
 */

import axios, { AxiosInstance } from 'axios';
import { classifyProviderError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('web-search');

export interface SearchResult {
  title: string;
  url: string;
  description: string;
  domain: string;
}

interface BraveResponse {
  web?: {
    results?: Array<{ title?: string; url?: string; description?: string }>;
  };
}

function domainOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return 'unknown source';
  }
}

function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}

export class SearchService {
  private client: AxiosInstance;

  constructor(apiKey: string, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: 'https://api.search.brave.com/res/v1',
      headers: {
        'Accept': 'application/json',
        'X-Subscription-Token': apiKey
      },
      timeout: 10000
    });
  }

  async search(query: string, count: number): Promise<SearchResult[]> {
    try {
      const response = await this.client.get<BraveResponse>('/web/search', { params: { q: query, count } });
      return (response.data.web?.results ?? [])
        .filter(result => result.url)
        .slice(0, count)
        .map(result => ({
          title: stripTags(result.title ?? 'Untitled'),
          url: result.url ?? '',
          description: stripTags(result.description ?? ''),
          domain: domainOf(result.url ?? '')
        }));
    } catch (error) {
      const classified = classifyProviderError(error, 'Web search');
      log.debug({ err: error, code: classified.code }, 'Search request failed');
      throw classified;
    }
  }
}

export function formatSearchResults(query: string, results: SearchResult[]): string {
  if (results.length === 0) return `No results for "${query}".`;
  const lines = results.map((result, index) =>
    `${index + 1}. ${result.title} (${result.domain})\n   ${result.description}\n   ${result.url}`
  );
  return `Results for "${query}":\n\n${lines.join('\n\n')}`;
}
