import * as dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { LLMService, createLlmClient } from './llmService';
import { QueryService } from './queryService';
import { SearchService } from './searchService';
import { SessionStore } from './sessionStore';
import { GoogleSheetFetcher, SheetsLoader } from './sheetsLoader';

dotenv.config();

function main(): void {
  const config = loadConfig();

  console.log('🔧 LLM provider:', config.llm.provider, `(${config.llm.model})`);
  console.log('🔎 Web search:', config.search.apiKey ? 'enabled' : 'disabled (SERPAPI_KEY not set)');

  const store = new SessionStore({ ttlMs: config.session.ttlMs });
  const webSearch = config.search.apiKey
    ? new SearchService({
        apiKey: config.search.apiKey,
        numResults: config.search.numResults,
        timeoutMs: config.search.timeoutMs,
      })
    : null;
  const queryService = new QueryService(
    new LLMService(createLlmClient(config.llm)),
    store,
    webSearch
  );
  const sheetsLoader = new SheetsLoader(new GoogleSheetFetcher(config.sheets.credentialsFile));

  const app = createApp({ config, store, queryService, sheetsLoader });
  app.listen(config.port, () => {
    console.log(`Server running at http://localhost:${config.port}`);
  });
}

try {
  main();
} catch (error) {
  console.error('❌ Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
}
