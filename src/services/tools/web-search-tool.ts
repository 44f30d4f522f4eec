// Web Tools
// Wrap the web search service and the page scraper as tools

import { errorMessage } from '../../utils/errors.js';
import { formatWebSearchResult, scrapeWebpage, searchWeb } from '../web-search.js';
import { errorResult, okResult, type ToolDefinition } from './types.js';

export const webSearchTool: ToolDefinition = {
  name: 'web_search',
  description:
    'Search the web for current information and recent events. Returns a summary and related results with URLs.',
  parameters: [
    {
      name: 'query',
      type: 'string',
      description: 'The search query to look up on the web',
      required: true,
    },
  ],
  execute: async args => {
    const query = typeof args.query === 'string' ? args.query.trim() : '';
    if (!query) {
      return errorResult('ValidationError', 'Query is required');
    }

    try {
      return okResult(formatWebSearchResult(await searchWeb(query)));
    } catch (error) {
      return errorResult('ApplicationError', `Web search failed: ${errorMessage(error)}`);
    }
  },
};

export const scrapeWebpageTool: ToolDefinition = {
  name: 'scrape_webpage',
  description: 'Fetch a webpage and return its readable text (first 2000 characters).',
  parameters: [
    {
      name: 'url',
      type: 'string',
      description: 'Absolute http(s) URL of the page',
      required: true,
    },
  ],
  execute: async args => {
    const url = typeof args.url === 'string' ? args.url.trim() : '';
    if (!URL.canParse(url) || !/^https?:/i.test(url)) {
      return errorResult('ValidationError', `Invalid URL: ${url || '(empty)'}`);
    }

    try {
      return okResult(await scrapeWebpage(url));
    } catch (error) {
      return errorResult('ApplicationError', `Failed to scrape webpage: ${errorMessage(error)}`);
    }
  },
};
