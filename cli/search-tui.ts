/**
 * Terminal UI for querying the catalog search server.
 */

/* eslint-disable no-await-in-loop */

import { confirm, input, select } from '@inquirer/prompts';
import { loadConfig } from '../config/app-config';
import { buildToolCallRequest, formatSearchResponse, type ToolCallRequest } from './search-tui-helpers';

const REQUEST_TIMEOUT_MS = 30_000;

async function checkStatus(baseUrl: string): Promise<boolean> {
  try {
    const res = await fetch(`${baseUrl}/`);
    if (res.ok) {
      const data: unknown = await res.json();
      console.log('\n✓ Server online:', JSON.stringify(data, null, 2));
      return true;
    }
    console.error(`\n✗ Server answered HTTP ${res.status}`);
  } catch (err) {
    console.error('\n✗ Connection failed:', err instanceof Error ? err.message : String(err));
  }
  return false;
}

async function callTool(baseUrl: string, request: ToolCallRequest): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
  try {
    const res = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      signal: controller.signal
    });
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${text}`);
    }
    const body: unknown = JSON.parse(text);
    return formatSearchResponse(body);
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new Error(`Request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

async function promptForSearch(id: number): Promise<ToolCallRequest> {
  const query = await input({
    message: 'What are you looking for?',
    validate: (v: string) => (v.trim() ? true : 'Required')
  });
  const withFilters = await confirm({ message: 'Add filters?', default: false });
  if (!withFilters) {
    return buildToolCallRequest({ query }, id);
  }

  const topK = await input({ message: 'Number of results (blank for 5)', default: '' });
  const maxPrice = await input({ message: 'Max price in EUR (blank for none)', default: '' });
  const category = await input({ message: 'Category (blank for any)', default: '' });
  const brand = await input({ message: 'Brand (blank for any)', default: '' });
  const inStockOnly = await confirm({ message: 'Only products in stock?', default: false });

  return buildToolCallRequest({ query, topK, maxPrice, category, brand, inStockOnly }, id);
}

export async function main(): Promise<void> {
  const baseUrl = loadConfig().searchServerUrl.replace(/\/+$/, '');
  console.log(`\nCatalog search TUI: ${baseUrl}\n`);

  if (!(await checkStatus(baseUrl))) {
    console.log('\nStart the server with: npm start');
    console.log('Or set SEARCH_SERVER_URL for a different endpoint.\n');
    process.exitCode = 1;
    return;
  }

  let requestId = 1;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const action = await select({
      message: 'Choose an operation',
      choices: [
        { name: 'Search products', value: 'search' },
        { name: 'Server status', value: 'status' },
        { name: 'Exit', value: 'exit' }
      ]
    });

    if (action === 'exit') {
      console.log('\nGoodbye.\n');
      break;
    }

    if (action === 'status') {
      await checkStatus(baseUrl);
      continue;
    }

    try {
      const request = await promptForSearch(requestId);
      requestId += 1;
      console.log(await callTool(baseUrl, request));
    } catch (err) {
      console.error('\n✗', err instanceof Error ? err.message : String(err));
    }
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
