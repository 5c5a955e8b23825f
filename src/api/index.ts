export { BaseApiClient } from './base-client.js';
export type { ApiClientOptions } from './base-client.js';
export { ArxivClient, parseArxivFeed, categoryQuery } from './arxiv-client.js';
export type { ArxivClientOptions, ArxivFeed } from './arxiv-client.js';
