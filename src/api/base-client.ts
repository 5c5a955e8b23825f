import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { readFileSync } from 'fs';
import { Agent } from 'https';
import pLimit from 'p-limit';

export interface ApiClientOptions {
  requestsPerSecond: number;
  timeoutMs?: number;
  /** CA bundle for this client's HTTPS agent; the process-wide trust store is left alone. */
  caCertPath?: string;
  adapter?: AxiosAdapter;
}

export abstract class BaseApiClient {
  protected client: AxiosInstance;
  protected limiter: ReturnType<typeof pLimit>;
  protected requestsPerSecond: number;

  constructor(baseURL: string, options: ApiClientOptions, headers?: Record<string, string>) {
    this.requestsPerSecond = options.requestsPerSecond;
    this.limiter = pLimit(Math.max(1, Math.floor(options.requestsPerSecond)));

    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Accept': 'application/json',
        ...headers,
      },
      httpsAgent: options.caCertPath
        ? new Agent({ ca: readFileSync(options.caCertPath) })
        : undefined,
      adapter: options.adapter,
    });

    // Add delay between requests to respect rate limits
    this.client.interceptors.response.use(async (response) => {
      await this.delay(1000 / this.requestsPerSecond);
      return response;
    });
  }

  protected async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  protected async request<T>(config: AxiosRequestConfig): Promise<T> {
    return this.limiter(async () => {
      const response = await this.client.request<T>(config);
      return response.data;
    });
  }
}
