import { FetchError, describeError } from '../../shared/errors';
import { Logger } from '../../shared/logger';

export type QueryParams = Record<string, string>;

/**
 * Minimal GET client for the public JSON endpoints. One attempt per call,
 * bounded by `timeoutMs`; every failure surfaces as FetchError.
 */
export class JsonApiClient {
  private readonly logger = new Logger(JsonApiClient.name);

  constructor(private readonly timeoutMs: number) {}

  async getJson(source: string, url: string, params: QueryParams = {}): Promise<unknown> {
    const text = await this.getText(source, url, params);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new FetchError(source, `Malformed JSON: ${describeError(error)}`, { cause: error });
    }
  }

  async getText(source: string, url: string, params: QueryParams = {}): Promise<string> {
    const target = this.buildUrl(source, url, params);

    // host only: query strings may carry API keys
    this.logger.debug(`[${source}] GET ${target.host}${target.pathname}`);

    let response: Response;
    try {
      response = await fetch(target.toString(), {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `Timed out after ${this.timeoutMs}ms`
          : `Request failed: ${describeError(error)}`;
      throw new FetchError(source, reason, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(source, `HTTP ${response.status}: ${response.statusText}`);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FetchError(source, `Cannot read body: ${describeError(error)}`, { cause: error });
    }
  }

  private buildUrl(source: string, url: string, params: QueryParams): URL {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      throw new FetchError(source, `Invalid URL "${url}"`, { cause: error });
    }
    Object.entries(params).forEach(([key, value]) => {
      target.searchParams.set(key, value);
    });
    return target;
  }
}
