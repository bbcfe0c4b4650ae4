import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { readFile, stat } from 'fs/promises';
import { fileURLToPath } from 'url';
import { FetchError, errorMessage } from '../errors';
import { createLogger, redactUrl } from '../utils/logger';

const log = createLogger('sdn-fetcher');

export interface DatasetFetcher {
  /**
   * Retrieve the raw dataset bytes. One attempt; failures reject with FetchError.
   */
  fetch(source: string): Promise<Buffer>;
}

export interface FetcherOptions {
  timeoutMs: number;
  maxBytes: number;
}

type HttpGetter = Pick<AxiosInstance, 'get'>;

export function isHttpSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

// =============================================================================
// HTTP
// =============================================================================

export class HttpDatasetFetcher implements DatasetFetcher {
  constructor(
    private readonly options: FetcherOptions,
    private readonly http: HttpGetter = axios.create()
  ) {}

  async fetch(source: string): Promise<Buffer> {
    const startedAt = Date.now();
    log.debug({ source: redactUrl(source) }, 'Downloading SDN dataset');

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.get<ArrayBuffer>(source, {
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs,
        signal: AbortSignal.timeout(this.options.timeoutMs),
        maxContentLength: this.options.maxBytes,
        maxRedirects: 5,
        headers: {
          Accept: 'text/csv, text/plain;q=0.9, */*;q=0.1',
          'User-Agent': 'sdn-lookup-service'
        },
        validateStatus: () => true
      });
    } catch (error) {
      throw toFetchError(source, error, this.options.timeoutMs);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError({
        source,
        reason: 'status',
        upstreamStatus: response.status,
        message: `Upstream responded with HTTP ${response.status}`
      });
    }

    const body = Buffer.from(response.data);
    log.info({
      source: redactUrl(source),
      bytes: body.length,
      durationMs: Date.now() - startedAt
    }, 'SDN dataset downloaded');

    return body;
  }
}

function toFetchError(source: string, error: unknown, timeoutMs: number): FetchError {
  const timedOut = axios.isCancel(error) ||
    (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'));

  if (timedOut) {
    return new FetchError({
      source,
      reason: 'timeout',
      message: `Upstream did not respond within ${timeoutMs}ms`,
      cause: error
    });
  }

  return new FetchError({
    source,
    reason: 'network',
    message: `Upstream request failed: ${errorMessage(error)}`,
    cause: error
  });
}

// =============================================================================
// FILE
// =============================================================================

export class FileDatasetFetcher implements DatasetFetcher {
  constructor(private readonly options: FetcherOptions) {}

  async fetch(source: string): Promise<Buffer> {
    let path = source;
    let body: Buffer;
    try {
      if (source.startsWith('file:')) {
        path = fileURLToPath(source);
      }

      const { size } = await stat(path);
      if (size > this.options.maxBytes) {
        throw new FetchError({
          source,
          reason: 'io',
          message: `Dataset file is ${size} bytes, above the ${this.options.maxBytes} byte limit`
        });
      }

      body = await readFile(path, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      const timedOut = error instanceof Error && error.name === 'AbortError';
      throw new FetchError({
        source,
        reason: timedOut ? 'timeout' : 'io',
        message: timedOut
          ? `Reading ${path} did not finish within ${this.options.timeoutMs}ms`
          : `Could not read ${path}: ${errorMessage(error)}`,
        cause: error
      });
    }

    log.info({ source, bytes: body.length }, 'SDN dataset read from file');
    return body;
  }
}

// =============================================================================
// SOURCE ROUTING
// =============================================================================

/**
 * Picks the HTTP or file fetcher from the shape of the source location
 */
export class DatasetSourceFetcher implements DatasetFetcher {
  private readonly httpFetcher: DatasetFetcher;
  private readonly fileFetcher: DatasetFetcher;

  constructor(options: FetcherOptions, http?: HttpGetter) {
    this.httpFetcher = new HttpDatasetFetcher(options, http);
    this.fileFetcher = new FileDatasetFetcher(options);
  }

  fetch(source: string): Promise<Buffer> {
    return isHttpSource(source) ? this.httpFetcher.fetch(source) : this.fileFetcher.fetch(source);
  }
}
