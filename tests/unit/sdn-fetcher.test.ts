import nock from 'nock';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { FetchError } from '../../src/errors';
import {
  DatasetSourceFetcher,
  FileDatasetFetcher,
  HttpDatasetFetcher,
  isHttpSource
} from '../../src/services/sdn-fetcher.service';
import { buildCsv, DEFAULT_RECORDS } from '../fixtures';

jest.mock('fs/promises', () => {
  const actual = jest.requireActual<typeof import('fs/promises')>('fs/promises');
  return { ...actual, readFile: jest.fn(actual.readFile) };
});

const ORIGIN = 'https://sanctions.test';
const PATH = '/datasets/us_sdn/targets.simple.csv';
const SOURCE = `${ORIGIN}${PATH}`;
const CSV = buildCsv(DEFAULT_RECORDS);

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(() => null, (error: unknown) => error);
}

describe('HttpDatasetFetcher', () => {
  const fetcher = new HttpDatasetFetcher({ timeoutMs: 200, maxBytes: 64 * 1024 });

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('returns the response body as bytes', async () => {
    const scope = nock(ORIGIN)
      .get(PATH)
      .matchHeader('user-agent', 'sdn-lookup-service')
      .reply(200, CSV, { 'Content-Type': 'text/csv' });

    const body = await fetcher.fetch(SOURCE);

    expect(body.toString('utf8')).toBe(CSV);
    expect(scope.isDone()).toBe(true);
  });

  it('treats a non-2xx status as a failed fetch', async () => {
    nock(ORIGIN).get(PATH).reply(503, 'maintenance');

    const error = await captureError(fetcher.fetch(SOURCE));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      reason: 'status',
      upstreamStatus: 503,
      source: SOURCE,
      message: 'Upstream responded with HTTP 503'
    });
  });

  it('reports connection failures', async () => {
    nock(ORIGIN).get(PATH).replyWithError('socket hang up');

    const error = await captureError(fetcher.fetch(SOURCE));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      reason: 'network',
      message: 'Upstream request failed: socket hang up'
    });
  });

  it('gives up after the timeout', async () => {
    nock(ORIGIN).get(PATH).delay(1000).reply(200, CSV);

    const error = await captureError(fetcher.fetch(SOURCE));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      reason: 'timeout',
      message: 'Upstream did not respond within 200ms'
    });
  });

  it('refuses bodies above the size cap', async () => {
    const small = new HttpDatasetFetcher({ timeoutMs: 200, maxBytes: 16 });
    nock(ORIGIN).get(PATH).reply(200, CSV);

    const error = await captureError(small.fetch(SOURCE));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty('reason', 'network');
    expect(error).toHaveProperty('message', expect.stringContaining('maxContentLength'));
  });
});

describe('FileDatasetFetcher', () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sdn-fetcher-'));
    file = join(dir, 'targets.simple.csv');
    await writeFile(file, CSV, 'utf8');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a plain path', async () => {
    const fetcher = new FileDatasetFetcher({ timeoutMs: 1000, maxBytes: 64 * 1024 });

    const body = await fetcher.fetch(file);

    expect(body.toString('utf8')).toBe(CSV);
  });

  it('reads a file: URL', async () => {
    const fetcher = new FileDatasetFetcher({ timeoutMs: 1000, maxBytes: 64 * 1024 });

    const body = await fetcher.fetch(pathToFileURL(file).href);

    expect(body.toString('utf8')).toBe(CSV);
  });

  it('reports a missing file as an io failure', async () => {
    const fetcher = new FileDatasetFetcher({ timeoutMs: 1000, maxBytes: 64 * 1024 });
    const missing = join(dir, 'missing.csv');

    const error = await captureError(fetcher.fetch(missing));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty('reason', 'io');
    expect(error).toHaveProperty('message', expect.stringMatching(/^Could not read .*missing\.csv: /));
  });

  it('refuses files above the size cap without reading them', async () => {
    const fetcher = new FileDatasetFetcher({ timeoutMs: 1000, maxBytes: 16 });
    const size = Buffer.byteLength(CSV, 'utf8');

    const error = await captureError(fetcher.fetch(file));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty('reason', 'io');
    expect(error).toHaveProperty('message', `Dataset file is ${size} bytes, above the 16 byte limit`);
    expect(jest.mocked(readFile)).not.toHaveBeenCalled();
  });

  it('reports a file: URL it cannot resolve as an io failure', async () => {
    const fetcher = new FileDatasetFetcher({ timeoutMs: 1000, maxBytes: 64 * 1024 });
    const source = 'file://mirror/var/data/targets.simple.csv';

    const error = await captureError(fetcher.fetch(source));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty('reason', 'io');
    expect(error).toHaveProperty('source', source);
    expect(error).toHaveProperty('message', expect.stringMatching(/^Could not read file:\/\/mirror\/var\/data\/targets\.simple\.csv: /));
    expect(jest.mocked(readFile)).not.toHaveBeenCalled();
  });
});

describe('DatasetSourceFetcher', () => {
  afterEach(() => {
    nock.cleanAll();
  });

  it('recognises http and https sources', () => {
    expect(isHttpSource(SOURCE)).toBe(true);
    expect(isHttpSource('HTTP://example.test/a.csv')).toBe(true);
    expect(isHttpSource('/var/data/targets.simple.csv')).toBe(false);
    expect(isHttpSource('file:///var/data/targets.simple.csv')).toBe(false);
  });

  it('routes URLs to HTTP', async () => {
    nock(ORIGIN).get(PATH).reply(200, 'id,name\n');
    const fetcher = new DatasetSourceFetcher({ timeoutMs: 200, maxBytes: 1024 });

    const body = await fetcher.fetch(SOURCE);

    expect(body.toString('utf8')).toBe('id,name\n');
  });

  it('routes other locations to the file system', async () => {
    const fetcher = new DatasetSourceFetcher({ timeoutMs: 200, maxBytes: 1024 });

    const error = await captureError(fetcher.fetch('/nonexistent/sdn/targets.simple.csv'));

    expect(error).toHaveProperty('reason', 'io');
  });
});
