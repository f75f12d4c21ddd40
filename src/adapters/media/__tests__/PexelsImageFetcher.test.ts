import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { NoopImageFetcher } from '../NoopImageFetcher';
import { PexelsImageFetcher, imageExtension } from '../PexelsImageFetcher';
import { createFakeFetch, createMockLogger } from '../../../test/mocks';

const BASE_URL = 'https://pexels.test/v1';

const searchResult = {
  photos: [{ src: { medium: 'https://images.test/photos/1/absorb.jpeg?auto=compress&h=350' } }],
};

describe('imageExtension', () => {
  it.each([
    ['https://images.test/a.jpeg?auto=compress', '.jpg'],
    ['https://images.test/a.JPG', '.jpg'],
    ['https://images.test/a.png', '.png'],
    ['https://images.test/a.webp?w=10', '.webp'],
    ['https://images.test/a', '.jpg'],
  ])('picks the extension of %s', (url, expected) => {
    expect(imageExtension(url)).toBe(expected);
  });
});

describe('PexelsImageFetcher', () => {
  let dir: string;
  const logger = createMockLogger();

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'images-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
    jest.clearAllMocks();
  });

  it('searches and downloads the first photo', async () => {
    const fetchFn = createFakeFetch([
      [`${BASE_URL}/search`, { json: searchResult }],
      ['https://images.test/', { body: new Uint8Array([9, 8]) }],
    ]);
    const fetcher = new PexelsImageFetcher('test-key', logger, { baseUrl: BASE_URL, fetchFn });

    const outcome = await fetcher.fetchImage('absorb', dir);

    expect(outcome).toEqual({ status: 'found', value: 'absorb_auto_tool.jpg' });
    expect(fetchFn.mock.calls[0][0]).toBe(`${BASE_URL}/search?query=absorb&per_page=1&orientation=square`);
    expect(fetchFn.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'test-key' });
    expect([...(await fs.readFile(path.join(dir, 'absorb_auto_tool.jpg')))]).toEqual([9, 8]);
  });

  it('reuses an image that is already there', async () => {
    await fs.writeFile(path.join(dir, 'absorb_auto_tool.jpg'), 'old');
    const fetchFn = createFakeFetch([[`${BASE_URL}/search`, { json: searchResult }]]);
    const fetcher = new PexelsImageFetcher('test-key', logger, { baseUrl: BASE_URL, fetchFn });

    expect(await fetcher.fetchImage('absorb', dir)).toEqual({ status: 'found', value: 'absorb_auto_tool.jpg' });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('is absent when the search has no photos', async () => {
    const fetchFn = createFakeFetch([[`${BASE_URL}/search`, { json: { photos: [] } }]]);
    const fetcher = new PexelsImageFetcher('test-key', logger, { baseUrl: BASE_URL, fetchFn });

    expect(await fetcher.fetchImage('qwertyuiop', dir)).toEqual({
      status: 'absent',
      reason: "no images found for 'qwertyuiop'",
    });
  });

  it('reports the rate limit as failed', async () => {
    const fetchFn = createFakeFetch([[`${BASE_URL}/search`, { status: 429 }]]);
    const fetcher = new PexelsImageFetcher('test-key', logger, { baseUrl: BASE_URL, fetchFn });

    expect(await fetcher.fetchImage('absorb', dir)).toEqual({
      status: 'failed',
      error: "Pexels rate limit hit for 'absorb'",
    });
  });

  it('reports a failed image download', async () => {
    const fetchFn = createFakeFetch([
      [`${BASE_URL}/search`, { json: searchResult }],
      ['https://images.test/', { status: 503 }],
    ]);
    const fetcher = new PexelsImageFetcher('test-key', logger, { baseUrl: BASE_URL, fetchFn });

    const outcome = await fetcher.fetchImage('absorb', dir);

    expect(outcome).toEqual({
      status: 'failed',
      error: 'HTTP 503 for https://images.test/photos/1/absorb.jpeg?auto=compress&h=350',
    });
  });
});

describe('NoopImageFetcher', () => {
  it('never finds an image', async () => {
    expect(await new NoopImageFetcher().fetchImage('absorb', 'images')).toEqual({
      status: 'absent',
      reason: 'image search not configured',
    });
  });
});
