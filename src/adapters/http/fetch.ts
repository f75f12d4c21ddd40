import fs from 'fs/promises';
import path from 'path';

export type FetchFn = typeof fetch;

export class HttpStatusError extends Error {
  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export async function getJson(
  fetchFn: FetchFn,
  url: string,
  options: { headers?: Record<string, string>; timeoutMs: number }
): Promise<{ status: number; body: unknown }> {
  const res = await fetchFn(url, {
    method: 'GET',
    headers: { Accept: 'application/json', ...options.headers },
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!res.ok) {
    await res.body?.cancel();
    return { status: res.status, body: null };
  }
  return { status: res.status, body: await res.json() };
}

// Writes the response body to filePath, creating the directory first.
export async function downloadToFile(
  fetchFn: FetchFn,
  url: string,
  filePath: string,
  options: { headers?: Record<string, string>; timeoutMs: number }
): Promise<void> {
  const res = await fetchFn(url, {
    headers: options.headers,
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!res.ok) {
    await res.body?.cancel();
    throw new HttpStatusError(res.status, url);
  }
  const body = Buffer.from(await res.arrayBuffer());
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, body);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function mediaBaseName(word: string): string {
  return word
    .trim()
    .replace(/[\\/:*?"<>|]/g, '_')
    .replace(/\s+/g, ' ');
}
