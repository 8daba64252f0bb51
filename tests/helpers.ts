import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Headers, Response } from 'node-fetch';
import { vi } from 'vitest';

import type { FetchLike } from '../src/config.js';

export function loadFixture(fileName: string): string {
  return readFileSync(new URL(`./fixtures/${fileName}`, import.meta.url), 'utf-8');
}

export function tempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'kakao-client-'));
}

export function tempFile(name: string, content: string | Buffer): string {
  const filePath = path.join(tempDir(), name);
  writeFileSync(filePath, content);
  return filePath;
}

/** A fetch stand-in that answers every call with a fresh copy of `body`. */
export const stubFetch = (body: string, status = 200) =>
  vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(
    async () =>
      new Response(body, {
        status,
        headers: { 'Content-Type': 'application/json' },
      }),
  );

export type FetchMock = ReturnType<typeof stubFetch>;

export function requestOf(fetchMock: FetchMock, index = 0): { url: string; method: string; headers: Headers } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} times`);
  }
  const [url, init] = call;
  return {
    url: url.toString(),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
  };
}
