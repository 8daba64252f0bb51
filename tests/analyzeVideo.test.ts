import { fstatSync, readFileSync, truncateSync } from 'node:fs';
import path from 'node:path';
import nock from 'nock';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';

import { resolveConfig } from '../src/config.js';
import {
  DecodeError,
  InvalidArgumentError,
  IOError,
  PayloadTooLargeError,
  RequestBuildError,
  TransportError,
  TransportTimeoutError,
} from '../src/errors.js';
import { AnalyzeVideoResult, MAX_VIDEO_BYTES, analyzeVideo } from '../src/pose/analyzeVideo.js';
import type { LocalFile } from '../src/source.js';
import { requestOf, stubFetch, tempDir, tempFile } from './helpers.js';

const jobBody = JSON.stringify({ job_id: 'job-1' });

function attachedFile(builder: ReturnType<typeof analyzeVideo>): LocalFile {
  const source = builder.source;
  if (source?.kind !== 'file') {
    throw new Error('expected a local file source');
  }
  return source.file;
}

describe('analyzeVideo configuration', () => {
  it('starts with smoothing on and no source', () => {
    const builder = analyzeVideo();

    expect(builder.smoothing).toBe(true);
    expect(builder.callback).toBeUndefined();
    expect(builder.source).toBeUndefined();
  });

  it('refuses files above 50 MiB before any request', async () => {
    const fetchMock = stubFetch(jobBody);
    const filePath = tempFile('large.mp4', '');
    truncateSync(filePath, MAX_VIDEO_BYTES + 1);
    const builder = analyzeVideo(resolveConfig({ fetchImpl: fetchMock }));

    expect(() => builder.withFile(filePath)).toThrow(PayloadTooLargeError);
    expect(builder.source).toBeUndefined();
    await expect(builder.collect()).rejects.toThrow(RequestBuildError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('accepts a file of exactly 50 MiB', () => {
    const filePath = tempFile('limit.mp4', '');
    truncateSync(filePath, MAX_VIDEO_BYTES);

    const file = attachedFile(analyzeVideo().withFile(filePath));

    expect(file.size).toBe(MAX_VIDEO_BYTES);
    file.close();
  });

  it('keeps the previous source when a file cannot be opened', () => {
    const builder = analyzeVideo().withURL('https://example.com/v.mp4');

    expect(() => builder.withFile(path.join(tempDir(), 'missing.mp4'))).toThrow(IOError);
    expect(builder.source).toEqual({ kind: 'url', url: 'https://example.com/v.mp4' });
  });

  it('releases an attached file when a URL replaces it', () => {
    const builder = analyzeVideo().withFile(tempFile('clip.mp4', 'video-bytes'));
    const file = attachedFile(builder);

    builder.withURL('https://example.com/v.mp4');

    expect(file.closed).toBe(true);
    expect(builder.source).toEqual({ kind: 'url', url: 'https://example.com/v.mp4' });
  });

  it('classifies a source string', () => {
    const builder = analyzeVideo().withSource('https://example.com/v.mp4');
    expect(builder.source?.kind).toBe('url');

    builder.withSource(tempFile('clip.mp4', 'video-bytes'));
    attachedFile(builder).close();
  });

  it('rejects malformed URLs', () => {
    expect(() => analyzeVideo().withURL('example.com/v.mp4')).toThrow(InvalidArgumentError);
    expect(() => analyzeVideo().receiveTo('callback')).toThrow(InvalidArgumentError);
  });
});

describe('analyzeVideo collect', () => {
  it('sends a video URL in the query string', async () => {
    const fetchMock = stubFetch(jobBody);
    const config = resolveConfig({ key: 'test-secret', fetchImpl: fetchMock });

    const result = await analyzeVideo(config)
      .withURL('https://example.com/v.mp4')
      .setSmoothing(false)
      .receiveTo('https://example.com/done')
      .collect();

    const request = requestOf(fetchMock);
    expect(request.method).toBe('POST');
    expect(request.url).toBe(
      'https://cv-api.kakaobrain.com/pose/job?video_url=https%3A%2F%2Fexample.com%2Fv.mp4&smoothing=false&callback_url=https%3A%2F%2Fexample.com%2Fdone',
    );
    expect(request.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(request.headers.get('authorization')).toBe('KakaoAK test-secret');
    expect(result).toEqual(new AnalyzeVideoResult('job-1'));
    expect(result.jobId).toBe('job-1');
  });

  it('requires a source', async () => {
    await expect(analyzeVideo().collect()).rejects.toThrow(/a URL or local file source is required/);
  });

  it('closes the file when decoding fails', async () => {
    const config = resolveConfig({ fetchImpl: stubFetch('{"job":1}') });
    const builder = analyzeVideo(config).withFile(tempFile('clip.mp4', 'video-bytes'));

    await expect(builder.collect()).rejects.toThrow(DecodeError);
    expect(attachedFile(builder).closed).toBe(true);
  });

  it('refuses to send a consumed file twice', async () => {
    const fetchMock = stubFetch(jobBody);
    const builder = analyzeVideo(resolveConfig({ fetchImpl: fetchMock })).withFile(tempFile('clip.mp4', 'video'));

    await builder.collect();

    await expect(builder.collect()).rejects.toThrow(RequestBuildError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('uploads an empty file', async () => {
    const fetchMock = stubFetch(jobBody);
    const builder = analyzeVideo(resolveConfig({ fetchImpl: fetchMock })).withFile(tempFile('empty.mp4', ''));

    const result = await builder.collect();

    expect(result.jobId).toBe('job-1');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestOf(fetchMock).headers.get('content-type')).toMatch(/^multipart\/form-data; boundary=/);
    expect(attachedFile(builder).closed).toBe(true);
  });

  it('stops the upload stream before closing the file', async () => {
    const builder = analyzeVideo(resolveConfig({ fetchImpl: stubFetch(jobBody) })).withFile(
      tempFile('clip.mp4', 'video-bytes'),
    );
    const file = attachedFile(builder);
    const stream = vi.spyOn(file, 'stream');

    await builder.collect();

    expect(stream).toHaveBeenCalledTimes(1);
    const reader = stream.mock.results[0]?.value;
    expect(reader?.destroyed).toBe(true);
    expect(() => fstatSync(file.fd)).toThrow(/EBADF/);
  });

  it('does not leak descriptors across sequential calls', async () => {
    const config = resolveConfig({ fetchImpl: stubFetch(jobBody) });
    const filePath = tempFile('clip.mp4', 'video-bytes');

    for (let i = 0; i < 1000; i += 1) {
      const builder = analyzeVideo(config).withFile(filePath);
      const file = attachedFile(builder);
      await builder.collect();
      expect(file.closed).toBe(true);
      expect(() => fstatSync(file.fd)).toThrow(/EBADF/);
    }
  });
});

describe('analyzeVideo over HTTP', () => {
  const origin = 'https://cv-api.kakaobrain.com';

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('streams a local file as multipart form data', async () => {
    let received = '';
    const scope = nock(origin)
      .post('/pose/job', (body: string) => {
        received = body;
        return true;
      })
      .matchHeader('content-type', /^multipart\/form-data; boundary=-+\d+$/)
      .matchHeader('authorization', 'KakaoAK test-secret')
      .reply(200, { job_id: 'job-2' });

    const builder = analyzeVideo().authorizeWith('test-secret').withFile(tempFile('clip.mp4', 'video-bytes'));
    const result = await builder.collect();

    expect(scope.isDone()).toBe(true);
    expect(result.jobId).toBe('job-2');
    expect(received).toContain('Content-Disposition: form-data; name="file"; filename="clip.mp4"');
    expect(received).toContain('video-bytes');
    expect(received).toContain('Content-Disposition: form-data; name="smoothing"\r\n\r\ntrue');
    expect(received).not.toContain('name="callback_url"');
    expect(attachedFile(builder).closed).toBe(true);
  });

  it('closes the file when the connection fails', async () => {
    nock(origin).post('/pose/job').replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    const builder = analyzeVideo().withFile(tempFile('clip.mp4', 'video-bytes'));

    await expect(builder.collect()).rejects.toThrow(TransportError);
    expect(attachedFile(builder).closed).toBe(true);
  });

  it('applies the configured deadline', async () => {
    nock(origin).post('/pose/job').query(true).delay(1000).reply(200, { job_id: 'late' });

    const builder = analyzeVideo(resolveConfig({ timeoutMs: 20 })).withURL('https://example.com/v.mp4');

    await expect(builder.collect()).rejects.toBeInstanceOf(TransportTimeoutError);
  });
});

describe('AnalyzeVideoResult', () => {
  it('persists the job id as json', async () => {
    const target = path.join(tempDir(), 'job.json');

    await new AnalyzeVideoResult('job-3').saveAs(target);

    expect(readFileSync(target, 'utf-8')).toBe('{\n  "job_id": "job-3"\n}');
  });

  it('has no xml form', async () => {
    await expect(new AnalyzeVideoResult('job-3').saveAs(path.join(tempDir(), 'job.xml'))).rejects.toThrow(
      /extension must be one of json/,
    );
  });
});
