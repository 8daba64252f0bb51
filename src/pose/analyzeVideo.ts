import { z } from 'zod';

import { SourceBuilder } from '../builder.js';
import { defaultConfig } from '../config.js';
import type { ClientConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { ApiResult } from '../result.js';
import { isRemoteUrl } from '../source.js';
import { buildEndpoint, decodeJson, FORM_URLENCODED, multipartBody } from '../transport.js';
import type { HttpRequest } from '../transport.js';

export const MAX_VIDEO_BYTES = 50 * 1024 * 1024;

const jobSchema = z.object({ job_id: z.string().min(1) });

export type AnalyzeVideoWire = z.infer<typeof jobSchema>;

export class AnalyzeVideoResult extends ApiResult<AnalyzeVideoWire> {
  constructor(readonly jobId: string) {
    super();
  }

  static fromWire(wire: AnalyzeVideoWire): AnalyzeVideoResult {
    return new AnalyzeVideoResult(wire.job_id);
  }

  toJSON(): AnalyzeVideoWire {
    return { job_id: this.jobId };
  }
}

/**
 * Submits a video for pose analysis. People are detected in every frame and
 * their key points extracted; the response only carries the job id.
 */
export class AnalyzeVideoBuilder extends SourceBuilder<AnalyzeVideoResult> {
  private applySmoothing = true;
  private callbackUrl: string | undefined;

  constructor(config: ClientConfig = defaultConfig) {
    super(config, MAX_VIDEO_BYTES);
  }

  get smoothing(): boolean {
    return this.applySmoothing;
  }

  get callback(): string | undefined {
    return this.callbackUrl;
  }

  withURL(url: string): this {
    return this.useUrl(url);
  }

  /** Opens `path` now; files above 50 MiB are refused before any request is made. */
  withFile(path: string): this {
    return this.useFile(path);
  }

  withSource(source: string): this {
    return this.useSource(source);
  }

  // Smooths key point positions between detected frames.
  setSmoothing(enabled: boolean): this {
    this.applySmoothing = enabled;
    return this;
  }

  receiveTo(callbackUrl: string): this {
    if (!isRemoteUrl(callbackUrl)) {
      throw new InvalidArgumentError(`callback ${callbackUrl} is not an http(s) URL`);
    }
    this.callbackUrl = callbackUrl;
    return this;
  }

  protected prepare(): HttpRequest {
    const source = this.requireSource();
    const options = {
      smoothing: String(this.applySmoothing),
      callback_url: this.callbackUrl,
    };

    if (source.kind === 'file') {
      return {
        method: 'POST',
        url: buildEndpoint(this.config.endpoints.pose, 'job'),
        ...multipartBody('file', source.file, options),
      };
    }
    return {
      method: 'POST',
      url: buildEndpoint(this.config.endpoints.pose, 'job', { video_url: source.url, ...options }),
      headers: { 'Content-Type': FORM_URLENCODED },
    };
  }

  protected decode(body: string): AnalyzeVideoResult {
    return AnalyzeVideoResult.fromWire(decodeJson(body, jobSchema));
  }
}

export function analyzeVideo(config: ClientConfig = defaultConfig): AnalyzeVideoBuilder {
  return new AnalyzeVideoBuilder(config);
}
