import { Logger } from '@nestjs/common';

import { formatKey } from './auth.js';
import type { ClientConfig } from './config.js';
import { InvalidArgumentError, PayloadTooLargeError, RequestBuildError } from './errors.js';
import { LocalFile, classifySource, isRemoteUrl } from './source.js';
import type { Source } from './source.js';
import { execute } from './transport.js';
import type { HttpRequest } from './transport.js';

/**
 * Shared lifecycle of every capability: setters mutate the builder, `collect`
 * reads it, sends one request and decodes the body.
 */
export abstract class RequestBuilder<TResult> {
  protected readonly logger = new Logger(this.constructor.name);
  private authKey: string;

  protected constructor(protected readonly config: ClientConfig) {
    this.authKey = formatKey(config.key, config.keyPrefix);
  }

  get authorization(): string {
    return this.authKey;
  }

  authorizeWith(key: string): this {
    this.authKey = formatKey(key, this.config.keyPrefix);
    return this;
  }

  async collect(): Promise<TResult> {
    try {
      const request = this.prepare();
      this.logger.debug(`${request.method} ${request.url}`);
      const body = await execute(request, this.authKey, this.config);
      return this.decode(body);
    } finally {
      this.release();
    }
  }

  protected abstract prepare(): HttpRequest;

  protected abstract decode(body: string): TResult;

  protected release(): void {}
}

/** A builder whose input is either a remote URL or a local file it owns. */
export abstract class SourceBuilder<TResult> extends RequestBuilder<TResult> {
  private current: Source | undefined;

  protected constructor(
    config: ClientConfig,
    private readonly maxUploadBytes: number = Number.POSITIVE_INFINITY,
  ) {
    super(config);
  }

  get source(): Source | undefined {
    return this.current;
  }

  protected useUrl(url: string): this {
    if (!isRemoteUrl(url)) {
      throw new InvalidArgumentError(`${url} is not an http(s) URL`);
    }
    this.replace({ kind: 'url', url });
    return this;
  }

  protected useFile(path: string): this {
    const file = LocalFile.open(path);
    this.checkSize(file);
    this.replace({ kind: 'file', file });
    return this;
  }

  protected useSource(value: string): this {
    const source = classifySource(value);
    if (source.kind === 'file') {
      this.checkSize(source.file);
    }
    this.replace(source);
    return this;
  }

  /** Returns the active source, refusing a file an earlier collect already sent. */
  protected requireSource(): Source {
    const source = this.current;
    if (!source) {
      throw new RequestBuildError('a URL or local file source is required');
    }
    if (source.kind === 'file' && source.file.closed) {
      throw new RequestBuildError(`${source.file.path} was already consumed by a previous request`);
    }
    return source;
  }

  protected override release(): void {
    if (this.current?.kind === 'file') {
      this.current.file.close();
    }
  }

  private checkSize(file: LocalFile): void {
    if (file.size > this.maxUploadBytes) {
      file.close();
      throw new PayloadTooLargeError(file.path, file.size, this.maxUploadBytes);
    }
  }

  private replace(next: Source): void {
    const previous = this.current;
    if (previous?.kind === 'file' && !previous.file.closed) {
      this.logger.warn(`releasing ${previous.file.path} replaced by a new source`);
      previous.file.close();
    }
    this.current = next;
  }
}
