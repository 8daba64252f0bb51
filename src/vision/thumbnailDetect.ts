import { z } from 'zod';

import { SourceBuilder } from '../builder.js';
import { defaultConfig } from '../config.js';
import type { ClientConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { ApiResult } from '../result.js';
import { buildEndpoint, decodeJson, FORM_URLENCODED, multipartBody } from '../transport.js';
import type { HttpRequest } from '../transport.js';

const box = {
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
};

const detectSchema = z.object({
  rid: z.string(),
  result: z.object({
    width: z.number().int(),
    height: z.number().int(),
    thumbnail: z.object(box),
  }),
});

export type ThumbnailDetectWire = z.infer<typeof detectSchema>;

/** Origin and size of the detected thumbnail area. */
export interface Thumbnail {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ThumbnailRegion {
  width: number;
  height: number;
  thumbnail: Thumbnail;
}

export class ThumbnailDetectResult extends ApiResult<ThumbnailDetectWire> {
  constructor(
    readonly rid: string,
    readonly result: ThumbnailRegion,
  ) {
    super();
  }

  static fromWire(wire: ThumbnailDetectWire): ThumbnailDetectResult {
    return new ThumbnailDetectResult(wire.rid, {
      width: wire.result.width,
      height: wire.result.height,
      thumbnail: { ...wire.result.thumbnail },
    });
  }

  toJSON(): ThumbnailDetectWire {
    return {
      rid: this.rid,
      result: {
        width: this.result.width,
        height: this.result.height,
        thumbnail: { ...this.result.thumbnail },
      },
    };
  }
}

/**
 * Detects the representative area of an image for cropping a thumbnail at the
 * requested width:height ratio.
 */
export class ThumbnailDetectBuilder extends SourceBuilder<ThumbnailDetectResult> {
  private widthRatio: number | undefined;
  private heightRatio: number | undefined;

  constructor(source: string, config: ClientConfig = defaultConfig) {
    super(config);
    this.useSource(source);
  }

  get width(): number | undefined {
    return this.widthRatio;
  }

  get height(): number | undefined {
    return this.heightRatio;
  }

  widthTo(ratio: number): this {
    this.widthRatio = requireRatio('width', ratio);
    return this;
  }

  heightTo(ratio: number): this {
    this.heightRatio = requireRatio('height', ratio);
    return this;
  }

  protected prepare(): HttpRequest {
    const source = this.requireSource();
    const ratios = {
      width: this.widthRatio === undefined ? undefined : String(this.widthRatio),
      height: this.heightRatio === undefined ? undefined : String(this.heightRatio),
    };

    if (source.kind === 'file') {
      return {
        method: 'POST',
        url: buildEndpoint(this.config.endpoints.vision, 'thumbnail/detect'),
        ...multipartBody('image', source.file, ratios),
      };
    }
    return {
      method: 'POST',
      url: buildEndpoint(this.config.endpoints.vision, 'thumbnail/detect', { image_url: source.url, ...ratios }),
      headers: { 'Content-Type': FORM_URLENCODED },
    };
  }

  protected decode(body: string): ThumbnailDetectResult {
    return ThumbnailDetectResult.fromWire(decodeJson(body, detectSchema));
  }
}

function requireRatio(name: 'width' | 'height', ratio: number): number {
  if (!Number.isInteger(ratio) || ratio <= 0) {
    throw new InvalidArgumentError(`${name} ratio must be a positive integer, got ${ratio}`);
  }
  return ratio;
}

/** Classifies `source` right away, so an unreadable local path throws here. */
export function thumbnailDetect(source: string, config: ClientConfig = defaultConfig): ThumbnailDetectBuilder {
  return new ThumbnailDetectBuilder(source, config);
}
