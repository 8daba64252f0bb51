import { resolveConfig } from './config.js';
import type { ClientConfig, ClientConfigInput } from './config.js';
import { CoordToDistrictBuilder } from './local/coordToDistrict.js';
import { AnalyzeVideoBuilder } from './pose/analyzeVideo.js';
import { ThumbnailDetectBuilder } from './vision/thumbnailDetect.js';

export interface KakaoClient {
  readonly config: ClientConfig;
  coordToDistrict(x: number, y: number): CoordToDistrictBuilder;
  analyzeVideo(): AnalyzeVideoBuilder;
  thumbnailDetect(source: string): ThumbnailDetectBuilder;
}

/** Resolves `options` once and hands the same config to every builder. */
export function createClient(options: ClientConfigInput = {}): KakaoClient {
  const config = resolveConfig(options);
  return {
    config,
    coordToDistrict: (x, y) => new CoordToDistrictBuilder(x, y, config),
    analyzeVideo: () => new AnalyzeVideoBuilder(config),
    thumbnailDetect: (source) => new ThumbnailDetectBuilder(source, config),
  };
}
