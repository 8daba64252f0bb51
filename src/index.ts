export { AUTHORIZATION, DEFAULT_KEY_PREFIX, formatKey } from './auth.js';
export { RequestBuilder, SourceBuilder } from './builder.js';
export { createClient } from './client.js';
export type { KakaoClient } from './client.js';
export { defaultConfig, resolveConfig } from './config.js';
export type { ClientConfig, ClientConfigInput, Endpoints, FetchLike } from './config.js';
export * from './errors.js';
export * from './local/coordToDistrict.js';
export * from './pose/analyzeVideo.js';
export { ApiResult } from './result.js';
export type { SaveFormat } from './result.js';
export { LocalFile, classifySource, isRemoteUrl } from './source.js';
export type { Source } from './source.js';
export * from './vision/thumbnailDetect.js';
