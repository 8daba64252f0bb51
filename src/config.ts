import fetch from 'node-fetch';
import { z } from 'zod';

import { DEFAULT_KEY_PREFIX } from './auth.js';
import { InvalidArgumentError } from './errors.js';

export type FetchLike = typeof fetch;

export const endpointsSchema = z.object({
  local: z.string().url(),
  vision: z.string().url(),
  pose: z.string().url(),
});

export const clientConfigSchema = z.object({
  keyPrefix: z.string().min(1),
  key: z.string(),
  endpoints: endpointsSchema,
  timeoutMs: z.number().int().positive().optional(),
});

export type Endpoints = z.infer<typeof endpointsSchema>;

export type ClientConfig = z.infer<typeof clientConfigSchema> & {
  fetchImpl: FetchLike;
};

export interface ClientConfigInput {
  keyPrefix?: string;
  key?: string;
  endpoints?: Partial<Endpoints>;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const defaults = {
  keyPrefix: DEFAULT_KEY_PREFIX,
  key: '',
  endpoints: {
    local: 'https://dapi.kakao.com/v2/local',
    vision: 'https://dapi.kakao.com/v2/vision',
    pose: 'https://cv-api.kakaobrain.com/pose',
  },
} as const;

export const resolveConfig = (partial: ClientConfigInput = {}): ClientConfig => {
  const merged = {
    keyPrefix: partial.keyPrefix ?? defaults.keyPrefix,
    key: partial.key ?? defaults.key,
    endpoints: {
      local: partial.endpoints?.local ?? defaults.endpoints.local,
      vision: partial.endpoints?.vision ?? defaults.endpoints.vision,
      pose: partial.endpoints?.pose ?? defaults.endpoints.pose,
    },
    timeoutMs: partial.timeoutMs,
  };

  const parsed = clientConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidArgumentError(`invalid client configuration: ${detail}`, { cause: parsed.error });
  }

  return { ...parsed.data, fetchImpl: partial.fetchImpl ?? fetch };
};

/** Resolved once on load; factories receive it explicitly unless given their own config. */
export const defaultConfig: ClientConfig = resolveConfig();
