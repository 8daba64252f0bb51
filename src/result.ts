import { writeFile } from 'node:fs/promises';

import { UnsupportedFormatError } from './errors.js';

export type SaveFormat = 'json' | 'xml';

export function extensionOf(filename: string): string {
  const parts = filename.split('.');
  return parts[parts.length - 1];
}

export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Decoded response of one capability. `toJSON` yields the wire schema, which is
 * also what gets persisted.
 */
export abstract class ApiResult<TWire> {
  abstract toJSON(): TWire;

  toString(): string {
    return toPrettyJson(this.toJSON());
  }

  /** Writes the result to `filename`, choosing the serializer from its extension. */
  async saveAs(filename: string): Promise<void> {
    const serializers = this.serializers();
    const extension = extensionOf(filename);
    const serialize = isSaveFormat(extension) ? serializers[extension] : undefined;
    if (!serialize) {
      throw new UnsupportedFormatError(filename, Object.keys(serializers));
    }
    await writeFile(filename, serialize(), { mode: 0o644 });
  }

  protected serializers(): Partial<Record<SaveFormat, () => string>> {
    return { json: () => toPrettyJson(this.toJSON()) };
  }
}

function isSaveFormat(value: string): value is SaveFormat {
  return value === 'json' || value === 'xml';
}
