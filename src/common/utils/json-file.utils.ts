import * as fs from 'fs/promises';
import * as path from 'path';

export type JsonObject = Record<string, unknown>;

export type JsonObjectReadResult =
  | { status: 'missing' }
  | { status: 'invalid'; reason: string }
  | { status: 'ok'; value: JsonObject };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonFileUtils {
  /**
   * Reads a file expected to hold a single JSON object.
   * A missing file and a file that is not a JSON object are reported, not thrown;
   * other I/O errors propagate.
   */
  static async readObject(filePath: string): Promise<JsonObjectReadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (JsonFileUtils.isNotFound(error)) {
        return { status: 'missing' };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { status: 'invalid', reason };
    }

    if (!isJsonObject(parsed)) {
      return { status: 'invalid', reason: 'top-level value is not an object' };
    }
    return { status: 'ok', value: parsed };
  }

  /**
   * Writes to a temporary sibling and renames it over the target, so readers
   * never see a half-written document.
   */
  static async writeAtomic(filePath: string, data: unknown): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}.tmp`,
    );
    try {
      await fs.writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  static isNotFound(error: unknown): boolean {
    // fs errors can come from another realm, where instanceof Error is false
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'ENOENT'
    );
  }
}
