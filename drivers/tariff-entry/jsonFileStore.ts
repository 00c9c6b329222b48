import fs from 'fs';
import path from 'path';
import type { z } from 'zod';
import type { Logger } from '../../logic/utils/logger';
import { extractErrorMessage } from '../../logic/utils/errorUtils';

/**
 * JSON document on disk, validated with a zod schema on every load.
 * A missing or corrupt file loads as undefined so callers start fresh.
 */
export class JsonFileStore<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<T | undefined> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        this.logger.log(`[STORE] No stored data at ${this.filePath}, starting fresh`);
      } else {
        this.logger.error(`[STORE] Could not read ${this.filePath}, starting fresh:`, extractErrorMessage(error));
      }
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error: unknown) {
      this.logger.error(`[STORE] ${this.filePath} is not valid JSON, starting fresh:`, extractErrorMessage(error));
      return undefined;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error(`[STORE] ${this.filePath} has an unexpected shape, starting fresh:`, parsed.error.message);
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Write the document atomically (temp file + rename)
   * @throws when the directory or file cannot be written
   */
  async save(value: T): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await fs.promises.rename(tempPath, this.filePath);
  }
}
