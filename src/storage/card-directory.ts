import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import * as fs from 'fs/promises';
import {
  isJsonObject,
  JsonFileUtils,
  JsonObject,
} from '../common/utils/json-file.utils';
import { CardRecordDto } from '../modules/cards/dto/card-record.dto';

export class CardDirectoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CardDirectoryError';
  }
}

export type CardListing =
  | { slug: string; card: CardRecordDto }
  | { slug: string; error: string };

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const field = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${field}: ${constraint}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], `${field}.`)];
  });
}

/**
 * Read-only view over the cards document (slug → record).
 * The file is re-read on every call so manual edits show up immediately.
 */
export class CardDirectory {
  private readonly logger = new Logger(CardDirectory.name);

  constructor(
    private readonly filePath: string,
    private readonly configuredDefaultSlug?: string,
  ) {}

  get path(): string {
    return this.filePath;
  }

  async assertReadable(): Promise<void> {
    try {
      await fs.access(this.filePath, fs.constants.R_OK);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CardDirectoryError(
        `Cards file ${this.filePath} is not readable: ${reason}`,
      );
    }
    this.logger.log(`Serving cards from ${this.filePath}`);
  }

  async getCard(slug: string): Promise<CardRecordDto | undefined> {
    const document = await this.load();
    if (!Object.prototype.hasOwnProperty.call(document, slug)) {
      return undefined;
    }
    return this.toRecord(slug, document[slug]);
  }

  async getDefaultSlug(): Promise<string | undefined> {
    if (this.configuredDefaultSlug) return this.configuredDefaultSlug;
    const document = await this.load();
    return Object.keys(document)[0];
  }

  /**
   * Every slug in file order. A record that fails validation is listed with
   * its error instead of failing the whole listing.
   */
  async listCards(): Promise<CardListing[]> {
    const document = await this.load();
    return Object.entries(document).map(([slug, raw]): CardListing => {
      try {
        return { slug, card: this.toRecord(slug, raw) };
      } catch (error) {
        if (error instanceof CardDirectoryError) {
          return { slug, error: error.message };
        }
        throw error;
      }
    });
  }

  private async load(): Promise<JsonObject> {
    const result = await JsonFileUtils.readObject(this.filePath);
    switch (result.status) {
      case 'missing':
        throw new CardDirectoryError(`Cards file ${this.filePath} not found`);
      case 'invalid':
        throw new CardDirectoryError(
          `Cards file ${this.filePath} is not a JSON object: ${result.reason}`,
        );
      case 'ok':
        return result.value;
    }
  }

  private toRecord(slug: string, raw: unknown): CardRecordDto {
    if (!isJsonObject(raw)) {
      throw new CardDirectoryError(`Card "${slug}" is not an object`);
    }

    const record = plainToInstance(CardRecordDto, { ...raw, slug });
    const errors = flattenErrors(validateSync(record));
    if (errors.length > 0) {
      throw new CardDirectoryError(
        `Card "${slug}" is invalid: ${errors.join('; ')}`,
      );
    }
    return record;
  }
}
