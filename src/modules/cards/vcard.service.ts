import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { AppConfigService } from '../../app/configs/app-config.service';
import { CardRecordDto } from './dto/card-record.dto';

export interface VcardFile {
  filename: string;
  body: string;
}

const CRLF = '\r\n';

/**
 * vCard 3.0 text escaping for property values.
 */
export function escapeVcardText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\r\n|\r|\n/g, '\\n')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,');
}

export function vcardFilename(slug: string): string {
  return `${slug.replace(/[\\/]/g, '')}.vcf`;
}

function splitName(card: CardRecordDto): { first: string; last: string } {
  if (card.first_name !== undefined || card.last_name !== undefined) {
    return { first: card.first_name ?? '', last: card.last_name ?? '' };
  }
  const parts = card.display_name.trim().split(/\s+/);
  if (parts.length < 2) return { first: parts[0] ?? '', last: '' };
  return { first: parts.slice(0, -1).join(' '), last: parts[parts.length - 1] };
}

function addressLine(card: CardRecordDto): string | null {
  if (card.address) {
    const { street, city, region, postal_code, country } = card.address;
    const parts = ['', '', street, city, region, postal_code, country].map(
      (part) => escapeVcardText(part ?? ''),
    );
    return `ADR;TYPE=WORK:${parts.join(';')}`;
  }
  if (card.address_display) {
    return `ADR;TYPE=WORK:;;${escapeVcardText(card.address_display)};;;;`;
  }
  return null;
}

@Injectable()
export class VcardService {
  private readonly logger = new Logger(VcardService.name);

  constructor(private readonly appConfigService: AppConfigService) {}

  /**
   * Field order is fixed; some contact importers depend on it.
   */
  async build(card: CardRecordDto): Promise<VcardFile> {
    const { first, last } = splitName(card);

    const lines = [
      'BEGIN:VCARD',
      'VERSION:3.0',
      `N:${escapeVcardText(last)};${escapeVcardText(first)};;;`,
      `FN:${escapeVcardText(card.save_as ?? card.display_name)}`,
      `ORG:${escapeVcardText(card.org)}`,
      `TITLE:${escapeVcardText(card.title)}`,
      `TEL;TYPE=CELL,VOICE:+${card.whatsapp_e164}`,
      `TEL;TYPE=WORK,VOICE:+${card.office_e164}`,
      `EMAIL;TYPE=WORK:${card.email}`,
      `URL:${card.website_url}`,
    ];

    const adr = addressLine(card);
    if (adr) lines.push(adr);

    const photo = await this.loadPhoto(card);
    if (photo) {
      lines.push(`PHOTO;ENCODING=b;TYPE=${photo.type}:${photo.base64}`);
    }

    if (card.note) lines.push(`NOTE:${escapeVcardText(card.note)}`);

    lines.push('END:VCARD', '');

    return { filename: vcardFilename(card.slug), body: lines.join(CRLF) };
  }

  private async loadPhoto(
    card: CardRecordDto,
  ): Promise<{ type: 'PNG' | 'JPEG'; base64: string } | null> {
    if (!card.photo) return null;

    const photoPath = path.join(
      this.appConfigService.staticDir,
      path.basename(card.photo),
    );
    try {
      const data = await fs.readFile(photoPath);
      const type = path.extname(photoPath).toLowerCase() === '.png' ? 'PNG' : 'JPEG';
      return { type, base64: data.toString('base64') };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Photo for card "${card.slug}" unavailable, omitting it: ${reason}`,
      );
      return null;
    }
  }
}
