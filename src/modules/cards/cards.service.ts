import { Injectable, NotFoundException } from '@nestjs/common';
import { CardDirectory } from '../../storage/card-directory';
import { CardRecordDto } from './dto/card-record.dto';

@Injectable()
export class CardsService {
  constructor(private readonly directory: CardDirectory) {}

  async findOne(slug: string): Promise<CardRecordDto> {
    const card = await this.directory.getCard(slug);
    if (!card) {
      throw new NotFoundException(`Card "${slug}" not found`);
    }
    return card;
  }

  async findDefaultSlug(): Promise<string> {
    const slug = await this.directory.getDefaultSlug();
    if (!slug) {
      throw new NotFoundException('No cards are configured');
    }
    return slug;
  }
}
