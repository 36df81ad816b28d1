import { Injectable } from '@nestjs/common';
import { CounterName } from '../../app/constants';
import { CountersStore } from '../../storage/counters.store';
import { CardsService } from '../cards/cards.service';
import { CardRecordDto } from '../cards/dto/card-record.dto';

export interface TrackedClick {
  card: CardRecordDto;
  count: number;
}

export function whatsappUrl(card: CardRecordDto, text?: string): string {
  const base = `https://wa.me/${card.whatsapp_e164}`;
  return text ? `${base}?text=${encodeURIComponent(text)}` : base;
}

export function mailtoUrl(card: CardRecordDto, subject?: string): string {
  const base = `mailto:${card.email}`;
  return subject ? `${base}?subject=${encodeURIComponent(subject)}` : base;
}

export function mapUrl(card: CardRecordDto): string {
  const query =
    card.maps_destination ?? encodeURIComponent(card.address_display ?? '');
  return `https://www.google.com/maps/search/?api=1&query=${query}`;
}

@Injectable()
export class TrackingService {
  constructor(
    private readonly cardsService: CardsService,
    private readonly countersStore: CountersStore,
  ) {}

  /**
   * Counts one action for an existing card. Unknown slugs throw before
   * anything is written.
   */
  async track(slug: string, counter: CounterName): Promise<TrackedClick> {
    const card = await this.cardsService.findOne(slug);
    const count = await this.countersStore.increment(slug, counter);
    return { card, count };
  }
}
