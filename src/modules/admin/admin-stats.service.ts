import { Injectable, Logger } from '@nestjs/common';
import {
  COUNTER_NAMES,
  CounterSet,
  emptyCounterSet,
} from '../../app/constants';
import { CsvHeader, CsvUtils } from '../../common/utils/csv.utils';
import { CardDirectory } from '../../storage/card-directory';
import { CountersStore } from '../../storage/counters.store';

export interface CardStatsRow extends CounterSet {
  slug: string;
  display_name: string;
}

const CSV_HEADERS: CsvHeader<CardStatsRow>[] = [
  { key: 'slug', label: 'slug' },
  { key: 'display_name', label: 'display_name' },
  ...COUNTER_NAMES.map((name) => ({ key: name, label: name })),
];

@Injectable()
export class AdminStatsService {
  private readonly logger = new Logger(AdminStatsService.name);

  constructor(
    private readonly cardDirectory: CardDirectory,
    private readonly countersStore: CountersStore,
  ) {}

  /**
   * Cards in directory order, then slugs that only exist in the counters
   * file (e.g. cards removed since), sorted. Cards that fail validation keep
   * their row with a blank name.
   */
  async rows(): Promise<CardStatsRow[]> {
    const [listings, counters] = await Promise.all([
      this.cardDirectory.listCards(),
      this.countersStore.readAll(),
    ]);
    const countersFor = (slug: string): CounterSet =>
      Object.prototype.hasOwnProperty.call(counters, slug)
        ? counters[slug]
        : emptyCounterSet();

    const rows: CardStatsRow[] = listings.map((listing) => {
      if ('error' in listing) {
        this.logger.warn(
          `Listing card "${listing.slug}" without details: ${listing.error}`,
        );
        return {
          slug: listing.slug,
          display_name: '',
          ...countersFor(listing.slug),
        };
      }
      return {
        slug: listing.slug,
        display_name: listing.card.display_name,
        ...countersFor(listing.slug),
      };
    });

    const known = new Set(listings.map((listing) => listing.slug));
    const orphans = Object.keys(counters)
      .filter((slug) => !known.has(slug))
      .sort();
    for (const slug of orphans) {
      rows.push({ slug, display_name: '', ...countersFor(slug) });
    }
    return rows;
  }

  totals(rows: CardStatsRow[]): CounterSet {
    const totals = emptyCounterSet();
    for (const row of rows) {
      for (const name of COUNTER_NAMES) {
        totals[name] += row[name];
      }
    }
    return totals;
  }

  async exportCsv(): Promise<string> {
    return CsvUtils.build(CSV_HEADERS, await this.rows());
  }

  resetAll(): Promise<void> {
    return this.countersStore.reset();
  }
}
