import { Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import {
  COUNTER_NAMES,
  CounterName,
  CounterSet,
  emptyCounterSet,
  isCounterName,
} from '../app/constants';
import {
  isJsonObject,
  JsonFileUtils,
  JsonObject,
} from '../common/utils/json-file.utils';

type CountersDocument = Record<string, CounterSet>;

function entryFor(document: CountersDocument, slug: string): CounterSet {
  return Object.prototype.hasOwnProperty.call(document, slug)
    ? document[slug]
    : emptyCounterSet();
}

function toCounterSet(raw: unknown): CounterSet {
  const counters = emptyCounterSet();
  if (!isJsonObject(raw)) return counters;
  for (const name of COUNTER_NAMES) {
    const value = raw[name];
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      counters[name] = value;
    }
  }
  return counters;
}

/**
 * Per-slug click counters persisted as one JSON document.
 *
 * Every operation is queued behind the previous one, so read-modify-write
 * cycles from concurrent requests in this process never interleave. Other
 * processes writing the same file are not coordinated.
 */
export class CountersStore {
  private readonly logger = new Logger(CountersStore.name);
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly legacySlug?: string,
  ) {}

  get path(): string {
    return this.filePath;
  }

  increment(slug: string, counter: CounterName): Promise<number> {
    return this.exclusive(async () => {
      const document = await this.load();
      const counters = entryFor(document, slug);
      counters[counter] += 1;
      document[slug] = counters;
      await this.save(document);
      this.logger.debug(`${slug}.${counter} = ${counters[counter]}`);
      return counters[counter];
    });
  }

  read(slug: string): Promise<CounterSet> {
    return this.exclusive(async () => {
      const document = await this.load();
      return entryFor(document, slug);
    });
  }

  readAll(): Promise<CountersDocument> {
    return this.exclusive(() => this.load());
  }

  reset(): Promise<void> {
    return this.exclusive(async () => {
      await this.save({});
      this.logger.warn('All counters have been reset');
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees failures through `run`; the queue only needs to move on.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<CountersDocument> {
    const result = await JsonFileUtils.readObject(this.filePath);

    if (result.status === 'missing') {
      await this.save({});
      this.logger.log(`Created empty counters file at ${this.filePath}`);
      return {};
    }

    if (result.status === 'invalid') {
      const quarantined = `${this.filePath}.corrupt-${new Date()
        .toISOString()
        .replace(/[:.]/g, '-')}`;
      await fs.rename(this.filePath, quarantined);
      await this.save({});
      this.logger.warn(
        `Counters file was unreadable (${result.reason}); moved it to ${quarantined} and started from empty counters`,
      );
      return {};
    }

    const raw = await this.migrateFlatShape(result.value);
    const document: CountersDocument = {};
    for (const [slug, entry] of Object.entries(raw)) {
      if (isJsonObject(entry)) {
        document[slug] = toCounterSet(entry);
      }
    }
    return document;
  }

  /**
   * Early deployments tracked a single card, storing counter names at the top
   * level. Those values are moved under the default slug.
   */
  private async migrateFlatShape(raw: JsonObject): Promise<JsonObject> {
    const flatKeys = Object.keys(raw).filter(
      (key) => isCounterName(key) && typeof raw[key] === 'number',
    );
    if (flatKeys.length === 0) return raw;

    if (!this.legacySlug) {
      this.logger.warn(
        `Counters file has top-level counters (${flatKeys.join(', ')}) but no default slug to move them under`,
      );
      return raw;
    }

    const migrated: JsonObject = {};
    const flat: JsonObject = {};
    for (const [key, value] of Object.entries(raw)) {
      if (flatKeys.includes(key)) {
        flat[key] = value;
      } else {
        migrated[key] = value;
      }
    }

    const existing = toCounterSet(migrated[this.legacySlug]);
    const legacy = toCounterSet(flat);
    const merged = emptyCounterSet();
    for (const name of COUNTER_NAMES) {
      merged[name] = existing[name] + legacy[name];
    }
    migrated[this.legacySlug] = merged;

    await this.save(migrated);
    this.logger.log(
      `Migrated top-level counters under slug "${this.legacySlug}"`,
    );
    return migrated;
  }

  private save(document: JsonObject): Promise<void> {
    return JsonFileUtils.writeAtomic(this.filePath, document);
  }
}
