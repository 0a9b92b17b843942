import type {
  CountCategory,
  CountTable,
  UserStats,
  WorkRecord,
  WorkRow,
  WrappedData,
} from "./types.js";

export function createStats(): UserStats {
  return {
    authors: new Map(),
    fandoms: new Map(),
    shipTypes: new Map(),
    ratings: new Map(),
    statuses: new Map(),
    ships: new Map(),
    characters: new Map(),
    tags: new Map(),
    wordCount: 0,
    lowercaseTitles: 0,
  };
}

export const COUNT_CATEGORIES: readonly CountCategory[] = [
  "authors",
  "fandoms",
  "shipTypes",
  "ratings",
  "statuses",
  "ships",
  "characters",
  "tags",
];

function bump(table: CountTable, key: string): void {
  table.set(key, (table.get(key) || 0) + 1);
}

function keysOf(record: WorkRecord): Record<CountCategory, readonly string[]> {
  return {
    authors: record.authors,
    fandoms: record.fandoms,
    shipTypes: record.shipTypes,
    ratings: [record.rating],
    statuses: [record.status],
    ships: record.ships,
    characters: record.characters,
    tags: record.additionalTags,
  };
}

export function toWorkRow(record: WorkRecord): WorkRow {
  return {
    title: record.title,
    authors: record.authors.join(","),
    last_updated: record.lastUpdated,
    fandoms: record.fandoms.join(","),
    characters: record.characters.join(","),
    ship_types: record.shipTypes.join(","),
    rating: record.rating,
    work_status: record.status,
    ships: record.ships.join(","),
    additional_tags: record.additionalTags.join(","),
    word_count: record.wordCount,
    kudos: record.kudos,
    hits: record.hits,
    user_last_visited: record.lastVisited,
    user_visitations: record.visitations,
  };
}

function copyStats(stats: UserStats): UserStats {
  const copy = { ...stats };
  for (const category of COUNT_CATEGORIES) {
    copy[category] = new Map(stats[category]);
  }
  return copy;
}

/**
 * Running totals for one scrape. Owned by the scrape loop; once frozen the
 * tables and rows are handed off and can no longer change.
 */
export class StatsAggregator {
  private readonly stats = createStats();
  private readonly rows: WorkRow[] = [];
  private frozen = false;

  absorb(record: WorkRecord): void {
    if (this.frozen) {
      throw new Error("Cannot absorb records after the scrape has finished");
    }

    const keys = keysOf(record);
    for (const category of COUNT_CATEGORIES) {
      for (const key of keys[category]) {
        bump(this.stats[category], key);
      }
    }
    this.stats.wordCount += record.wordCount;
    if (record.title === record.title.toLowerCase()) {
      this.stats.lowercaseTitles++;
    }

    this.rows.push(toWorkRow(record));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  freeze(): WrappedData {
    this.frozen = true;
    return this.snapshot();
  }

  /** Copies of the current tables and rows; later absorbs don't show through. */
  snapshot(): WrappedData {
    return { stats: copyStats(this.stats), rows: [...this.rows] };
  }
}

export function totalCount(table: CountTable): number {
  let total = 0;
  for (const count of table.values()) total += count;
  return total;
}
