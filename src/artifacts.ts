import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { ArtifactMissingError } from "./errors.js";
import { COUNT_CATEGORIES, createStats } from "./stats.js";
import {
  WORK_COLUMNS,
  type CountCategory,
  type CountTable,
  type UserStats,
  type WorkRow,
  type WrappedData,
} from "./types.js";

// Key names in user_{year}.json
const STATS_KEYS: Record<CountCategory, string> = {
  authors: "user_authors",
  fandoms: "user_fandoms",
  shipTypes: "user_ship_type",
  ratings: "user_rating",
  statuses: "user_status",
  ships: "user_ships",
  characters: "user_characters",
  tags: "user_tags",
};

export function statsPath(dir: string, year: string): string {
  return join(dir, `user_${year}.json`);
}

export function worksPath(dir: string, year: string): string {
  return join(dir, `works_${year}.csv`);
}

export function serializeStats(stats: UserStats): string {
  const data: Record<string, unknown> = {};
  for (const category of COUNT_CATEGORIES) {
    data[STATS_KEYS[category]] = Object.fromEntries(stats[category]);
  }
  data.user_word_count = stats.wordCount;
  data.title_lower_count = stats.lowercaseTitles;
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCountTable(value: unknown, key: string): CountTable {
  const table: CountTable = new Map();
  if (value === undefined) return table;
  if (!isRecord(value)) {
    throw new Error(`Malformed stats file: "${key}" is not an object`);
  }
  for (const [name, count] of Object.entries(value)) {
    if (typeof count !== "number") {
      throw new Error(`Malformed stats file: "${key}.${name}" is not a number`);
    }
    table.set(name, count);
  }
  return table;
}

export function deserializeStats(content: string): UserStats {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data)) {
    throw new Error("Malformed stats file: expected an object");
  }

  const stats = createStats();
  for (const category of COUNT_CATEGORIES) {
    const key = STATS_KEYS[category];
    stats[category] = toCountTable(data[key], key);
  }
  stats.wordCount = typeof data.user_word_count === "number" ? data.user_word_count : 0;
  stats.lowercaseTitles = typeof data.title_lower_count === "number" ? data.title_lower_count : 0;
  return stats;
}

export function serializeWorks(rows: readonly WorkRow[]): string {
  return stringify([...rows], { header: true, columns: [...WORK_COLUMNS] });
}

export function deserializeWorks(content: string): WorkRow[] {
  const records = parse(content, {
    columns: true,
    skip_empty_lines: true,
  }) as Record<string, string>[];

  return records.map((row) => ({
    title: row["title"] ?? "",
    authors: row["authors"] ?? "",
    last_updated: row["last_updated"] ?? "",
    fandoms: row["fandoms"] ?? "",
    characters: row["characters"] ?? "",
    ship_types: row["ship_types"] ?? "",
    rating: row["rating"] ?? "",
    work_status: row["work_status"] ?? "",
    ships: row["ships"] ?? "",
    additional_tags: row["additional_tags"] ?? "",
    word_count: parseInt(row["word_count"], 10) || 0,
    kudos: parseInt(row["kudos"], 10) || 0,
    hits: parseInt(row["hits"], 10) || 0,
    user_last_visited: row["user_last_visited"] ?? "",
    user_visitations: parseInt(row["user_visitations"], 10) || 1,
  }));
}

export function saveArtifacts(dir: string, year: string, data: WrappedData): void {
  mkdirSync(dir, { recursive: true });
  writeFileSync(statsPath(dir, year), serializeStats(data.stats));
  writeFileSync(worksPath(dir, year), serializeWorks(data.rows));
}

/** Replays a previous scrape without touching the network. */
export function loadArtifacts(dir: string, year: string): WrappedData {
  const userFile = statsPath(dir, year);
  const worksFile = worksPath(dir, year);
  if (!existsSync(userFile)) {
    throw new ArtifactMissingError("User stats file not found", userFile);
  }
  if (!existsSync(worksFile)) {
    throw new ArtifactMissingError("Works file not found", worksFile);
  }

  return {
    stats: deserializeStats(readFileSync(userFile, "utf-8")),
    rows: deserializeWorks(readFileSync(worksFile, "utf-8")),
  };
}
