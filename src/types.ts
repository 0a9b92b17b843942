export interface WorkRecord {
  title: string;
  authors: string[];
  lastUpdated: string;
  fandoms: string[];
  characters: string[];
  shipTypes: string[];
  rating: string;
  status: string;
  ships: string[];
  additionalTags: string[];
  wordCount: number;
  kudos: number;
  hits: number;
  lastVisited: string;
  visitations: number;
}

export type SkipReason =
  | "no-visit-metadata"
  | "no-header"
  | "incomplete-required-tags";

export type ExtractResult =
  | { kind: "matched"; record: WorkRecord }
  | { kind: "not-in-year"; lastVisited: string }
  | { kind: "skipped"; reason: SkipReason; inTargetYear: boolean };

export type CountTable = Map<string, number>;

export interface UserStats {
  authors: CountTable;
  fandoms: CountTable;
  shipTypes: CountTable;
  ratings: CountTable;
  statuses: CountTable;
  ships: CountTable;
  characters: CountTable;
  tags: CountTable;
  wordCount: number;
  lowercaseTitles: number;
}

export type CountCategory = {
  [K in keyof UserStats]: UserStats[K] extends CountTable ? K : never;
}[keyof UserStats];

// One row of works_{year}.csv
export interface WorkRow {
  title: string;
  authors: string;
  last_updated: string;
  fandoms: string;
  characters: string;
  ship_types: string;
  rating: string;
  work_status: string;
  ships: string;
  additional_tags: string;
  word_count: number;
  kudos: number;
  hits: number;
  user_last_visited: string;
  user_visitations: number;
}

export const WORK_COLUMNS = [
  "title",
  "authors",
  "last_updated",
  "fandoms",
  "characters",
  "ship_types",
  "rating",
  "work_status",
  "ships",
  "additional_tags",
  "word_count",
  "kudos",
  "hits",
  "user_last_visited",
  "user_visitations",
] as const satisfies readonly (keyof WorkRow)[];

export interface WrappedData {
  stats: UserStats;
  rows: readonly WorkRow[];
}

export interface ScrapeResult extends WrappedData {
  pagesFetched: number;
}

export interface Credentials {
  username: string;
  password: string;
}
