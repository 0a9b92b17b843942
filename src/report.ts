import type { CountTable, UserStats, WorkRow } from "./types.js";

const DAYS_PER_YEAR = 365;
const WORDS_PER_NOVEL = 70000;
const RUNNERS_UP = 9;

export type Entry = [key: string, count: number];

export interface Ranking {
  top: Entry;
  runnersUp: Entry[];
  distinct: number;
}

export type NumericColumn = "word_count" | "hits" | "kudos";

export interface WorkRef {
  title: string;
  authors: string;
  value: number;
}

export interface Extreme {
  column: NumericColumn;
  label: string;
  max: WorkRef;
  min: WorkRef;
  mean: number;
}

export interface WrappedReport {
  works: number;
  words: number;
  wordsPerDay: number;
  novels: number;
  mostVisited: WorkRef | null;
  shipTypes: Ranking | null;
  ratings: Ranking | null;
  statuses: [Entry, Entry] | null;
  authors: Ranking | null;
  fandoms: Ranking | null;
  ships: Ranking | null;
  characters: Ranking | null;
  tags: Ranking | null;
  tagsPerWork: number;
  extremes: Extreme[];
}

/** Highest count first; equal counts keep the table's insertion order. */
export function sortByCount(table: CountTable): Entry[] {
  return [...table.entries()].sort((a, b) => b[1] - a[1]);
}

export function rank(table: CountTable, runnersUp = RUNNERS_UP): Ranking | null {
  const [top, ...rest] = sortByCount(table);
  if (!top) return null;
  return { top, runnersUp: rest.slice(0, runnersUp), distinct: table.size };
}

function pick(
  rows: readonly WorkRow[],
  column: NumericColumn,
  better: (a: number, b: number) => boolean
): WorkRef {
  let best = rows[0];
  for (const row of rows) {
    if (better(row[column], best[column])) best = row;
  }
  return { title: best.title, authors: best.authors, value: best[column] };
}

export function extreme(
  rows: readonly WorkRow[],
  column: NumericColumn,
  label: string
): Extreme | null {
  if (rows.length === 0) return null;
  const sum = rows.reduce((s, row) => s + row[column], 0);
  return {
    column,
    label,
    max: pick(rows, column, (a, b) => a > b),
    min: pick(rows, column, (a, b) => a < b),
    mean: Math.trunc(sum / rows.length),
  };
}

export function buildReport(stats: UserStats, rows: readonly WorkRow[]): WrappedReport {
  const works = rows.length;
  const statuses = sortByCount(stats.statuses);
  const mostVisited = rows.length > 0 ? pickVisited(rows) : null;

  return {
    works,
    words: stats.wordCount,
    wordsPerDay: stats.wordCount / DAYS_PER_YEAR,
    novels: stats.wordCount / WORDS_PER_NOVEL,
    mostVisited,
    shipTypes: rank(stats.shipTypes),
    ratings: rank(stats.ratings),
    statuses: statuses.length >= 2 ? [statuses[0], statuses[1]] : null,
    authors: rank(stats.authors),
    fandoms: rank(stats.fandoms),
    ships: rank(stats.ships),
    characters: rank(stats.characters),
    tags: rank(stats.tags),
    tagsPerWork: works > 0 ? stats.tags.size / works : 0,
    extremes: [
      extreme(rows, "word_count", "word count"),
      extreme(rows, "hits", "hits"),
      extreme(rows, "kudos", "kudos"),
    ].filter((e): e is Extreme => e !== null),
  };
}

function pickVisited(rows: readonly WorkRow[]): WorkRef {
  let best = rows[0];
  for (const row of rows) {
    if (row.user_visitations > best.user_visitations) best = row;
  }
  return { title: best.title, authors: best.authors, value: best.user_visitations };
}

function byline(authors: string): string {
  return authors || "an orphaned account";
}

function section(
  lines: string[],
  ranking: Ranking | null,
  headline: (r: Ranking) => string[],
  runnerUp: (e: Entry) => string
): void {
  if (!ranking) return;
  lines.push(...headline(ranking));
  if (ranking.runnersUp.length > 0) {
    lines.push("You also read:");
    for (const entry of ranking.runnersUp) lines.push(`  ${runnerUp(entry)}`);
  }
  lines.push("");
}

export function renderReport(report: WrappedReport): string[] {
  const lines: string[] = [];

  lines.push(
    `You've read ${report.works} fanfics this year, totaling ${report.words} words, ` +
      `or ${report.wordsPerDay.toFixed(2)} words/day.`,
    `At about ${WORDS_PER_NOVEL} words a novel, that's ${report.novels.toFixed(2)} novels.`,
    ""
  );

  if (report.mostVisited) {
    const { title, authors, value } = report.mostVisited;
    lines.push(`The fic you visited the most was ${title} by ${byline(authors)}, with ${value} visits.`, "");
  }

  const fics = ([key, count]: Entry) => `${count} ${key} fics`;

  section(lines, report.shipTypes, (r) => [`You read ${r.top[1]} ${r.top[0]} fics this year.`], fics);
  section(lines, report.ratings, (r) => [`You read ${r.top[1]} ${r.top[0]} fics this year.`], fics);

  if (report.statuses) {
    const [[firstKey, firstCount], [secondKey, secondCount]] = report.statuses;
    lines.push(`You read ${firstCount} ${firstKey} and ${secondCount} ${secondKey} fics this year.`, "");
  }

  section(
    lines,
    report.authors,
    (r) => [
      `You read ${r.distinct} different authors this year.`,
      `Your most read author was ${r.top[0]}, with ${r.top[1]} fics.`,
    ],
    ([key, count]) => `${count} fics by ${key}`
  );
  section(
    lines,
    report.fandoms,
    (r) => [
      `You read fics for ${r.distinct} different fandoms this year.`,
      `Your most read fandom was ${r.top[0]}, with ${r.top[1]} fics.`,
    ],
    fics
  );
  section(
    lines,
    report.ships,
    (r) => [
      `You read fics with ${r.distinct} different ships this year.`,
      `Your top ship was ${r.top[0]}, in ${r.top[1]} fics.`,
    ],
    fics
  );
  section(
    lines,
    report.characters,
    (r) => [
      `You read about ${r.distinct} different characters this year.`,
      `Your most read character was ${r.top[0]}, in ${r.top[1]} fics.`,
    ],
    fics
  );
  section(
    lines,
    report.tags,
    (r) => [
      `You read fics with ${r.distinct} different tags this year, averaging ${report.tagsPerWork.toFixed(2)} tags/work.`,
      `Your favourite tag was ${r.top[0]}, on ${r.top[1]} fics.`,
    ],
    fics
  );

  for (const e of report.extremes) {
    lines.push(
      `Most ${e.label}: ${e.max.title} by ${byline(e.max.authors)} with ${e.max.value} ${e.label}`,
      `Least ${e.label}: ${e.min.title} by ${byline(e.min.authors)} with ${e.min.value} ${e.label}`,
      `Average ${e.label}: ${e.mean}`,
      ""
    );
  }

  return lines;
}

export function printReport(stats: UserStats, rows: readonly WorkRow[]): void {
  console.log("=".repeat(70));
  console.log("YOUR YEAR IN FANFIC");
  console.log("=".repeat(70));
  console.log();
  for (const line of renderReport(buildReport(stats, rows))) {
    console.log(line);
  }
}
