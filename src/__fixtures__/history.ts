import { readFileSync } from "fs";

export interface EntryOptions {
  id?: number;
  title?: string;
  authors?: string[];
  updated?: string;
  fandoms?: string[];
  requiredTags?: string[];
  ships?: string[];
  characters?: string[];
  freeforms?: string[];
  words?: string | null;
  kudos?: string | null;
  hits?: string | null;
  stats?: boolean;
  header?: boolean;
  lastVisited?: string | null;
  visits?: string;
}

const DEFAULT_REQUIRED = [
  "Teen And Up Audiences",
  "No Archive Warnings Apply",
  "M/M",
  "Complete Work",
];

const tagItems = (cls: string, tags: string[]) =>
  tags.map((t) => `<li class="${cls}"><a class="tag" href="/tags/x/works">${t}</a></li>`).join("\n");

/** One `<li>` blurb as it appears on a reading-history page. */
export function entryHtml(options: EntryOptions = {}): string {
  const id = options.id ?? 1;
  const authors = options.authors ?? ["alice"];
  const required = options.requiredTags ?? DEFAULT_REQUIRED;

  const header = `
  <div class="header module">
    <h4 class="heading">
      <a href="/works/${id}">${options.title ?? "A Quiet Harbor"}</a>
      by
      ${authors.map((a) => `<a rel="author" href="/users/${a}/pseuds/${a}">${a}</a>`).join(", ")}
    </h4>
    <h5 class="fandoms heading">
      <span class="landmark">Fandoms:</span>
      ${(options.fandoms ?? ["Star Trek"]).map((f) => `<a class="tag" href="/tags/x/works">${f}</a>`).join(", ")}
    </h5>
    <ul class="required-tags">
      ${required.map((t) => `<li><a class="help symbol" href="/help"><span class="tag"><span class="text">${t}</span></span></a></li>`).join("\n")}
    </ul>
    <p class="datetime">${options.updated ?? "12 Jan 2024"}</p>
  </div>`;

  const statsRow = (cls: string, value: string | null | undefined, fallback: string, link = false) => {
    const v = value === undefined ? fallback : value;
    if (v === null) return "";
    return `<dt class="${cls}">${cls}:</dt><dd class="${cls}">${link ? `<a href="/works/${id}/${cls}">${v}</a>` : v}</dd>`;
  };

  const stats = `
  <dl class="stats">
    <dt class="language">Language:</dt><dd class="language">English</dd>
    ${statsRow("words", options.words, "1,000")}
    ${statsRow("kudos", options.kudos, "25", true)}
    ${statsRow("hits", options.hits, "300")}
  </dl>`;

  const lastVisited = options.lastVisited === undefined ? "15 Dec 2024" : options.lastVisited;
  const visit =
    lastVisited === null
      ? ""
      : `
  <div class="user module group">
    <h4 class="viewed heading">
      <span>Last visited:</span> ${lastVisited}
      (Latest version.)
      ${options.visits ?? "Visited once"}
    </h4>
  </div>`;

  return `<li id="reading_${id}" class="reading work blurb group work-${id} user-7" role="article">
  ${options.header === false ? "" : header}
  <h6 class="landmark heading">Tags</h6>
  <ul class="tags commas">
    <li class="warnings"><strong><a class="tag" href="/tags/x/works">No Archive Warnings Apply</a></strong></li>
    ${tagItems("relationships", options.ships ?? [])}
    ${tagItems("characters", options.characters ?? [])}
    ${tagItems("freeforms", options.freeforms ?? [])}
  </ul>
  ${options.stats === false ? "" : stats}
  ${visit}
</li>`;
}

export function pageHtml(entries: string[]): string {
  return `<!DOCTYPE html>
<html><head><title>History</title></head>
<body>
  <h2 class="heading">History</h2>
  <ol class="reading work index group">
    ${entries.join("\n")}
  </ol>
</body></html>`;
}

export function loginPageHtml(token: string | null): string {
  const meta = token === null ? "" : `<meta name="csrf-token" content="${token}" />`;
  return `<!DOCTYPE html><html><head>${meta}<title>Log In</title></head><body><form id="new_user"></form></body></html>`;
}

export function readFixture(name: string): string {
  return readFileSync(new URL(name, import.meta.url), "utf-8");
}
