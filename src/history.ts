import * as cheerio from "cheerio";
import type { ExtractResult, WorkRecord } from "./types.js";

const ENTRY_SELECTOR = "ol.reading.work.index.group li[class*='reading work blurb group']";
const ORPHAN_ACCOUNT = "orphan_account";

// Order of the four spans in an entry's required-tags list
const REQUIRED_TAG_SLOTS = ["rating", "warnings", "shipTypes", "status"] as const;

type RequiredTags = Record<(typeof REQUIRED_TAG_SLOTS)[number], string>;

/** "12,345" -> 12345; anything that isn't a plain count -> 0. */
export function parseCount(text: string | undefined): number {
  const cleaned = (text ?? "").replace(/,/g, "").trim();
  return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : 0;
}

/** "Visited once" -> 1, "Visited 4 times" -> 4, anything else -> 1. */
export function parseVisitations(text: string): number {
  const token = text.split("Visited ")[1]?.trim().split(/\s+/)[0] ?? "once";
  if (token === "once" || !/^\d+$/.test(token)) return 1;
  return parseInt(token, 10) || 1;
}

/** The date on the first line after "Last visited:", or "" without the label. */
export function parseLastVisited(text: string): string {
  const trimmed = text.trim();
  const prefix = "Last visited:";
  if (!trimmed.startsWith(prefix)) return "";
  return trimmed.slice(prefix.length).split(/\r?\n/)[0].trim();
}

export function splitShipTypes(text: string): string[] {
  return text
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readRequiredTags(spans: string[]): RequiredTags | null {
  if (spans.length < REQUIRED_TAG_SLOTS.length) return null;
  const [rating, warnings, shipTypes, status] = spans;
  return { rating, warnings, shipTypes, status };
}

/**
 * Turns one reading-history entry (the `<li>` blurb) into a record, if it was
 * last visited in `year`.
 */
export function extractEntry(fragment: string, year: string): ExtractResult {
  const $ = cheerio.load(fragment);
  const texts = (selector: string) =>
    $(selector)
      .toArray()
      .map((el) => $(el).text().trim());

  const visitBlock = $("div.user.module.group h4").first();
  if (visitBlock.length === 0) {
    return { kind: "skipped", reason: "no-visit-metadata", inTargetYear: false };
  }
  const visitText = visitBlock.text();
  const lastVisited = parseLastVisited(visitText);
  if (!lastVisited.includes(year)) {
    return { kind: "not-in-year", lastVisited };
  }

  const header = $("div.header.module").first();
  const titleLink = header.find("h4.heading a").first();
  if (header.length === 0 || titleLink.length === 0) {
    return { kind: "skipped", reason: "no-header", inTargetYear: true };
  }
  const headerTexts = (selector: string) =>
    header
      .find(selector)
      .toArray()
      .map((el) => $(el).text().trim());

  const required = readRequiredTags(headerTexts("ul li a span.text"));
  if (!required) {
    return { kind: "skipped", reason: "incomplete-required-tags", inTargetYear: true };
  }

  const stats = $("dl.stats").first();
  const record: WorkRecord = {
    title: titleLink.text().trim(),
    authors: headerTexts('h4.heading a[rel="author"]').filter((a) => a !== ORPHAN_ACCOUNT),
    lastUpdated: header.find("p").first().text().trim(),
    fandoms: headerTexts("h5.fandoms.heading a"),
    characters: texts("ul.tags.commas li.characters"),
    shipTypes: splitShipTypes(required.shipTypes),
    rating: required.rating,
    status: required.status,
    ships: texts("ul.tags.commas li.relationships"),
    additionalTags: texts("ul.tags.commas li.freeforms"),
    wordCount: parseCount(stats.find("dd.words").first().text()),
    kudos: parseCount(stats.find("dd.kudos a").first().text()),
    hits: parseCount(stats.find("dd.hits").first().text()),
    lastVisited,
    visitations: parseVisitations(visitText),
  };

  return { kind: "matched", record };
}

/** Every entry on a history page, in document order. */
export function extractPage(html: string, year: string): ExtractResult[] {
  const $ = cheerio.load(html);
  return $(ENTRY_SELECTOR)
    .toArray()
    .map((el) => extractEntry($.html(el), year));
}

export function pageHasYear(results: ExtractResult[]): boolean {
  return results.some(
    (r) => r.kind === "matched" || (r.kind === "skipped" && r.inTargetYear)
  );
}
