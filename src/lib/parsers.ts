// src/lib/parsers.ts

import { log } from "./logger";
import type { ItemListNode, JsonObject, RankIndex } from "./types";

export type RankAnchor = { titleId: string; rank: number };

/**
 * Structural matching over raw chart markup. The merge only sees what this
 * interface returns, so a tree-walking implementation can replace the regex one.
 */
export interface ChartMarkupMatcher {
  /** Anchors carrying both a title id and a chart rank, in document order */
  rankAnchors(html: string): Iterable<RankAnchor>;
  /** Raw bodies of every `application/ld+json` script block, in document order */
  ldJsonBlocks(html: string): string[];
  titleIdFromUrl(url: string): string | null;
}

// e.g. /title/tt0111161/?ref_=chttp_t_1
const RANK_ANCHOR_RE = /\/title\/(tt\d+)\/\?ref_=chttp_t_(\d+)/g;
const LD_JSON_RE =
  /<script[^>]*type="application\/ld\+json"[^>]*>([\s\S]*?)<\/script>/gi;
const TITLE_ID_RE = /\/title\/(tt\d+)\//;

export const regexMarkupMatcher: ChartMarkupMatcher = {
  *rankAnchors(html) {
    for (const match of html.matchAll(RANK_ANCHOR_RE)) {
      yield { titleId: match[1], rank: Number.parseInt(match[2], 10) };
    }
  },

  ldJsonBlocks(html) {
    return [...html.matchAll(LD_JSON_RE)].map((match) => match[1]);
  },

  titleIdFromUrl(url) {
    return url.match(TITLE_ID_RE)?.[1] ?? null;
  },
};

export function isJsonObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/**
 * The same title recurs further down the page (related lists, sort variants);
 * only its first anchor carries the primary chart position.
 */
export function parseRankIndex(
  html: string,
  matcher: ChartMarkupMatcher = regexMarkupMatcher,
): RankIndex {
  const ranks = new Map<string, number>();
  for (const { titleId, rank } of matcher.rankAnchors(html)) {
    if (!ranks.has(titleId)) ranks.set(titleId, rank);
  }
  return ranks;
}

function isItemListNode(value: unknown): value is ItemListNode {
  return (
    isJsonObject(value) &&
    value["@type"] === "ItemList" &&
    "itemListElement" in value
  );
}

export type ItemListExtraction = {
  itemList: ItemListNode | null;
  /** Every ld+json block on the page, whether or not it was inspected */
  blocks: number;
  parseErrors: number;
};

export function findItemList(
  html: string,
  matcher: ChartMarkupMatcher = regexMarkupMatcher,
): ItemListExtraction {
  const blocks = matcher.ldJsonBlocks(html);
  let parseErrors = 0;

  for (const [index, raw] of blocks.entries()) {
    let candidate: unknown;
    try {
      candidate = JSON.parse(raw.trim());
    } catch {
      parseErrors += 1;
      log.debug("ldjson_block_skipped", { index, length: raw.length });
      continue;
    }
    if (isItemListNode(candidate)) {
      return { itemList: candidate, blocks: blocks.length, parseErrors };
    }
  }

  return { itemList: null, blocks: blocks.length, parseErrors };
}
