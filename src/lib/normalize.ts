import { log } from "./logger";
import { isJsonObject, regexMarkupMatcher } from "./parsers";
import type { ChartMarkupMatcher } from "./parsers";
import type {
  ItemListNode,
  JsonObject,
  JsonValue,
  MovieRecord,
  RankIndex,
} from "./types";

export type NormalizedMovies = {
  movies: MovieRecord[];
  skippedElements: number;
  positionalRanks: number;
};

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Source value as served; `null` counts as absent. */
function pick(obj: JsonObject, key: string): JsonValue | undefined {
  const value = obj[key];
  return value !== null && isJsonValue(value) ? value : undefined;
}

/** Drops undefined fields so absent source values stay absent in JSON */
function compact(record: MovieRecord): MovieRecord {
  const out: MovieRecord = { rank: record.rank };
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

/**
 * Joins the JSON-LD item list with the anchor rank index. List order is kept
 * as served (IMDb applies any requested sort); rank comes from the anchors,
 * falling back to the 1-based list position when the title can't be matched.
 */
export function toMovieRecords(
  itemList: ItemListNode | null,
  ranks: RankIndex,
  matcher: ChartMarkupMatcher = regexMarkupMatcher,
): NormalizedMovies {
  const result: NormalizedMovies = {
    movies: [],
    skippedElements: 0,
    positionalRanks: 0,
  };
  if (!itemList) return result;

  const elements = Array.isArray(itemList.itemListElement)
    ? itemList.itemListElement
    : [];

  elements.forEach((element: unknown, index) => {
    const position = index + 1;
    const item = isJsonObject(element) ? element.item : undefined;
    if (!isJsonObject(item)) {
      result.skippedElements += 1;
      log.debug("item_list_element_skipped", { position });
      return;
    }

    const aggregate: JsonObject = isJsonObject(item.aggregateRating)
      ? item.aggregateRating
      : {};
    const url = pick(item, "url");
    const titleId =
      typeof url === "string" ? matcher.titleIdFromUrl(url) : null;
    const mapped = titleId ? ranks.get(titleId) : undefined;
    if (mapped === undefined) {
      result.positionalRanks += 1;
      log.debug("rank_fallback", { position, titleId });
    }

    result.movies.push(
      compact({
        rank: mapped ?? position,
        url,
        name: pick(item, "name"),
        alternateName: pick(item, "alternateName"),
        description: pick(item, "description"),
        image: pick(item, "image"),
        ratingValue: pick(aggregate, "ratingValue"),
        ratingCount: pick(aggregate, "ratingCount"),
        contentRating: pick(item, "contentRating"),
        genre: pick(item, "genre"),
        duration: pick(item, "duration"),
      }),
    );
  });

  return result;
}
