import { describe, it, expect } from "vitest";
import { toMovieRecords } from "./normalize";
import type { ItemListNode } from "./types";

function itemList(itemListElement: unknown): ItemListNode {
  return { "@type": "ItemList", itemListElement };
}

function movie(id: string, fields: Record<string, unknown> = {}) {
  return { item: { url: `https://www.imdb.com/title/${id}/`, ...fields } };
}

describe("toMovieRecords", () => {
  it("returns nothing without an item list", () => {
    expect(toMovieRecords(null, new Map())).toEqual({
      movies: [],
      skippedElements: 0,
      positionalRanks: 0,
    });
  });

  it("maps every field of a complete item", () => {
    const list = itemList([
      {
        "@type": "ListItem",
        item: {
          "@type": "Movie",
          url: "https://www.imdb.com/title/tt0111161/",
          name: "Cadena perpetua",
          alternateName: "The Shawshank Redemption",
          description: "Two imprisoned men bond over a number of years.",
          image: "https://m.media-amazon.com/images/M/poster.jpg",
          aggregateRating: {
            "@type": "AggregateRating",
            ratingValue: 9.3,
            ratingCount: 3000000,
          },
          contentRating: "16",
          genre: "Drama",
          duration: "PT2H22M",
        },
      },
    ]);

    const { movies } = toMovieRecords(list, new Map([["tt0111161", 1]]));

    expect(movies).toEqual([
      {
        rank: 1,
        url: "https://www.imdb.com/title/tt0111161/",
        name: "Cadena perpetua",
        alternateName: "The Shawshank Redemption",
        description: "Two imprisoned men bond over a number of years.",
        image: "https://m.media-amazon.com/images/M/poster.jpg",
        ratingValue: 9.3,
        ratingCount: 3000000,
        contentRating: "16",
        genre: "Drama",
        duration: "PT2H22M",
      },
    ]);
  });

  it("leaves rating fields absent when aggregateRating is missing", () => {
    const { movies } = toMovieRecords(
      itemList([movie("tt0050083", { name: "12 Angry Men" })]),
      new Map([["tt0050083", 5]]),
    );
    expect(movies[0]).toEqual({
      rank: 5,
      url: "https://www.imdb.com/title/tt0050083/",
      name: "12 Angry Men",
    });
    expect("ratingValue" in movies[0]).toBe(false);
    expect("ratingCount" in movies[0]).toBe(false);
  });

  it("treats a non-object aggregateRating as empty", () => {
    const { movies } = toMovieRecords(
      itemList([movie("tt0050083", { aggregateRating: "9.0" })]),
      new Map(),
    );
    expect(movies[0].ratingValue).toBeUndefined();
    expect(movies[0].ratingCount).toBeUndefined();
  });

  it("falls back to list position when the title has no anchor rank", () => {
    const { movies, positionalRanks } = toMovieRecords(
      itemList([movie("tt0000001"), movie("tt0000002"), movie("tt0000003")]),
      new Map([["tt0000001", 40]]),
    );
    expect(movies.map((m) => m.rank)).toEqual([40, 2, 3]);
    expect(positionalRanks).toBe(2);
  });

  it("falls back to list position when the url carries no title id", () => {
    const { movies } = toMovieRecords(
      itemList([
        movie("tt0000001"),
        { item: { url: "https://www.imdb.com/list/ls000/", name: "Odd" } },
        { item: { name: "No url" } },
      ]),
      new Map([["tt0000001", 7]]),
    );
    expect(movies.map((m) => m.rank)).toEqual([7, 2, 3]);
    expect(movies[2]).toEqual({ rank: 3, name: "No url" });
  });

  it("skips malformed elements without shifting positions", () => {
    const { movies, skippedElements } = toMovieRecords(
      itemList([
        "not an object",
        { item: "not an object" },
        { position: 3 },
        null,
        movie("tt0000005", { name: "Fifth" }),
      ]),
      new Map(),
    );
    expect(skippedElements).toBe(4);
    expect(movies).toEqual([
      { rank: 5, url: "https://www.imdb.com/title/tt0000005/", name: "Fifth" },
    ]);
  });

  it("keeps list order instead of sorting by rank", () => {
    const { movies } = toMovieRecords(
      itemList([movie("tt0000003"), movie("tt0000001"), movie("tt0000002")]),
      new Map([
        ["tt0000001", 1],
        ["tt0000002", 2],
        ["tt0000003", 3],
      ]),
    );
    expect(movies.map((m) => m.rank)).toEqual([3, 1, 2]);
  });

  it("passes source values through whatever their JSON type", () => {
    const image = { "@type": "ImageObject", url: "https://img.example/p.jpg" };
    const { movies } = toMovieRecords(
      itemList([
        movie("tt0111161", {
          name: 42,
          image,
          genre: ["Crime", 7, "Drama"],
          aggregateRating: { ratingValue: "9.3", ratingCount: "3000000" },
        }),
      ]),
      new Map([["tt0111161", 1]]),
    );
    expect(movies[0]).toEqual({
      rank: 1,
      url: "https://www.imdb.com/title/tt0111161/",
      name: 42,
      image,
      ratingValue: "9.3",
      ratingCount: "3000000",
      genre: ["Crime", 7, "Drama"],
    });
  });

  it("omits null fields", () => {
    const { movies } = toMovieRecords(
      itemList([movie("tt0000001", { name: null, description: null, duration: "PT2H" })]),
      new Map(),
    );
    expect(movies[0]).toEqual({
      rank: 1,
      url: "https://www.imdb.com/title/tt0000001/",
      duration: "PT2H",
    });
  });

  it("treats a non-array itemListElement as an empty list", () => {
    expect(toMovieRecords(itemList({ item: {} }), new Map()).movies).toEqual([]);
  });
});
