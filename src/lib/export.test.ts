import { describe, it, expect } from "vitest";
import { parseExportArgs, serializeMovies } from "./export";

describe("parseExportArgs", () => {
  it("defaults filters and output file", () => {
    expect(parseExportArgs([])).toEqual({
      filters: { limit: 50, sort: "RANKING", direction: "desc" },
      out: "imdb_top250.json",
    });
  });

  it("normalizes the given filters", () => {
    expect(
      parseExportArgs([
        "--limit",
        "900",
        "--sort",
        "RUNTIME",
        "--direction",
        "asc",
        "-o",
        "runtime.json",
      ]),
    ).toEqual({
      filters: { limit: 250, sort: "RUNTIME", direction: "asc" },
      out: "runtime.json",
    });
  });

  it("coerces unknown values to defaults", () => {
    const { filters } = parseExportArgs(["--limit=ten", "--sort=BEST", "--direction=up"]);
    expect(filters).toEqual({ limit: 50, sort: "RANKING", direction: "desc" });
  });

  it("rejects unknown flags", () => {
    expect(() => parseExportArgs(["--pages", "2"])).toThrow();
  });
});

describe("serializeMovies", () => {
  it("writes indented JSON with non-ASCII characters intact", () => {
    expect(serializeMovies([{ rank: 1, name: "El viaje de Chihiro" }, { rank: 2, name: "Amélie" }])).toBe(
      '[\n  {\n    "rank": 1,\n    "name": "El viaje de Chihiro"\n  },\n  {\n    "rank": 2,\n    "name": "Amélie"\n  }\n]\n',
    );
  });
});
