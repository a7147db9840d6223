// Builders for synthetic chart markup used across tests.

export type FixtureItem = {
  id: string;
  name: string;
  ratingValue?: number;
  ratingCount?: number;
  extra?: Record<string, unknown>;
};

export function rankAnchor(id: string, rank: number): string {
  return `<a href="/title/${id}/?ref_=chttp_t_${rank}" class="ipc-title-link-wrapper">#${rank}</a>`;
}

export function ldJsonScript(body: string): string {
  return `<script type="application/ld+json">${body}</script>`;
}

export function itemListJson(items: FixtureItem[]): string {
  return JSON.stringify({
    "@context": "https://schema.org",
    "@type": "ItemList",
    itemListElement: items.map((item) => ({
      "@type": "ListItem",
      item: {
        "@type": "Movie",
        url: `https://www.imdb.com/title/${item.id}/`,
        name: item.name,
        ...(item.ratingValue !== undefined
          ? {
              aggregateRating: {
                "@type": "AggregateRating",
                ratingValue: item.ratingValue,
                ratingCount: item.ratingCount,
              },
            }
          : {}),
        ...item.extra,
      },
    })),
  });
}

/** Pads markup past the fetcher's incomplete-page threshold */
export function chartPage(body: string, minLength = 12_000): string {
  const doc = `<!DOCTYPE html><html><head><title>Top 250</title></head><body>${body}</body></html>`;
  const padding = Math.max(0, minLength - doc.length);
  return doc.replace("</body>", `<!--${"x".repeat(padding)}--></body>`);
}
