import { load } from "cheerio";

export interface ListingPage {
  /** Table rows on the page */
  rowCount: number;
  /** Material identifiers in page order */
  ids: string[];
  /** Whether an enabled next-page link exists */
  hasNext: boolean;
}

const NEXT_LABELS = new Set([">", "›", "Next"]);
const MATERIAL_SEGMENT = "/material/";

export function buildListingUrl(template: string, sid: number, page: number): string {
  return template.replaceAll("{sid}", String(sid)).replaceAll("{page}", String(page));
}

function materialIdFromHref(href: string): string | undefined {
  const index = href.indexOf(MATERIAL_SEGMENT);
  if (index < 0) return undefined;
  const id = href
    .slice(index + MATERIAL_SEGMENT.length)
    .split(/[?#]/)[0]
    ?.replace(/\/+$/, "");
  return id ? id : undefined;
}

/**
 * Pull material ids out of one listing table page.
 * Each row's header cell links to `/material/<id>`.
 */
export function parseListingPage(html: string): ListingPage {
  const $ = load(html);
  const rows = $("tbody tr");
  const ids: string[] = [];

  rows.each((_, row) => {
    const href = $(row).find("th a[href*='/material/']").first().attr("href");
    if (!href) return;
    const id = materialIdFromHref(href);
    if (id) ids.push(id);
  });

  const next = $("a.page-link")
    .filter((_, element) => NEXT_LABELS.has($(element).text().trim()))
    .first();
  const hasNext = next.length > 0 && !next.closest("li").hasClass("disabled");

  return { rowCount: rows.length, ids, hasNext };
}
