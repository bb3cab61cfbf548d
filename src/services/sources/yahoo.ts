import * as cheerio from "cheerio";
import type { Item, SearchOptions, SourceAdapter } from "../../types/listing.js";
import { logger } from "../../utils/logger.js";
import { ParseError } from "../errors.js";
import { BROWSER_USER_AGENT, ensureAbsoluteUrl, parsePrice, requestText } from "./http.js";

const BASE_URL = "https://auctions.yahoo.co.jp";
const SEARCH_URL = "https://auctions.yahoo.co.jp/search/search";
const PAGE_SIZE = 50;
const EMPTY_RESULT_TEXT = "一致する商品はありません";

export interface YahooRawListing {
  title: string;
  url: string;
  priceText: string;
}

interface YahooAuctionsAdapterOptions {
  timeoutMs: number;
}

const log = logger.child({ source: "yahoo" });

function parseProductBlocks($: cheerio.CheerioAPI): YahooRawListing[] {
  let blocks = $("li.Product");
  if (blocks.length === 0) {
    blocks = $("div.Product");
  }

  const rows: YahooRawListing[] = [];
  blocks.each((_, element) => {
    const block = $(element);
    let link = block.find("a.Product__titleLink").first();
    if (link.length === 0) {
      link = block.find("h3 a").first();
    }
    const title = (link.text() || block.find("h3").first().text()).trim();
    const url = ensureAbsoluteUrl(link.attr("href")?.trim(), BASE_URL);
    if (!title || !url) return;

    let price = block.find("span.Product__priceValue").first();
    if (price.length === 0) {
      price = block
        .find("span")
        .filter((__, span) => /¥|円/.test($(span).text()))
        .first();
    }

    rows.push({ title, url, priceText: price.text().trim() });
  });
  return rows;
}

function parseAuctionLinks($: cheerio.CheerioAPI): YahooRawListing[] {
  const rows: YahooRawListing[] = [];
  $("a[href*='/jp/auction/']")
    .slice(0, PAGE_SIZE)
    .each((_, element) => {
      const link = $(element);
      const title = link.text().trim();
      const url = ensureAbsoluteUrl(link.attr("href")?.trim(), BASE_URL);
      if (!title || !url) return;
      const priceMatch = link.parent().text().match(/¥\d[\d,]*/);
      rows.push({ title, url, priceText: priceMatch?.[0] ?? "" });
    });
  return rows;
}

/** Raw rows from a search result page; the link fallback applies when no product block yields a row. */
export function parseYahooSearchHtml(html: string): { rows: YahooRawListing[]; declaredEmpty: boolean } {
  const $ = cheerio.load(html);
  const primary = parseProductBlocks($);
  const rows = primary.length > 0 ? primary : parseAuctionLinks($);
  const declaredEmpty = $(".Empty").length > 0 || $("body").text().includes(EMPTY_RESULT_TEXT);
  return { rows, declaredEmpty };
}

export class YahooAuctionsAdapter implements SourceAdapter<YahooRawListing> {
  readonly name = "yahoo";
  private readonly timeoutMs: number;

  constructor(options: YahooAuctionsAdapterOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  extractId(raw: YahooRawListing): string {
    const match = raw.url.match(/\/auction\/([a-z0-9]+)/i);
    return match?.[1] ?? "";
  }

  async search(keyword: string, options: SearchOptions = {}): Promise<Item[]> {
    const html = await requestText(SEARCH_URL, {
      timeoutMs: this.timeoutMs,
      query: { va: keyword, exflg: 1, b: 1, n: PAGE_SIZE },
      headers: {
        accept: "text/html,application/xhtml+xml",
        "user-agent": BROWSER_USER_AGENT,
      },
      signal: options.signal,
    });

    const { rows, declaredEmpty } = parseYahooSearchHtml(html);
    const items = this.toItems(rows);
    if (items.length === 0 && !declaredEmpty) {
      throw new ParseError("No listings could be extracted from search page", {
        url: `${SEARCH_URL}?va=${encodeURIComponent(keyword)}`,
      });
    }

    log.debug("source_search_parsed", { keyword, rows: rows.length, items: items.length });
    return items;
  }

  private toItems(rows: YahooRawListing[]): Item[] {
    const seen = new Set<string>();
    const items: Item[] = [];
    for (const row of rows) {
      const id = this.extractId(row);
      if (!id || seen.has(id)) continue;
      seen.add(id);
      items.push({
        source: this.name,
        id,
        title: row.title,
        price: parsePrice(row.priceText),
        url: row.url,
      });
      if (items.length >= PAGE_SIZE) break;
    }
    return items;
  }
}
