/**
 * Primary market-data source: Google Finance quote pages.
 *
 * Fundamentals come from the page markup; daily closes from chart data the
 * page embeds in inline scripts. Both try the NSE, BOM and bare quote URLs in
 * turn, each with the client's retry policy.
 */

import * as cheerio from 'cheerio';
import { FUNDAMENTALS_THROTTLE_MS, HISTORY_THROTTLE_MS } from '../config.js';
import { utcDateKeyFromUnixSeconds } from '../lib/dateUtils.js';
import { parseLooseNumber } from '../lib/numberParsing.js';
import type { HttpClient } from './httpClient.js';
import type { FundamentalSnapshot, PriceBar } from './scanTypes.js';

export const QUOTE_URL_TEMPLATES = [
  'https://www.google.com/finance/quote/{symbol}:NSE',
  'https://www.google.com/finance/quote/{symbol}:BOM',
  'https://www.google.com/finance/quote/{symbol}',
] as const;

const LABELS = {
  pe: ['p/e ratio', 'pe ratio', 'p/e'],
  bv: ['book value', 'book value per share'],
  roce: ['roce', 'return on capital employed'],
  debt: ['total debt', 'debt', 'net debt'],
  industry: ['industry', 'sector'],
} as const;

const TUPLE_PATTERN = /\[\[(\d{10,13}),[\d.]+,[\d.]+,[\d.]+,([\d.]+)\]/g;
const SCRIPT_CLOSE_PATTERN = /"(\d{4}-\d{2}-\d{2})"[^}]*?"close":\s*([\d.]+)/gs;

export type FundamentalsResult =
  | { ok: true; fundamentals: FundamentalSnapshot; url: string }
  | { ok: false; reason: string };

export function quoteUrls(symbol: string): string[] {
  const encoded = encodeURIComponent(symbol);
  return QUOTE_URL_TEMPLATES.map((template) => template.replace('{symbol}', encoded));
}

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function firstLabel(kv: Map<string, string>, labels: readonly string[]): string | null {
  for (const label of labels) {
    const value = kv.get(label);
    if (value) return value;
  }
  return null;
}

/** Label → value pairs from the "About" rows and any plain tables. Later rows win. */
function collectKeyValues($: cheerio.CheerioAPI): Map<string, string> {
  const kv = new Map<string, string>();
  $('div.gyFHrc').each((_, row) => {
    const cols = $(row).find('div');
    if (cols.length >= 2) {
      kv.set(cleanText(cols.first().text()).toLowerCase(), cleanText(cols.last().text()));
    }
  });
  $('table tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length >= 2) {
      kv.set(cleanText(cells.first().text()).toLowerCase(), cleanText(cells.last().text()));
    }
  });
  return kv;
}

function parseName($: cheerio.CheerioAPI): string | null {
  const tagged = cleanText($('div.zzDege').first().text());
  if (tagged) return tagged;
  const title = $('title').first().text();
  if (!title) return null;
  // "TCS Share Price - Tata Consultancy Services Stock Quote ..."
  const parts = title.split('-');
  const name = parts.length > 1 ? parts[1].split('Stock')[0].trim() : parts[0].trim();
  return name || null;
}

function parsePrice($: cheerio.CheerioAPI): number | null {
  const priceTag = $('div.YMlKec.fxKbKc').first();
  if (priceTag.length > 0) return parseLooseNumber(priceTag.text());
  const attr = $('[data-last-price]').first().attr('data-last-price');
  return parseLooseNumber(attr);
}

export function parseFundamentalsPage(symbol: string, html: string): FundamentalSnapshot {
  const $ = cheerio.load(html);
  const kv = collectKeyValues($);
  const industryLink = cleanText($('a.py3Ok').first().text());
  return {
    symbol,
    name: parseName($),
    cmp: parsePrice($),
    pe: parseLooseNumber(firstLabel(kv, LABELS.pe)),
    roce: parseLooseNumber(firstLabel(kv, LABELS.roce)),
    bv: parseLooseNumber(firstLabel(kv, LABELS.bv)),
    debt: parseLooseNumber(firstLabel(kv, LABELS.debt)),
    industry: industryLink || firstLabel(kv, LABELS.industry),
  };
}

/** Sorts ascending by date and keeps the first close seen for each date. */
export function normalizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byDate = new Map<string, number>();
  for (const bar of bars) {
    if (!bar.date || !Number.isFinite(bar.close) || byDate.has(bar.date)) continue;
    byDate.set(bar.date, bar.close);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, close]) => ({ date, close }));
}

/**
 * Pulls daily closes out of a quote page. Numeric chart tuples
 * `[[ts,o,h,l,close]` are tried first; when none match, inline scripts are
 * searched for `"YYYY-MM-DD" ... "close": n` records.
 */
export function extractPriceBars(html: string): PriceBar[] {
  const bars: PriceBar[] = [];
  for (const match of html.matchAll(TUPLE_PATTERN)) {
    let ts = Number(match[1]);
    if (ts > 1e12) ts = Math.floor(ts / 1000);
    const close = parseLooseNumber(match[2]);
    const date = utcDateKeyFromUnixSeconds(ts);
    if (close !== null && date) bars.push({ date, close });
  }

  if (bars.length === 0) {
    const $ = cheerio.load(html);
    $('script').each((_, el) => {
      const scriptText = $(el).html() ?? '';
      for (const match of scriptText.matchAll(SCRIPT_CLOSE_PATTERN)) {
        const close = parseLooseNumber(match[2]);
        if (close !== null) bars.push({ date: match[1], close });
      }
    });
  }
  return normalizeBars(bars);
}

export class GoogleFinanceSource {
  constructor(private readonly http: HttpClient) {}

  private async fetchFirstQuotePage(symbol: string) {
    let lastReason = 'no quote URL answered';
    for (const url of quoteUrls(symbol)) {
      const page = await this.http.fetchPage(url);
      if (page.ok) return page;
      lastReason = page.reason;
    }
    return { ok: false as const, reason: lastReason };
  }

  async fetchFundamentals(symbol: string): Promise<FundamentalsResult> {
    const page = await this.fetchFirstQuotePage(symbol);
    if (!page.ok) {
      console.warn(`[google] ${symbol}: every quote URL failed (${page.reason})`);
      return { ok: false, reason: page.reason };
    }
    const fundamentals = parseFundamentalsPage(symbol, page.body);
    if (fundamentals.cmp === null) {
      console.warn(`[google] ${symbol}: no price on ${page.url}; selectors may have changed`);
    }
    await this.http.sleep(FUNDAMENTALS_THROTTLE_MS);
    return { ok: true, fundamentals, url: page.url };
  }

  /** Daily closes from the first quote page that loads; empty when none do. */
  async fetchHistory(symbol: string): Promise<PriceBar[]> {
    const page = await this.fetchFirstQuotePage(symbol);
    if (!page.ok) {
      console.warn(`[google] ${symbol}: chart page unavailable (${page.reason})`);
      return [];
    }
    const bars = extractPriceBars(page.body);
    console.log(`[google] ${symbol}: extracted ${bars.length} bars from ${page.url}`);
    await this.http.sleep(HISTORY_THROTTLE_MS);
    return bars;
  }
}
