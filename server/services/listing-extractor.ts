import * as cheerio from 'cheerio';
import { z } from 'zod';
import { parsePrice } from './scraper-utils';

/**
 * Detail page parsing. Works on rendered HTML only, so it is shared by the
 * browser worker and the tests.
 */

// Location line on a standard listing; its presence means the page rendered.
export const LOCATION_SELECTOR = 'span.f-l';
const BROKER_PHONE_SELECTOR = 'span.ctc_phone a span';
const BROKER_CARD_SELECTOR = '.broker-card > div';
// Financial summary row: [asking price, cash flow, gross revenue, ...]
const FINANCIAL_FIELD_SELECTOR = 'p.help span.g4';
const CASHFLOW_POSITION = 1;
const GROSS_REVENUE_POSITION = 2;

const ACCESS_DENIED_PATTERN = /access denied/i;
const AUCTION_PATTERN = /starting bid/i;
const ESTABLISHED_PATTERN = /Established:\s*(\d{4})/i;

const priceValue = z.union([z.string(), z.number()]);

const productSchema = z.object({
  '@type': z.literal('Product'),
  name: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  productId: priceValue.optional(),
  offers: z.object({
    price: priceValue.optional(),
    offeredBy: z.object({
      name: z.string().optional(),
      url: z.string().optional(),
    }).passthrough().optional(),
  }).passthrough().optional(),
}).passthrough();

type Product = z.infer<typeof productSchema>;

export interface ExtractedListing {
  title: string | null;
  description: string | null;
  askingPrice: number | null;
  category: string;
  externalId: string | null;
  brokerName: string | null;
  brokerProfileUrl: string | null;
  location: string | null;
  brokerPhone: string | null;
  grossRevenue: string | null;
  cashflow: string | null;
  established: string | null;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function nonEmpty(value: string | undefined | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function visibleText($: cheerio.CheerioAPI): string {
  return $('body').text().replace(/\s+/g, ' ');
}

export function isBlockedPage(html: string): boolean {
  return ACCESS_DENIED_PATTERN.test(visibleText(cheerio.load(html)));
}

export function isAuctionPage(html: string): boolean {
  return AUCTION_PATTERN.test(visibleText(cheerio.load(html)));
}

/**
 * First schema.org Product found in the page's JSON-LD blocks.
 * Malformed blocks are skipped.
 */
export function findProduct($: cheerio.CheerioAPI): Product | null {
  const blocks = $('script[type="application/ld+json"]').toArray();
  for (const block of blocks) {
    const data = parseJson($(block).text().replace(/[\n\t]/g, ''));
    const nodes = Array.isArray(data) ? data : [data];
    for (const node of nodes) {
      const product = productSchema.safeParse(node);
      if (product.success) return product.data;
    }
  }
  return null;
}

export function extractListing(html: string): ExtractedListing {
  const $ = cheerio.load(html);
  const product = findProduct($);
  const broker = product?.offers?.offeredBy;

  let brokerName: string | null = null;
  if (broker) {
    const raw = broker.name || $(BROKER_CARD_SELECTOR).first().text();
    brokerName = nonEmpty(raw.replace('Business Listed By:', ''));
  }

  const financials = $(FINANCIAL_FIELD_SELECTOR);
  const established = visibleText($).match(ESTABLISHED_PATTERN);

  return {
    title: nonEmpty(product?.name),
    description: nonEmpty(product?.description),
    askingPrice: parsePrice(product?.offers?.price),
    category: product?.category?.trim() ?? '',
    externalId: product?.productId !== undefined ? nonEmpty(String(product.productId)) : null,
    brokerName,
    brokerProfileUrl: nonEmpty(broker?.url),
    location: nonEmpty($(LOCATION_SELECTOR).first().text()),
    brokerPhone: nonEmpty($(BROKER_PHONE_SELECTOR).first().text()),
    grossRevenue: nonEmpty(financials.eq(GROSS_REVENUE_POSITION).text()),
    cashflow: nonEmpty(financials.eq(CASHFLOW_POSITION).text()),
    established: established ? established[1] : null,
  };
}

/**
 * A standard listing needs both an asking price and a location.
 */
export function isAcceptable(listing: ExtractedListing): boolean {
  return listing.askingPrice !== null && listing.location !== null;
}
