import { z } from "zod";

import { PLATFORMS, type CrawledCandidate, type NormalizedCandidate, type Platform } from "@/lib/types";

const KEYWORD_STOP_WORDS = new Set(["và", "của", "cho", "với", "từ", "đến", "có", "là", "một", "các", "the", "a", "an", "and", "for", "with"]);

const CURRENCY_NOISE = /₫|đ|vnd|vnđ|\s/gi;

const scalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => value ?? null)
  .catch(null);
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null)
  .catch(null);
const optionalCount = z
  .number()
  .nullish()
  .transform((value) => value ?? null)
  .catch(null);
const optionalFlag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? null)
  .catch(null);

/**
 * Shape a scraper item must have before it is normalized. A readable name,
 * link and platform are required; unreadable optional fields become null.
 */
export const crawledCandidateSchema = z.object({
  name: z.string(),
  price: scalar,
  sold: scalar,
  rating: scalar,
  img: optionalText,
  link: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  platform: z.custom<Platform>((value) => PLATFORMS.some((platform) => platform === value), "unknown platform"),
  reviewCount: optionalCount,
  brand: optionalText,
  sellerLocation: optionalText,
  isMall: optionalFlag,
  isVerifiedSeller: optionalFlag
});

function normalizeWhitespace(input: string): string {
  return input.normalize("NFC").replace(/\s+/g, " ").trim();
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parses marketplace price text into a non-negative number. Dots followed by
 * exactly three digits are thousands separators ("150.000" is 150000); a single
 * dot with any other group length is a decimal point. Unparsable input yields 0.
 */
export function parsePrice(raw: string | number | null | undefined): number {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw > 0 ? roundPrice(raw) : 0;
  }

  if (typeof raw !== "string") {
    return 0;
  }

  let cleaned = raw.replace(/,/g, "").replace(CURRENCY_NOISE, "");

  const rangeSplit = cleaned.split(/[-–~]/);
  cleaned = rangeSplit[0] ?? "";

  if (!/^\d+(?:\.\d+)*$/.test(cleaned)) {
    return 0;
  }

  const parts = cleaned.split(".");
  if (parts.length > 2 || (parts.length === 2 && parts[1].length === 3)) {
    cleaned = parts.join("");
  }

  const value = Number(cleaned);
  return Number.isFinite(value) && value > 0 ? roundPrice(value) : 0;
}

/**
 * Parses sold/review counters such as "1.2k", "3M", "Đã bán 5k+", "1.234",
 * "2 triệu" or "980 sold". Returns null when no number is present.
 */
export function parseShorthandCount(raw: string | number | null | undefined): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? Math.floor(raw) : null;
  }

  if (typeof raw !== "string") {
    return null;
  }

  // A suffix only counts when it ends the word: "10 mua" is ten, not ten million.
  const match = raw.toLowerCase().match(/(\d+(?:[.,]\d+)*)\s*(?:(triệu|tr|k|m|nghìn|ngàn)(?![a-zà-ỹ]))?/);
  if (!match) {
    return null;
  }

  const digits = match[1];
  const suffix = match[2];

  if (!suffix) {
    const grouped = /^\d{1,3}(?:[.,]\d{3})+$/.test(digits);
    const value = Number(grouped ? digits.replace(/[.,]/g, "") : digits.replace(",", "."));
    return Number.isFinite(value) ? Math.floor(value) : null;
  }

  const base = Number(digits.replace(",", "."));
  if (!Number.isFinite(base)) {
    return null;
  }

  const multiplier = suffix === "m" || suffix === "tr" || suffix === "triệu" ? 1_000_000 : 1000;
  return Math.round(base * multiplier);
}

export function coerceRating(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined || raw === "") {
    return null;
  }

  const value = typeof raw === "number" ? raw : Number(raw.trim().replace(",", "."));
  if (!Number.isFinite(value) || value < 0 || value > 5) {
    return null;
  }

  return Math.round(value * 100) / 100;
}

export function extractKeywords(text: string): string[] {
  return normalizeWhitespace(text)
    .toLowerCase()
    .split(" ")
    .filter((word) => word.length > 2 && !KEYWORD_STOP_WORDS.has(word))
    .slice(0, 10);
}

export function detectPlatform(url: string): Platform | null {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }

  if (hostname === "shopee.vn" || hostname.endsWith(".shopee.vn")) {
    return "shopee";
  }

  if (hostname === "lazada.vn" || hostname.endsWith(".lazada.vn")) {
    return "lazada";
  }

  if (hostname === "tiki.vn" || hostname.endsWith(".tiki.vn")) {
    return "tiki";
  }

  return null;
}

export function toAbsoluteUrl(href: string | null | undefined, origin: string): string | null {
  if (!href) {
    return null;
  }

  const trimmed = href.trim();
  if (trimmed.startsWith("//")) {
    return `https:${trimmed}`;
  }

  try {
    return new URL(trimmed, origin).toString();
  } catch {
    return null;
  }
}

function cleanOptionalText(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const cleaned = normalizeWhitespace(value);
  return cleaned.length > 0 ? cleaned : null;
}

export function normalizeCandidate(raw: CrawledCandidate, sourceUrl: string): NormalizedCandidate | null {
  const name = normalizeWhitespace(raw.name ?? "");
  if (!name) {
    return null;
  }

  const productUrl = raw.link?.trim() || sourceUrl;

  return {
    key: productUrl,
    platform: raw.platform,
    name,
    productUrl,
    sourceUrl,
    price: parsePrice(raw.price),
    ratingScore: coerceRating(raw.rating),
    reviewCount: parseShorthandCount(raw.reviewCount),
    salesCount: parseShorthandCount(raw.sold),
    isMall: raw.isMall ?? null,
    isVerifiedSeller: raw.isVerifiedSeller ?? null,
    brand: cleanOptionalText(raw.brand),
    sellerLocation: cleanOptionalText(raw.sellerLocation),
    trustScore: null,
    trustBadgeType: raw.isMall ? "mall" : null,
    keywords: extractKeywords(name),
    imageUrls: raw.img ? [raw.img] : []
  };
}

export function dedupeCandidates(candidates: NormalizedCandidate[]): NormalizedCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.key)) {
      return false;
    }

    seen.add(candidate.key);
    return true;
  });
}

export function normalizeCandidates(
  items: Array<{ candidate: CrawledCandidate; sourceUrl: string }>
): NormalizedCandidate[] {
  const normalized = items
    .map((item) => normalizeCandidate(item.candidate, item.sourceUrl))
    .filter((candidate): candidate is NormalizedCandidate => candidate !== null);

  return dedupeCandidates(normalized);
}
