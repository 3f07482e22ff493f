export type Platform = "shopee" | "lazada" | "tiki";

export const PLATFORMS: readonly Platform[] = ["shopee", "lazada", "tiki"];

export const MIN_DISCOVERY_BUDGET = 1;
export const MAX_DISCOVERY_BUDGET = 20;
export const DEFAULT_MAX_PRODUCTS = 10;
export const MAX_RAW_INPUT_LENGTH = 2000;

export type DiscoveryStage =
  | "input"
  | "project"
  | "intent"
  | "criteria"
  | "search"
  | "crawl"
  | "filter"
  | "rank"
  | "import";

export type DiscoveryErrorKind =
  | "InvalidInput"
  | "InputTooLong"
  | "ProjectNotFound"
  | "ProjectIncomplete"
  | "UnsupportedPlatform"
  | "ParsingFailed"
  | "IntentParsingFailed"
  | "CriteriaValidationFailed"
  | "NoProductsFound"
  | "CrawlFailed"
  | "NoProductsAfterFilter"
  | "ImportFailed"
  | "ExecutionError";

export interface ProjectContext {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly targetProductName: string;
  readonly targetProductCategory: string;
  readonly targetBudget: number | null;
  readonly currency: string;
  readonly status: string;
  readonly pipelineType: string;
}

export interface FilterCriteria {
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
  maxRating?: number;
  minReviewCount?: number;
  maxReviewCount?: number;
  minSalesCount?: number;
  maxSalesCount?: number;
  minTrustScore?: number;
  maxTrustScore?: number;
  platforms?: Platform[];
  isMall?: boolean;
  isVerifiedSeller?: boolean;
  requiredKeywords?: string[];
  excludedKeywords?: string[];
  requiredBrands?: string[];
  excludedBrands?: string[];
  sellerLocations?: string[];
  trustBadgeTypes?: string[];
}

export interface CrawledCandidate {
  name: string;
  price: string | number | null;
  sold: string | number | null;
  rating: string | number | null;
  img: string | null;
  link: string | null;
  platform: Platform;
  reviewCount?: number | null;
  brand?: string | null;
  sellerLocation?: string | null;
  isMall?: boolean | null;
  isVerifiedSeller?: boolean | null;
}

export interface CrawledReview {
  author: string;
  rating: number | null;
  content: string;
  postedAt: string | null;
  images: string[];
  helpfulCount: number;
}

export interface CrawledProductDetail {
  link: string;
  category: string | null;
  description: string | null;
  totalRating: number | null;
}

export interface NormalizedCandidate {
  key: string;
  platform: Platform;
  name: string;
  productUrl: string;
  sourceUrl: string;
  price: number;
  ratingScore: number | null;
  reviewCount: number | null;
  salesCount: number | null;
  isMall: boolean | null;
  isVerifiedSeller: boolean | null;
  brand: string | null;
  sellerLocation: string | null;
  trustScore: number | null;
  trustBadgeType: string | null;
  keywords: string[];
  imageUrls: string[];
}

export interface NaturalLanguageDiscoveryRequest {
  projectId: string;
  rawText: string;
}

export interface StructuredDiscoveryRequest {
  projectId: string;
  query: string;
  filterText?: string | null;
  maxProducts: number;
}

export type DiscoveryRequest = NaturalLanguageDiscoveryRequest | StructuredDiscoveryRequest;

export interface DiscoveryResult {
  status: "success" | "error";
  message: string;
  errorType: DiscoveryErrorKind | null;
  stage: DiscoveryStage | null;
  query: string | null;
  maxProducts: number | null;
  foundCount: number;
  filteredCount: number;
  selectedCount: number;
  importedCount: number;
  importedIds: string[];
  skipped: {
    duplicates: number;
    failed: number;
  };
  extractedCriteria: FilterCriteria | null;
  suggestedPlatforms: Platform[] | null;
}
