import type { DiscoveryErrorKind, DiscoveryStage, FilterCriteria, Platform } from "@/lib/types";

export interface DiscoveryErrorDetails {
  extractedCriteria?: FilterCriteria;
  suggestedPlatforms?: Platform[];
  rawText?: string;
}

export class DiscoveryError extends Error {
  readonly kind: DiscoveryErrorKind;
  readonly stage: DiscoveryStage;
  readonly details: DiscoveryErrorDetails;

  constructor(kind: DiscoveryErrorKind, stage: DiscoveryStage, message: string, details: DiscoveryErrorDetails = {}) {
    super(message);
    this.name = "DiscoveryError";
    this.kind = kind;
    this.stage = stage;
    this.details = details;
  }
}

export function isDiscoveryError(error: unknown): error is DiscoveryError {
  return error instanceof DiscoveryError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown";
}
