import { redactText } from "@/lib/security/redaction";
import type { NormalizedCandidate } from "@/lib/types";

export interface ProductRepository {
  findExistingProductUrls(projectId: string, productUrls: string[]): Promise<Set<string>>;
  insertDiscoveredProduct(projectId: string, candidate: NormalizedCandidate): Promise<string | null>;
}

export interface ImportSummary {
  importedIds: string[];
  skipped: {
    duplicates: number;
    failed: number;
  };
}

/**
 * Writes candidates one row at a time. Repeats within the batch, URLs the
 * project already holds and rows lost to a concurrent insert count as
 * duplicates; rows that throw count as failed and do not stop the batch.
 */
export async function importCandidates(
  repository: ProductRepository,
  input: { projectId: string; candidates: NormalizedCandidate[] }
): Promise<ImportSummary> {
  const seen = new Set<string>();
  const unique: NormalizedCandidate[] = [];
  let duplicates = 0;

  for (const candidate of input.candidates) {
    if (seen.has(candidate.productUrl)) {
      duplicates += 1;
      continue;
    }

    seen.add(candidate.productUrl);
    unique.push(candidate);
  }

  const existing = await repository.findExistingProductUrls(
    input.projectId,
    unique.map((candidate) => candidate.productUrl)
  );

  const importedIds: string[] = [];
  let failed = 0;

  for (const candidate of unique) {
    if (existing.has(candidate.productUrl)) {
      duplicates += 1;
      continue;
    }

    try {
      const id = await repository.insertDiscoveredProduct(input.projectId, candidate);
      if (id) {
        importedIds.push(id);
      } else {
        duplicates += 1;
      }
    } catch (error) {
      failed += 1;
      console.warn("[import] failed to insert discovered product", {
        projectId: input.projectId,
        productUrl: candidate.productUrl,
        error: redactText(error instanceof Error ? error.message : String(error))
      });
    }
  }

  console.log(
    `[import] project=${input.projectId} imported=${importedIds.length} duplicates=${duplicates} failed=${failed}`
  );

  return { importedIds, skipped: { duplicates, failed } };
}
