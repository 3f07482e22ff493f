import { throwIfCancelled } from "@/lib/abort";
import { validateCriteria } from "@/lib/ai/criteria-validator";
import { parseFilterCriteria } from "@/lib/ai/filter-intent-parser";
import { parseDiscoveryIntent } from "@/lib/ai/intent-parser";
import { extractSearchUrls, searchProducts } from "@/lib/ai/product-search";
import { rankAndSelect } from "@/lib/ai/ranking";
import { escapeHtml, sendAdminAlertWithTimeout } from "@/lib/alerts";
import { importCandidates, type ProductRepository } from "@/lib/discovery/importer";
import { DiscoveryError, errorMessage, isDiscoveryError } from "@/lib/errors";
import { checkPlatformSupport, enabledPlatforms, type PlatformPolicy } from "@/lib/filtering/criteria";
import { filterCandidates } from "@/lib/filtering/filter";
import type { ModelCaller } from "@/lib/llm/resilience";
import { isValidDiscoveryBudget } from "@/lib/request";
import { CrawlBudget } from "@/lib/scraping/crawl-budget";
import { crawlSources } from "@/lib/scraping/dispatcher";
import { normalizeCandidates } from "@/lib/scraping/normalize";
import type { ScraperRegistry } from "@/lib/scraping/scrapers/index";
import { redactSensitiveData, redactText } from "@/lib/security/redaction";
import {
  MAX_DISCOVERY_BUDGET,
  MAX_RAW_INPUT_LENGTH,
  MIN_DISCOVERY_BUDGET,
  type DiscoveryRequest,
  type DiscoveryResult,
  type DiscoveryStage,
  type FilterCriteria,
  type NaturalLanguageDiscoveryRequest,
  type Platform,
  type ProjectContext,
  type StructuredDiscoveryRequest
} from "@/lib/types";

export interface ProjectRepository {
  getProjectContext(projectId: string): Promise<ProjectContext | null>;
}

export interface DiscoveryDependencies {
  model: ModelCaller;
  projects: ProjectRepository;
  products: ProductRepository;
  scrapers: ScraperRegistry;
  platformPolicy: PlatformPolicy;
  crawlCap: number;
  crawlConcurrency: number;
  crawlTimeoutMs: number;
  alert?: (subject: string, html: string) => Promise<void>;
}

export interface DiscoveryRunOptions {
  signal?: AbortSignal;
}

interface RunProgress {
  stage: DiscoveryStage;
  query: string | null;
  maxProducts: number | null;
  foundCount: number;
  filteredCount: number;
  selectedCount: number;
  criteria: FilterCriteria | null;
}

function newProgress(): RunProgress {
  return {
    stage: "input",
    query: null,
    maxProducts: null,
    foundCount: 0,
    filteredCount: 0,
    selectedCount: 0,
    criteria: null
  };
}

function errorResult(progress: RunProgress, error: DiscoveryError): DiscoveryResult {
  return {
    status: "error",
    message: error.message,
    errorType: error.kind,
    stage: error.stage,
    query: progress.query,
    maxProducts: progress.maxProducts,
    foundCount: progress.foundCount,
    filteredCount: progress.filteredCount,
    selectedCount: progress.selectedCount,
    importedCount: 0,
    importedIds: [],
    skipped: { duplicates: 0, failed: 0 },
    extractedCriteria: error.details.extractedCriteria ?? progress.criteria,
    suggestedPlatforms: error.details.suggestedPlatforms ?? null
  };
}

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

function isNaturalLanguageRequest(request: DiscoveryRequest): request is NaturalLanguageDiscoveryRequest {
  return "rawText" in request;
}

function characterLength(text: string): number {
  return Array.from(text).length;
}

function validateStructuredRequest(request: StructuredDiscoveryRequest): void {
  if (isBlank(request.projectId)) {
    throw new DiscoveryError("InvalidInput", "input", "projectId is required");
  }

  if (isBlank(request.query)) {
    throw new DiscoveryError("InvalidInput", "input", "query must not be empty");
  }

  if (
    characterLength(request.query) > MAX_RAW_INPUT_LENGTH ||
    characterLength(request.filterText ?? "") > MAX_RAW_INPUT_LENGTH
  ) {
    throw new DiscoveryError("InputTooLong", "input", `Input is too long (max ${MAX_RAW_INPUT_LENGTH} characters)`);
  }

  if (!isValidDiscoveryBudget(request.maxProducts)) {
    throw new DiscoveryError(
      "InvalidInput",
      "input",
      `maxProducts must be an integer between ${MIN_DISCOVERY_BUDGET} and ${MAX_DISCOVERY_BUDGET}`
    );
  }
}

function validateNaturalLanguageRequest(request: NaturalLanguageDiscoveryRequest): void {
  if (isBlank(request.projectId)) {
    throw new DiscoveryError("InvalidInput", "input", "projectId is required");
  }

  if (isBlank(request.rawText)) {
    throw new DiscoveryError("InvalidInput", "input", "Input must not be empty");
  }

  if (characterLength(request.rawText) > MAX_RAW_INPUT_LENGTH) {
    throw new DiscoveryError("InputTooLong", "input", `Input is too long (max ${MAX_RAW_INPUT_LENGTH} characters)`);
  }
}

async function loadProject(deps: DiscoveryDependencies, projectId: string): Promise<ProjectContext> {
  const project = await deps.projects.getProjectContext(projectId.trim());
  if (!project) {
    throw new DiscoveryError("ProjectNotFound", "project", `Project ${projectId} not found`);
  }

  return project;
}

function searchPlatforms(criteria: FilterCriteria | null, policy: PlatformPolicy): Platform[] {
  const enabled = enabledPlatforms(policy);
  const requested = criteria?.platforms?.filter((platform) => enabled.includes(platform)) ?? [];
  return requested.length > 0 ? requested : enabled;
}

async function resolveCriteria(
  deps: DiscoveryDependencies,
  progress: RunProgress,
  filterText: string | null | undefined,
  signal: AbortSignal | undefined
): Promise<FilterCriteria | null> {
  if (!filterText || isBlank(filterText)) {
    return null;
  }

  const criteria = await parseFilterCriteria(deps.model, { filterText, signal });
  progress.criteria = criteria;

  const support = checkPlatformSupport(criteria, deps.platformPolicy);
  if (!support.supported) {
    throw new DiscoveryError(
      "UnsupportedPlatform",
      "criteria",
      `Platform not supported: ${support.unsupported.join(", ")}. Try ${support.suggested.join(", ")} instead.`,
      { extractedCriteria: criteria, suggestedPlatforms: support.suggested }
    );
  }

  throwIfCancelled(signal, "discovery");
  const verdict = await validateCriteria(deps.model, { filterText, criteria, signal });
  if (!verdict.valid) {
    throw new DiscoveryError("CriteriaValidationFailed", "criteria", verdict.reason, { extractedCriteria: criteria });
  }

  return criteria;
}

async function executePipeline(
  deps: DiscoveryDependencies,
  progress: RunProgress,
  input: { project: ProjectContext; query: string; filterText: string | null | undefined; maxProducts: number },
  signal: AbortSignal | undefined
): Promise<DiscoveryResult> {
  progress.query = input.query;
  progress.maxProducts = input.maxProducts;

  progress.stage = "criteria";
  throwIfCancelled(signal, "discovery");
  const criteria = await resolveCriteria(deps, progress, input.filterText, signal);

  progress.stage = "search";
  throwIfCancelled(signal, "discovery");
  const platforms = searchPlatforms(criteria, deps.platformPolicy);
  const recommendations = await searchProducts(deps.model, {
    query: input.query,
    project: input.project,
    platforms,
    limit: input.maxProducts * 2,
    signal
  });
  const urls = extractSearchUrls(recommendations, platforms);
  if (recommendations.length === 0 || urls.length === 0) {
    throw new DiscoveryError("NoProductsFound", "search", `No products found for "${input.query}"`);
  }

  progress.stage = "crawl";
  throwIfCancelled(signal, "discovery");
  const crawl = await crawlSources({
    urls,
    registry: deps.scrapers,
    budget: new CrawlBudget(deps.crawlCap),
    concurrency: deps.crawlConcurrency,
    timeoutMs: deps.crawlTimeoutMs,
    signal
  });
  const crawled = normalizeCandidates(crawl.candidates);
  progress.foundCount = crawled.length;
  if (crawled.length === 0) {
    throw new DiscoveryError(
      "CrawlFailed",
      "crawl",
      `Could not crawl any products from ${urls.length} source(s); the links may be invalid or the platforms may be blocking requests`
    );
  }

  progress.stage = "filter";
  const filtered = filterCandidates(crawled, criteria);
  progress.filteredCount = filtered.length;
  if (filtered.length === 0) {
    throw new DiscoveryError(
      "NoProductsAfterFilter",
      "filter",
      `None of the ${crawled.length} crawled products match the criteria; try looser filters`
    );
  }

  progress.stage = "rank";
  throwIfCancelled(signal, "discovery");
  const ranking = await rankAndSelect(deps.model, {
    candidates: filtered,
    query: input.query,
    criteria,
    limit: input.maxProducts,
    signal
  });
  progress.selectedCount = ranking.selected.length;

  progress.stage = "import";
  throwIfCancelled(signal, "discovery");
  const summary = await importCandidates(deps.products, {
    projectId: input.project.id,
    candidates: ranking.selected
  });
  if (summary.importedIds.length === 0) {
    throw new DiscoveryError(
      "ImportFailed",
      "import",
      `None of the ${ranking.selected.length} selected products could be imported (duplicates=${summary.skipped.duplicates}, failed=${summary.skipped.failed})`
    );
  }

  const skippedTotal = summary.skipped.duplicates + summary.skipped.failed;
  const message =
    skippedTotal > 0
      ? `Imported ${summary.importedIds.length} products (${skippedTotal} skipped as duplicates or failures)`
      : `Imported ${summary.importedIds.length} products`;

  console.log(
    `[discovery] project=${input.project.id} query="${input.query}" found=${crawled.length} filtered=${filtered.length} selected=${ranking.selected.length} (${ranking.method}) imported=${summary.importedIds.length}`
  );

  return {
    status: "success",
    message,
    errorType: null,
    stage: null,
    query: input.query,
    maxProducts: input.maxProducts,
    foundCount: crawled.length,
    filteredCount: filtered.length,
    selectedCount: ranking.selected.length,
    importedCount: summary.importedIds.length,
    importedIds: summary.importedIds,
    skipped: summary.skipped,
    extractedCriteria: criteria,
    suggestedPlatforms: null
  };
}

function buildFailureAlertHtml(input: { projectId: string; result: DiscoveryResult }): string {
  const { result } = input;
  return [
    `<p>Project: ${escapeHtml(input.projectId)}</p>`,
    `<p>Error: ${escapeHtml(result.errorType ?? "unknown")} at stage ${escapeHtml(result.stage ?? "unknown")}</p>`,
    `<p>${escapeHtml(result.message)}</p>`,
    `<p>Query: ${escapeHtml(result.query ?? "-")} (found=${result.foundCount}, filtered=${result.filteredCount})</p>`
  ].join("");
}

async function finalize(
  deps: DiscoveryDependencies,
  projectId: string,
  progress: RunProgress,
  signal: AbortSignal | undefined,
  run: () => Promise<DiscoveryResult>
): Promise<DiscoveryResult> {
  let result: DiscoveryResult;

  try {
    result = await run();
  } catch (error) {
    const discoveryError = isDiscoveryError(error)
      ? error
      : new DiscoveryError("ExecutionError", progress.stage, `Discovery failed during ${progress.stage}: ${redactText(errorMessage(error))}`);

    if (discoveryError.kind === "ExecutionError") {
      console.error(
        "[discovery] run failed",
        redactSensitiveData({ projectId, stage: discoveryError.stage, error: discoveryError.message, query: progress.query })
      );
    } else {
      console.warn(
        "[discovery] run stopped",
        redactSensitiveData({ projectId, kind: discoveryError.kind, stage: discoveryError.stage, details: discoveryError.details })
      );
    }

    result = errorResult(progress, discoveryError);
  }

  const alertable = result.errorType === "ExecutionError" || result.errorType === "CrawlFailed";
  if (deps.alert && alertable && !signal?.aborted) {
    await sendAdminAlertWithTimeout(
      `Product discovery ${result.errorType} (${projectId})`,
      buildFailureAlertHtml({ projectId, result }),
      deps.alert
    );
  }

  return result;
}

/**
 * Structured entry: query, optional filter phrase and an explicit budget.
 * Always resolves to a fully populated result envelope.
 */
export async function runDiscovery(
  deps: DiscoveryDependencies,
  request: DiscoveryRequest,
  options: DiscoveryRunOptions = {}
): Promise<DiscoveryResult> {
  if (isNaturalLanguageRequest(request)) {
    return runDiscoveryFromText(deps, request, options);
  }

  const progress = newProgress();
  return finalize(deps, request.projectId, progress, options.signal, async () => {
    validateStructuredRequest(request);

    progress.stage = "project";
    throwIfCancelled(options.signal, "discovery");
    const project = await loadProject(deps, request.projectId);

    return executePipeline(
      deps,
      progress,
      { project, query: request.query.trim(), filterText: request.filterText, maxProducts: request.maxProducts },
      options.signal
    );
  });
}

export async function runDiscoveryFromText(
  deps: DiscoveryDependencies,
  request: NaturalLanguageDiscoveryRequest,
  options: DiscoveryRunOptions = {}
): Promise<DiscoveryResult> {
  const progress = newProgress();
  return finalize(deps, request.projectId, progress, options.signal, async () => {
    validateNaturalLanguageRequest(request);

    progress.stage = "project";
    throwIfCancelled(options.signal, "discovery");
    const project = await loadProject(deps, request.projectId);
    if (isBlank(project.targetProductName)) {
      throw new DiscoveryError(
        "ProjectIncomplete",
        "project",
        "Project has no target product yet; set targetProductName before running discovery"
      );
    }

    progress.stage = "intent";
    throwIfCancelled(options.signal, "discovery");
    const intent = await parseDiscoveryIntent(deps.model, { rawText: request.rawText, project, signal: options.signal });

    return executePipeline(
      deps,
      progress,
      { project, query: intent.query, filterText: intent.filterText, maxProducts: intent.maxProducts },
      options.signal
    );
  });
}
