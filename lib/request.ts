import {
  DEFAULT_MAX_PRODUCTS,
  MAX_DISCOVERY_BUDGET,
  MIN_DISCOVERY_BUDGET,
  type DiscoveryRequest
} from "@/lib/types";

export function isValidDiscoveryBudget(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_DISCOVERY_BUDGET &&
    value <= MAX_DISCOVERY_BUDGET
  );
}

export function parseArgValue(args: string[], key: string): string | null {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === `--${key}`) {
      return args[index + 1] ?? null;
    }

    const prefix = `--${key}=`;
    if (token.startsWith(prefix)) {
      return token.slice(prefix.length);
    }
  }

  return null;
}

/**
 * `--project <id> --text "<request>"` selects the natural-language entry;
 * `--project <id> --query <q> [--filter <f>] [--max <n>]` the structured one.
 * The budget is passed through unvalidated so the run reports it.
 */
export function parseDiscoveryArgs(args: string[]): DiscoveryRequest {
  const projectId = parseArgValue(args, "project")?.trim();
  if (!projectId) {
    throw new Error("Missing --project <id>");
  }

  const rawText = parseArgValue(args, "text");
  if (rawText !== null) {
    return { projectId, rawText };
  }

  const query = parseArgValue(args, "query");
  if (query === null) {
    throw new Error("Provide either --text or --query");
  }

  const max = parseArgValue(args, "max");

  return {
    projectId,
    query,
    filterText: parseArgValue(args, "filter"),
    maxProducts: max === null ? DEFAULT_MAX_PRODUCTS : Number(max)
  };
}
