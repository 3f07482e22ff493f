export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ScraperHttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = "ScraperHttpError";
    this.status = status;
    this.url = url;
  }
}

export interface ScraperHttpOptions {
  userAgent: string;
  fetchImpl?: FetchLike;
}

export interface ScraperHttpClient {
  getJson(url: string, input: { referer: string; signal?: AbortSignal }): Promise<unknown>;
  getText(url: string, input: { referer: string; signal?: AbortSignal }): Promise<string>;
}

export function createScraperHttpClient(options: ScraperHttpOptions): ScraperHttpClient {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  async function request(url: string, input: { referer: string; signal?: AbortSignal; accept: string }): Promise<Response> {
    const response = await fetchImpl(url, {
      headers: {
        "user-agent": options.userAgent,
        accept: input.accept,
        referer: input.referer,
        "x-requested-with": "XMLHttpRequest"
      },
      redirect: "follow",
      signal: input.signal
    });

    if (!response.ok) {
      throw new ScraperHttpError(url, response.status);
    }

    return response;
  }

  return {
    async getJson(url, input) {
      const response = await request(url, { ...input, accept: "application/json,text/plain,*/*" });
      return (await response.json()) as unknown;
    },
    async getText(url, input) {
      const response = await request(url, { ...input, accept: "text/html,application/xhtml+xml,*/*" });
      return response.text();
    }
  };
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  return value && typeof value === "object" && !Array.isArray(value) ? (value as Record<string, unknown>) : null;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function readString(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return null;
}

export function readNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}
