/**
 * Global cap on crawled results for one discovery run. Workers reserve units
 * before calling a scraper and release whatever the scraper did not use, so the
 * number of kept candidates can never exceed the cap.
 */
export class CrawlBudget {
  readonly cap: number;
  private available: number;

  constructor(cap: number) {
    if (!Number.isInteger(cap) || cap < 0) {
      throw new Error(`Crawl budget cap must be a non-negative integer, received ${cap}`);
    }

    this.cap = cap;
    this.available = cap;
  }

  get remaining(): number {
    return this.available;
  }

  get exhausted(): boolean {
    return this.available <= 0;
  }

  get used(): number {
    return this.cap - this.available;
  }

  reserve(requested: number): number {
    const granted = Math.max(0, Math.min(Math.floor(requested), this.available));
    this.available -= granted;
    return granted;
  }

  release(unused: number): void {
    const returned = Math.max(0, Math.floor(unused));
    this.available = Math.min(this.cap, this.available + returned);
  }
}

export function perSourceQuota(cap: number, sourceCount: number): number {
  if (sourceCount <= 0) {
    return 0;
  }

  return Math.max(1, Math.floor(cap / sourceCount));
}
