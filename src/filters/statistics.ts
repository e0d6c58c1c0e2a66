export interface StatisticsSnapshot {
  blockedRequests: number;
  blockedElements: number;
}

/**
 * Blocked request/element counters. Callers increment them after acting on
 * a positive decision; the decision paths never touch them.
 */
export class FilterStatistics {
  private blockedRequests = 0;
  private blockedElements = 0;

  get blockedRequestsCount(): number {
    return this.blockedRequests;
  }

  get blockedElementsCount(): number {
    return this.blockedElements;
  }

  incrementBlockedRequestCount(): void {
    this.blockedRequests++;
  }

  incrementBlockedElementCount(count: number = 1): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Blocked element count must be a positive integer, got ${count}`);
    }
    this.blockedElements += count;
  }

  reset(): void {
    this.blockedRequests = 0;
    this.blockedElements = 0;
  }

  toJSON(): StatisticsSnapshot {
    return {
      blockedRequests: this.blockedRequests,
      blockedElements: this.blockedElements,
    };
  }
}
