/**
 * Breadth-first frontier: per-depth queues plus the visited set.
 *
 * A URL is marked visited when it is enqueued, so a second discovery in the
 * same level is dropped. The visited set only grows. Visited entries are
 * stored under `keyOf(url)`; entries keep the URL as first discovered.
 */

export interface FrontierEntry {
  url: string;
  depth: number;
}

export class Frontier {
  private readonly visited = new Set<string>();
  private readonly levels = new Map<number, string[]>();

  constructor(private readonly keyOf: (url: string) => string = (url) => url) {}

  /** Starts the crawl at depth 0 */
  seed(url: string): void {
    this.enqueue(url, 0);
  }

  /**
   * Adds a URL at `depth` unless it was seen before. Returns whether it was added.
   */
  enqueue(url: string, depth: number): boolean {
    const key = this.keyOf(url);
    if (this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);

    const level = this.levels.get(depth);
    if (level) {
      level.push(url);
    } else {
      this.levels.set(depth, [url]);
    }
    return true;
  }

  /** Depth of the shallowest pending entries, or null when empty */
  get currentDepth(): number | null {
    let min: number | null = null;
    for (const depth of this.levels.keys()) {
      if (min === null || depth < min) min = depth;
    }
    return min;
  }

  /**
   * Removes and returns every entry at the minimum depth, in discovery order.
   */
  takeLevel(): FrontierEntry[] {
    const depth = this.currentDepth;
    if (depth === null) {
      return [];
    }
    const urls = this.levels.get(depth) ?? [];
    this.levels.delete(depth);
    return urls.map((url) => ({ url, depth }));
  }

  has(url: string): boolean {
    return this.visited.has(this.keyOf(url));
  }

  /** Pending entries across all depths */
  get size(): number {
    let total = 0;
    for (const urls of this.levels.values()) total += urls.length;
    return total;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get isEmpty(): boolean {
    return this.levels.size === 0;
  }
}
