import { RewriteMap } from '../models/types';

/**
 * Collects remote URL to local path pairs while fetch workers complete.
 * Workers share one instance; appends happen between awaits on the single
 * event loop thread, so no two writes interleave. Sealing marks the barrier
 * between the fetch and rewrite phases.
 */
export class RewriteMapAccumulator {
  private readonly mappings = new Map<string, string>();
  private sealed = false;

  /**
   * Record where a fetched URL was stored
   * @param url - Normalized remote URL
   * @param localPath - Path relative to the output root
   * @throws Error once the accumulator is sealed
   */
  public record(url: string, localPath: string): void {
    if (this.sealed) {
      throw new Error(`Rewrite map is sealed; cannot record ${url}`);
    }
    this.mappings.set(url, localPath);
  }

  public get size(): number {
    return this.mappings.size;
  }

  public isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Stop accepting entries and return a read-only snapshot of the map
   */
  public seal(): RewriteMap {
    this.sealed = true;
    return new Map(this.mappings);
  }
}
