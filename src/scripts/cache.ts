import { CDNFileListing, PackageMetadata } from "./interfaces";

/**
 * Process-lifetime store keyed by string. Entries never expire: registries
 * are append-only per version, so a stored value stays correct.
 *
 * Map reads and writes are synchronous, so the event loop keeps each access
 * exclusive; the load runs between them. Every miss runs its own load with
 * its caller's signal, so two concurrent first-time lookups of one key both
 * fetch and the later store wins. A rejected load stores nothing.
 */
export class FetchCache<T> {
  private entries: Map<string, T> = new Map();

  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await load();
    this.entries.set(key, value);
    return value;
  }
}

export class ResolverCache {
  readonly metadata: FetchCache<PackageMetadata> = new FetchCache();
  readonly listings: FetchCache<CDNFileListing> = new FetchCache();
}
