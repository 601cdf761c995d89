import * as semver from "semver";
import { ResolverCache } from "./cache";
import {
  emptyPath,
  fileNotOnCDN,
  noDefaultFile,
  noLatestVersion,
  pathResolvesToRoot,
  versionAssetsMissing,
} from "./errors";
import {
  CDNFileListing,
  PackageMetadata,
  PackageSpec,
  ResolvedPackage,
} from "./interfaces";
import { RegistryClient } from "./registry-client";
import { CdnUtils } from "./utils";

/**
 * Turns a package spec into a version-pinned asset reference: the latest
 * version from the npm registry, a file picked from the spec or the version's
 * entry points, and that file's hash from the jsDelivr listing.
 *
 * Lookups are cached per instance, so one resolver shared across a batch
 * fetches each package's metadata and each version's listing once.
 */
export class CdnResolver {
  private client: RegistryClient;
  private cache: ResolverCache;

  constructor(
    client: RegistryClient = new RegistryClient(),
    cache: ResolverCache = new ResolverCache()
  ) {
    this.client = client;
    this.cache = cache;
  }

  async resolve(
    spec: PackageSpec,
    signal?: AbortSignal
  ): Promise<ResolvedPackage> {
    const packageName = spec.packageName || spec.name;

    const metadata = await this.packageMetadata(packageName, signal);
    const version = this.latestVersion(metadata, packageName, spec.name);

    const candidate =
      spec.file || this.defaultFile(metadata, packageName, spec.name, version);
    const file = this.sanitizeFile(candidate, packageName, spec.name);

    const listing = await this.fileListing(packageName, version, signal);
    const hash = listing[file];
    if (hash === undefined) {
      throw fileNotOnCDN(packageName, spec.name, version, file);
    }

    return {
      ...spec,
      packageName,
      version,
      file,
      integrity: CdnUtils.toIntegrity(hash),
      src: CdnUtils.assetUrl(
        this.client.assetBaseUrl,
        packageName,
        version,
        file
      ),
    };
  }

  private packageMetadata(
    packageName: string,
    signal?: AbortSignal
  ): Promise<PackageMetadata> {
    return this.cache.metadata.getOrLoad(packageName, () =>
      this.client.fetchPackageMetadata(packageName, signal)
    );
  }

  private fileListing(
    packageName: string,
    version: string,
    signal?: AbortSignal
  ): Promise<CDNFileListing> {
    return this.cache.listings.getOrLoad(
      CdnUtils.listingKey(packageName, version),
      () => this.client.fetchFileListing(packageName, version, signal)
    );
  }

  private latestVersion(
    metadata: PackageMetadata,
    packageName: string,
    snippet: string
  ): string {
    if (!metadata.distTags) {
      throw noLatestVersion(packageName, snippet, "no dist-tags found");
    }

    const latest = metadata.distTags["latest"];
    if (!latest) {
      throw noLatestVersion(packageName, snippet, "no latest dist-tag found");
    }

    if (!semver.valid(latest)) {
      throw noLatestVersion(
        packageName,
        snippet,
        `latest dist-tag ${JSON.stringify(latest)} is not a valid version`
      );
    }

    return latest;
  }

  private defaultFile(
    metadata: PackageMetadata,
    packageName: string,
    snippet: string,
    version: string
  ): string {
    const assets = metadata.versions[version];
    if (!assets) {
      throw versionAssetsMissing(packageName, snippet, version);
    }

    const file = CdnUtils.defaultFile(assets);
    if (!file) {
      throw noDefaultFile(packageName, snippet, version);
    }
    return file;
  }

  private sanitizeFile(
    file: string,
    packageName: string,
    snippet: string
  ): string {
    const result = CdnUtils.sanitizeFilePath(file);
    if (result.ok) {
      return result.path;
    }

    if (result.reason === "EmptyPath") {
      throw emptyPath(packageName, snippet);
    }
    throw pathResolvesToRoot(packageName, file, snippet);
  }
}
