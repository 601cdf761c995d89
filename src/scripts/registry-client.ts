import axios, { AxiosInstance, AxiosResponse } from "axios";
import {
  canceledError,
  listingUnavailable,
  metadataUnavailable,
  transportError,
} from "./errors";
import {
  CDNFileListing,
  PackageMetadata,
  ResolverEndpoints,
  VersionAssets,
} from "./interfaces";
import { CdnUtils, isObjectRecord, parseStringRecord } from "./utils";

export const DEFAULT_ENDPOINTS: ResolverEndpoints = {
  registryUrl: "https://registry.npmjs.org",
  cdnDataUrl: "https://data.jsdelivr.com/v1/package/npm",
  cdnAssetUrl: "https://cdn.jsdelivr.net/npm",
};

export const DEFAULT_TIMEOUT = 10000;

const ASSET_FIELDS = ["jsdelivr", "unpkg", "module", "main"] as const;

function parseVersionAssets(value: unknown): VersionAssets {
  const assets: VersionAssets = {};
  if (!isObjectRecord(value)) {
    return assets;
  }

  for (const field of ASSET_FIELDS) {
    const entry = value[field];
    if (typeof entry === "string") {
      assets[field] = entry;
    }
  }
  return assets;
}

export function parsePackageMetadata(data: unknown): PackageMetadata | null {
  if (!isObjectRecord(data)) {
    return null;
  }

  const versions: { [version: string]: VersionAssets } = {};
  const rawVersions = data["versions"];
  if (isObjectRecord(rawVersions)) {
    for (const [version, entry] of Object.entries(rawVersions)) {
      versions[version] = parseVersionAssets(entry);
    }
  }

  return {
    distTags: parseStringRecord(data["dist-tags"]),
    versions,
  };
}

export function parseFileListing(data: unknown): CDNFileListing | null {
  if (!isObjectRecord(data) || !Array.isArray(data["files"])) {
    return null;
  }

  const listing: CDNFileListing = {};
  for (const file of data["files"]) {
    if (
      isObjectRecord(file) &&
      typeof file["name"] === "string" &&
      typeof file["hash"] === "string"
    ) {
      listing[file["name"]] = file["hash"];
    }
  }
  return listing;
}

function isSuccess(response: AxiosResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

function statusText(response: AxiosResponse): string {
  return `${response.status} ${response.statusText}`.trim();
}

export class RegistryClient {
  private http: AxiosInstance;
  private endpoints: ResolverEndpoints;

  constructor(
    endpoints: Partial<ResolverEndpoints> = {},
    http: AxiosInstance = axios.create({ timeout: DEFAULT_TIMEOUT })
  ) {
    this.endpoints = { ...DEFAULT_ENDPOINTS, ...endpoints };
    this.http = http;
  }

  get assetBaseUrl(): string {
    return this.endpoints.cdnAssetUrl;
  }

  metadataUrl(packageName: string): string {
    return `${CdnUtils.trimBaseUrl(this.endpoints.registryUrl)}/${packageName}`;
  }

  listingUrl(packageName: string, version: string): string {
    return `${CdnUtils.trimBaseUrl(this.endpoints.cdnDataUrl)}/${CdnUtils.listingKey(
      packageName,
      version
    )}/flat`;
  }

  async fetchPackageMetadata(
    packageName: string,
    signal?: AbortSignal
  ): Promise<PackageMetadata> {
    const url = this.metadataUrl(packageName);
    const response = await this.get(packageName, url, signal);

    if (!isSuccess(response)) {
      throw metadataUnavailable(packageName, statusText(response), response.status);
    }

    const metadata = parsePackageMetadata(response.data);
    if (!metadata) {
      throw metadataUnavailable(packageName, "malformed response", response.status);
    }
    return metadata;
  }

  async fetchFileListing(
    packageName: string,
    version: string,
    signal?: AbortSignal
  ): Promise<CDNFileListing> {
    const url = this.listingUrl(packageName, version);
    const response = await this.get(packageName, url, signal);

    if (!isSuccess(response)) {
      throw listingUnavailable(
        packageName,
        version,
        url,
        statusText(response),
        response.status
      );
    }

    const listing = parseFileListing(response.data);
    if (!listing) {
      throw listingUnavailable(
        packageName,
        version,
        url,
        "malformed response",
        response.status
      );
    }
    return listing;
  }

  private async get(
    packageName: string,
    url: string,
    signal?: AbortSignal
  ): Promise<AxiosResponse> {
    if (signal?.aborted) {
      throw canceledError(packageName, url);
    }

    try {
      return await this.http.get(url, {
        signal,
        headers: { Accept: "application/json" },
        responseType: "json",
        // Status handling happens above, where the failing step is known
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isCancel(error)) {
        throw canceledError(packageName, url);
      }
      throw transportError(packageName, url, error);
    }
  }
}
