import * as path from "path";
import { VersionAssets } from "./interfaces";

export type SanitizedPath =
  | { ok: true; path: string }
  | { ok: false; reason: "EmptyPath" | "PathResolvesToRoot" };

// Consulted in order when no explicit file is configured
export const DEFAULT_FILE_FIELDS: ReadonlyArray<
  (assets: VersionAssets) => string | undefined
> = [
  (assets) => assets.jsdelivr,
  (assets) => assets.unpkg,
  (assets) => assets.module,
  (assets) => assets.main,
];

export const CdnUtils = {
  sanitizeFilePath(file: string): SanitizedPath {
    const trimmed = file.trim();
    if (trimmed === "") {
      return { ok: false, reason: "EmptyPath" };
    }

    let cleaned = path.posix.normalize("/" + trimmed);
    while (cleaned.length > 1 && cleaned.endsWith("/")) {
      cleaned = cleaned.slice(0, -1);
    }

    if (cleaned === "/") {
      return { ok: false, reason: "PathResolvesToRoot" };
    }

    return { ok: true, path: cleaned };
  },
  defaultFile(assets: VersionAssets): string | undefined {
    for (const field of DEFAULT_FILE_FIELDS) {
      const value = field(assets);
      if (value) {
        return value;
      }
    }
    return undefined;
  },
  trimBaseUrl(baseUrl: string): string {
    return baseUrl.replace(/\/+$/, "");
  },
  listingKey(packageName: string, version: string): string {
    return `${packageName}@${version}`;
  },
  toIntegrity(hash: string): string {
    return `sha256-${hash}`;
  },
  assetUrl(
    cdnAssetUrl: string,
    packageName: string,
    version: string,
    file: string
  ): string {
    return `${this.trimBaseUrl(cdnAssetUrl)}/${packageName}@${version}${file}`;
  },
};

export function isObjectRecord(
  value: unknown
): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Keeps only the string-valued entries of a JSON object
export function parseStringRecord(
  value: unknown
): { [key: string]: string } | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  const result: { [key: string]: string } = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry;
    }
  }
  return result;
}
