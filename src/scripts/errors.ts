export type ResolveErrorKind =
  | "TransportError"
  | "MetadataUnavailable"
  | "ListingUnavailable"
  | "NoLatestVersion"
  | "VersionAssetsMissing"
  | "NoDefaultFile"
  | "EmptyPath"
  | "PathResolvesToRoot"
  | "FileNotOnCDN";

export interface ResolveErrorDetails {
  kind: ResolveErrorKind;
  message: string;
  packageName: string;
  snippet?: string;
  version?: string;
  file?: string;
  status?: number;
  cause?: unknown;
}

export class ResolveError extends Error {
  kind: ResolveErrorKind;

  packageName: string;

  snippet?: string;

  version?: string;

  file?: string;

  status?: number;

  constructor(details: ResolveErrorDetails) {
    super(details.message, { cause: details.cause });
    this.name = "ResolveError";
    this.kind = details.kind;
    this.packageName = details.packageName;
    this.snippet = details.snippet;
    this.version = details.version;
    this.file = details.file;
    this.status = details.status;
  }
}

export function transportError(
  packageName: string,
  url: string,
  cause: unknown
): ResolveError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ResolveError({
    kind: "TransportError",
    message: `request to ${url} for package ${packageName} failed: ${reason}`,
    packageName,
    cause,
  });
}

export function canceledError(packageName: string, url: string): ResolveError {
  return new ResolveError({
    kind: "TransportError",
    message: `request to ${url} for package ${packageName} was canceled`,
    packageName,
  });
}

export function metadataUnavailable(
  packageName: string,
  reason: string,
  status?: number
): ResolveError {
  return new ResolveError({
    kind: "MetadataUnavailable",
    message: `can't get latest version of package ${packageName} from npm: ${reason}`,
    packageName,
    status,
  });
}

export function listingUnavailable(
  packageName: string,
  version: string,
  url: string,
  reason: string,
  status?: number
): ResolveError {
  return new ResolveError({
    kind: "ListingUnavailable",
    message: `request to ${url} failed for ${packageName}@${version}: ${reason}`,
    packageName,
    version,
    status,
  });
}

export function noLatestVersion(
  packageName: string,
  snippet: string,
  reason: string
): ResolveError {
  return new ResolveError({
    kind: "NoLatestVersion",
    message: `${reason} for package ${snippet}`,
    packageName,
    snippet,
  });
}

export function versionAssetsMissing(
  packageName: string,
  snippet: string,
  version: string
): ResolveError {
  return new ResolveError({
    kind: "VersionAssetsMissing",
    message: `no pkg information found for ${snippet} version ${version}`,
    packageName,
    snippet,
    version,
  });
}

export function noDefaultFile(
  packageName: string,
  snippet: string,
  version: string
): ResolveError {
  return new ResolveError({
    kind: "NoDefaultFile",
    message: `no default file import found for ${packageName} version ${version}. Add it explicitly to the CDN data file`,
    packageName,
    snippet,
    version,
  });
}

export function emptyPath(packageName: string, snippet?: string): ResolveError {
  return new ResolveError({
    kind: "EmptyPath",
    message: `file path for package ${packageName} is empty`,
    packageName,
    snippet,
  });
}

export function pathResolvesToRoot(
  packageName: string,
  file: string,
  snippet?: string
): ResolveError {
  return new ResolveError({
    kind: "PathResolvesToRoot",
    message: `file path ${JSON.stringify(file)} for package ${packageName} resolves to root`,
    packageName,
    snippet,
    file,
  });
}

export function fileNotOnCDN(
  packageName: string,
  snippet: string,
  version: string,
  file: string
): ResolveError {
  return new ResolveError({
    kind: "FileNotOnCDN",
    message: `file ${file} for snippet ${snippet} not found on CDN (${packageName}@${version})`,
    packageName,
    snippet,
    version,
    file,
  });
}
