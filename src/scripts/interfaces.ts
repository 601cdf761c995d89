export interface PackageSpec {
  name: string; // Snippet and template identity
  file?: string; // Explicit file to include, otherwise the default entry point
  packageName?: string; // Registry identity, defaults to name
}

export interface VersionAssets {
  jsdelivr?: string;
  unpkg?: string;
  module?: string;
  main?: string;
}

export interface PackageMetadata {
  distTags?: { [tag: string]: string };
  versions: { [version: string]: VersionAssets };
}

// Normalized file path -> content hash
export interface CDNFileListing {
  [filePath: string]: string;
}

export interface ResolvedPackage extends PackageSpec {
  packageName: string;
  version: string;
  file: string; // Root-prefixed, e.g. "/dist/index.js"
  integrity: string; // SRI value, e.g. "sha256-..."
  src: string;
}

export interface ResolverEndpoints {
  registryUrl: string;
  cdnDataUrl: string;
  cdnAssetUrl: string;
}

export interface GeneratorOptions {
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}
