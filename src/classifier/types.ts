/**
 * Artifact descriptor types for CRAN-style repository paths
 */

/** Kind of artifact a request path points at */
export type ArtifactType =
  | "index_rds"
  | "index_gz"
  | "index_text"
  | "src_tar"
  | "archive_tar"
  | "win_zip"
  | "mac_tgz"
  | "unknown";

/** Binary platforms that carry an OS tag */
export type ArtifactOs = "windows" | "macos";

/**
 * Structured view of a request path.
 * Field names match the serialized log shape.
 */
export interface ArtifactDescriptor {
  readonly artifact_type: ArtifactType;
  readonly package: string | null;
  readonly version: string | null;
  readonly r_minor: string | null;
  readonly os: ArtifactOs | null;
}

/**
 * A single classification rule over the `/`-separated path segments:
 * a descriptor, or null when the rule does not apply
 */
export type PathMatcher = (segments: readonly string[]) => ArtifactDescriptor | null;
