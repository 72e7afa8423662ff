/**
 * Path classifier for CRAN-style repository paths
 * Rules are evaluated top-to-bottom, first match wins.
 *
 * Each rule looks at the trailing segments of the path; any prefix before
 * the repository root (`src/contrib`, `bin/...`) is accepted. Matching walks
 * the segments at most once per rule, so long paths cost linear time.
 */

import type { ArtifactDescriptor, ArtifactType, PathMatcher } from "./types.js";

const RE_R_MINOR = /^\d+\.\d+$/;

const INDEX_TYPES: ReadonlyMap<string, ArtifactType> = new Map<string, ArtifactType>([
  ["PACKAGES.rds", "index_rds"],
  ["PACKAGES.gz", "index_gz"],
  ["PACKAGES", "index_text"],
]);

const UNKNOWN: ArtifactDescriptor = Object.freeze({
  artifact_type: "unknown",
  package: null,
  version: null,
  r_minor: null,
  os: null,
});

/**
 * Split `<pkg>_<version><ext>` at the last underscore.
 * Package names never contain underscores; versions are taken verbatim.
 */
export function splitFilename(filename: string, ext: string): { package: string; version: string } | null {
  if (!filename.endsWith(ext)) return null;
  const stem = filename.slice(0, filename.length - ext.length);
  const sep = stem.lastIndexOf("_");
  if (sep <= 0 || sep === stem.length - 1) return null;
  return { package: stem.slice(0, sep), version: stem.slice(sep + 1) };
}

function descriptor(fields: Partial<ArtifactDescriptor> & Pick<ArtifactDescriptor, "artifact_type">): ArtifactDescriptor {
  return Object.freeze({ ...UNKNOWN, ...fields });
}

/** Segment counted from the end: 1 is the file name */
function fromEnd(segments: readonly string[], n: number): string | undefined {
  return segments[segments.length - n];
}

/** Whether `expected` occupies segments[start..] */
function segmentsAt(segments: readonly string[], start: number, expected: readonly string[]): boolean {
  if (start < 0) return false;
  return expected.every((name, i) => segments[start + i] === name);
}

/**
 * Whether segments before index `end` finish with `root` followed by at
 * least `minBetween` non-empty segments (platform directories and the like).
 * One right-to-left scan.
 */
function underRoot(segments: readonly string[], end: number, root: readonly string[], minBetween: number): boolean {
  let between = 0;
  for (let i = end - 1; i >= 0; i--) {
    if (between >= minBetween && segmentsAt(segments, i - root.length + 1, root)) return true;
    if (segments[i] === "") return false;
    between++;
  }
  return false;
}

/** `<R minor>/<file>` directly under a `contrib` directory */
function versionedContrib(segments: readonly string[]): boolean {
  return fromEnd(segments, 3) === "contrib" && RE_R_MINOR.test(fromEnd(segments, 2) ?? "");
}

// src/contrib/PACKAGES* or bin/<platform...>/contrib/<R minor>/PACKAGES*
const matchIndex: PathMatcher = (segments) => {
  const type = INDEX_TYPES.get(fromEnd(segments, 1) ?? "");
  if (!type) return null;
  if (segmentsAt(segments, segments.length - 3, ["src", "contrib"])) {
    return descriptor({ artifact_type: type });
  }
  if (versionedContrib(segments) && underRoot(segments, segments.length - 3, ["bin"], 1)) {
    return descriptor({ artifact_type: type });
  }
  return null;
};

const matchArchive: PathMatcher = (segments) => {
  if (segments.length < 5 || !segmentsAt(segments, segments.length - 5, ["src", "contrib", "Archive"])) return null;
  if (fromEnd(segments, 2) === "") return null;
  // The file name wins over the directory when the two disagree
  const parts = splitFilename(fromEnd(segments, 1) ?? "", ".tar.gz");
  if (!parts) return null;
  return descriptor({ artifact_type: "archive_tar", package: parts.package, version: parts.version });
};

const matchSource: PathMatcher = (segments) => {
  if (!segmentsAt(segments, segments.length - 3, ["src", "contrib"])) return null;
  const parts = splitFilename(fromEnd(segments, 1) ?? "", ".tar.gz");
  if (!parts) return null;
  return descriptor({ artifact_type: "src_tar", package: parts.package, version: parts.version });
};

const matchWindows: PathMatcher = (segments) => {
  if (!versionedContrib(segments) || !segmentsAt(segments, segments.length - 5, ["bin", "windows"])) return null;
  const parts = splitFilename(fromEnd(segments, 1) ?? "", ".zip");
  if (!parts) return null;
  return descriptor({
    artifact_type: "win_zip",
    package: parts.package,
    version: parts.version,
    r_minor: fromEnd(segments, 2) ?? null,
    os: "windows",
  });
};

// The platform directory (big-sur-arm64, ...) and the R minor segment are both optional
const matchMacos: PathMatcher = (segments) => {
  let rMinor: string | null;
  if (versionedContrib(segments) && underRoot(segments, segments.length - 3, ["bin", "macosx"], 0)) {
    rMinor = fromEnd(segments, 2) ?? null;
  } else if (fromEnd(segments, 2) === "contrib" && underRoot(segments, segments.length - 2, ["bin", "macosx"], 0)) {
    rMinor = null;
  } else {
    return null;
  }
  const parts = splitFilename(fromEnd(segments, 1) ?? "", ".tgz");
  if (!parts) return null;
  return descriptor({
    artifact_type: "mac_tgz",
    package: parts.package,
    version: parts.version,
    r_minor: rMinor,
    os: "macos",
  });
};

/** Classification rules in priority order */
export const MATCHERS: readonly PathMatcher[] = [matchIndex, matchArchive, matchSource, matchWindows, matchMacos];

/**
 * Classify a raw request path (without query string).
 * Total: every input yields a descriptor, unmatched paths are `unknown`.
 */
export function classify(path: string): ArtifactDescriptor {
  const segments = path.split("/");
  for (const match of MATCHERS) {
    const result = match(segments);
    if (result) return result;
  }
  return UNKNOWN;
}

/** Serialize a descriptor with a fixed key order */
export function serializeDescriptor(d: ArtifactDescriptor): string {
  return JSON.stringify({
    artifact_type: d.artifact_type,
    package: d.package,
    version: d.version,
    r_minor: d.r_minor,
    os: d.os,
  });
}
