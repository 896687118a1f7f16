import type { Finding, MisuseLocation } from "../types.js";

const INNER_CLASS_MARKER = "$";
const COMPILED_EXTENSION = ".class";
const SOURCE_EXTENSION = ".java";
const PARAMETER_LIST_OPEN = "(";

export type MatchTier = "signature" | "name" | "none";

export type LocationMatch = {
  candidates: Finding[];
  /** Which method tier produced the candidates; `none` when nothing survived. */
  tier: MatchTier;
};

const normalizePath = (value: string): string =>
  value
    .trim()
    .replace(/\\/g, "/")
    .replace(/\/+/g, "/")
    .replace(/\/+$/, "");

const pathSegments = (value: string): string[] =>
  value.split("/").filter((segment) => segment && segment !== ".");

/**
 * Maps a reported file to the source file it denotes: `pkg/A$Inner.class` and
 * `pkg/A.class` both become `pkg/A.java`.
 */
export const normalizeFindingFile = (file: string): string => {
  let normalized = normalizePath(file);
  const markerIndex = normalized.indexOf(INNER_CLASS_MARKER);
  if (markerIndex >= 0) {
    normalized = `${normalized.slice(0, markerIndex)}${SOURCE_EXTENSION}`;
  }
  if (normalized.endsWith(COMPILED_EXTENSION)) {
    normalized = `${normalized.slice(0, -COMPILED_EXTENSION.length)}${SOURCE_EXTENSION}`;
  }
  return normalized;
};

/**
 * Segment-wise suffix comparison in either direction, so absolute, relative and
 * partially qualified paths to the same file agree.
 */
export const matchesFile = (findingFile: string, misuseFile: string): boolean => {
  const reported = pathSegments(normalizeFindingFile(findingFile));
  const declared = pathSegments(normalizePath(misuseFile));
  if (reported.length === 0 || declared.length === 0) return false;
  const [shorter, longer] = reported.length <= declared.length ? [reported, declared] : [declared, reported];
  const offset = longer.length - shorter.length;
  return shorter.every((segment, index) => segment === longer[offset + index]);
};

// A bare name gets the opening marker so `bar` cannot match `barBaz(...)`.
const withParameterListMarker = (method: string): string =>
  method.includes(PARAMETER_LIST_OPEN) ? method : `${method}${PARAMETER_LIST_OPEN}`;

const methodNameOnly = (method: string): string => {
  const index = method.indexOf(PARAMETER_LIST_OPEN);
  const name = index >= 0 ? method.slice(0, index) : method;
  return `${name}${PARAMETER_LIST_OPEN}`;
};

export const filterByFile = (findings: readonly Finding[], misuseFile: string): Finding[] =>
  findings.filter((finding) => matchesFile(finding.file, misuseFile));

export const filterByMethodSignature = (findings: readonly Finding[], misuseMethod: string): Finding[] =>
  findings.filter(
    (finding) => finding.method === undefined || misuseMethod.includes(withParameterListMarker(finding.method))
  );

/** Findings without a method never reach a name comparison. */
export const filterByMethodName = (findings: readonly Finding[], misuseMethod: string): Finding[] =>
  findings.filter(
    (finding) => finding.method !== undefined && misuseMethod.includes(methodNameOnly(finding.method))
  );

export const filterByMethod = (findings: readonly Finding[], misuseMethod: string): LocationMatch => {
  const bySignature = filterByMethodSignature(findings, misuseMethod);
  if (bySignature.length > 0) {
    return { candidates: bySignature, tier: "signature" };
  }
  const byName = filterByMethodName(findings, misuseMethod);
  return { candidates: byName, tier: byName.length > 0 ? "name" : "none" };
};

export const matchLocation = (findings: readonly Finding[], location: MisuseLocation): LocationMatch =>
  filterByMethod(filterByFile(findings, location.file), location.method);

export const findPotentialHits = (findings: readonly Finding[], location: MisuseLocation): Finding[] =>
  matchLocation(findings, location).candidates;
