import path from "node:path";
import { DEFAULT_XML_ARTIFACT_DETECTORS, XML_ARTIFACT_FILE } from "../config/defaults.js";
import { copyFileSafe } from "../io/files.js";
import type { Logger } from "../logging/logger.js";
import {
  isRunSuccess,
  type DetectorRun,
  type Finding,
  type Misuse,
  type Project,
  type ProjectVersion
} from "../types.js";
import { REVIEW_SITE_FILE, reviewersOf, type ReviewArtifactStore } from "./artifactStore.js";
import type { RunReview } from "./ledger.js";
import { matchLocation } from "./locationMatcher.js";
import { generateFindingPage, generateReviewPage } from "./reviewPage.js";

export type ReconcileContext = {
  detector: string;
  /** `<findings>/<detector>`; per-version output lives in `<project>/<version>` below it. */
  findingsPath: string;
  /** `<reviews>/<detector>`; the review tree is written below it. */
  reviewPath: string;
  compilesPath: string;
  forcePrepare: boolean;
  store: ReviewArtifactStore;
  logger: Logger;
  loadRun: (findingsPath: string) => Promise<DetectorRun>;
};

export type VersionScope = {
  project: Project;
  version: ProjectVersion;
  /** Run loaded for the version heading. */
  run: DetectorRun;
  runReview: RunReview;
};

export type StrategyMode = "known-misuses" | "all-findings";

export type ReviewStrategy = {
  mode: StrategyMode;
  prepareVersion: (scope: VersionScope, context: ReconcileContext) => Promise<void>;
};

export type MisuseDisposition =
  | "run-unavailable"
  | "reused-review"
  | "reused-no-hits"
  | "regenerated-review"
  | "regenerated-no-hits";

const ALL_FINDINGS_LABEL = "all findings";

const toUrl = (...segments: string[]): string => path.posix.join(...segments);

export const versionFindingsPath = (context: ReconcileContext, projectId: string, versionId: string): string =>
  path.join(context.findingsPath, projectId, versionId);

/**
 * Decides what happens to one misuse's review directory and appends exactly
 * one row for it. Order: failed run, reusable directory with a review site,
 * reusable directory without one, regeneration.
 */
export async function prepareMisuseReview(
  scope: Omit<VersionScope, "run">,
  misuse: Misuse,
  context: ReconcileContext
): Promise<MisuseDisposition> {
  const { project, version, runReview } = scope;
  const { store, logger } = context;

  const run = await context.loadRun(versionFindingsPath(context, project.id, version.id));
  if (!isRunSuccess(run)) {
    logger.info(`Skipping ${misuse.id} in ${project.id}.${version.id}: no result.`, { result: run.result });
    runReview.appendFindingReview(misuse.id, { kind: "run-failure", result: run.result }, []);
    return "run-unavailable";
  }

  const reviewUrl = toUrl(project.id, version.id, misuse.id);
  const reviewSite = toUrl(reviewUrl, REVIEW_SITE_FILE);
  const reviewDir = path.join(context.reviewPath, project.id, version.id, misuse.id);

  if (await store.existsAndReusable(reviewDir, context.forcePrepare)) {
    logger.info(`${misuse.id} in ${project.id}.${version.id} is already prepared.`);
    if (await store.hasReviewSite(reviewDir)) {
      const existing = await store.loadExistingReviews(reviewDir);
      runReview.appendFindingReview(misuse.id, { kind: "review", href: reviewSite }, reviewersOf(existing));
      return "reused-review";
    }
    runReview.appendFindingReview(misuse.id, { kind: "no-hits" }, []);
    return "reused-no-hits";
  }

  logger.debug(`Checking hit for ${misuse.id} in ${project.id}.${version.id}...`);
  const { candidates, tier } = matchLocation(run.findings, misuse.location);
  logger.info(`Found ${candidates.length} potential hits for ${misuse.id}.`, { tier });
  await store.clear(reviewDir);

  if (candidates.length > 0) {
    logger.debug(`Generating review files for ${misuse.id} in ${project.id}.${version.id}...`);
    await generateReviewPage({
      reviewDir,
      detector: context.detector,
      compilesPath: context.compilesPath,
      project,
      version,
      misuse,
      potentialHits: candidates
    });
    await store.persistCandidates(candidates, reviewDir);
    runReview.appendFindingReview(misuse.id, { kind: "review", href: reviewSite }, []);
    return "regenerated-review";
  }

  await store.createEmpty(reviewDir);
  runReview.appendFindingReview(misuse.id, { kind: "no-hits" }, []);
  return "regenerated-no-hits";
}

export function createKnownMisuseMatching(): ReviewStrategy {
  return {
    mode: "known-misuses",
    prepareVersion: async (scope, context) => {
      for (const misuse of scope.version.misuses) {
        await prepareMisuseReview(scope, misuse, context);
      }
    }
  };
}

const sanitizeFileToken = (value: string): string => value.replace(/[^\w.-]+/g, "_");

/**
 * Row label and page file name for one finding. Findings without an id are
 * named by position under a separate prefix; a name already taken in the
 * version (compared case-insensitively) gets a numeric suffix.
 */
export function findingPage(
  finding: Finding,
  index: number,
  taken: Set<string>
): { label: string; pageName: string } {
  const position = index + 1;
  const label = finding.id === undefined ? `Finding #${position}` : `Finding ${finding.id}`;
  const base = finding.id === undefined ? `finding-at-${position}` : `finding-${sanitizeFileToken(String(finding.id))}`;
  let stem = base;
  for (let suffix = 2; taken.has(stem.toLowerCase()); suffix += 1) {
    stem = `${base}-${suffix}`;
  }
  taken.add(stem.toLowerCase());
  return { label, pageName: `${stem}.html` };
}

export const reportsXmlArtifact = (detector: string, xmlArtifactDetectors: readonly string[]): boolean =>
  xmlArtifactDetectors.some((prefix) => detector.startsWith(prefix));

/**
 * Review every finding of a run without consulting known misuses. Detectors
 * that only produce an XML violations report get that file copied instead.
 */
export function createAllFindingsPassthrough(
  options: { xmlArtifactDetectors?: readonly string[] } = {}
): ReviewStrategy {
  const xmlArtifactDetectors = options.xmlArtifactDetectors ?? DEFAULT_XML_ARTIFACT_DETECTORS;

  return {
    mode: "all-findings",
    prepareVersion: async ({ project, version, run, runReview }, context) => {
      if (!isRunSuccess(run)) {
        context.logger.info(`Skipping ${project.id}.${version.id}: no result.`, { result: run.result });
        runReview.appendFindingReview(ALL_FINDINGS_LABEL, { kind: "run-failure", result: run.result }, []);
        return;
      }

      if (reportsXmlArtifact(context.detector, xmlArtifactDetectors)) {
        const url = toUrl(project.id, version.id, XML_ARTIFACT_FILE);
        await copyFileSafe(
          path.join(context.findingsPath, project.id, version.id, XML_ARTIFACT_FILE),
          path.join(context.reviewPath, project.id, version.id, XML_ARTIFACT_FILE)
        );
        runReview.appendFindingReview(
          ALL_FINDINGS_LABEL,
          { kind: "download", href: url, label: `download ${XML_ARTIFACT_FILE}` },
          []
        );
        return;
      }

      const takenPages = new Set<string>();
      for (const [index, finding] of run.findings.entries()) {
        const { label, pageName } = findingPage(finding, index, takenPages);
        const url = toUrl(project.id, version.id, pageName);
        await generateFindingPage({
          outputFile: path.join(context.reviewPath, url),
          detector: context.detector,
          compilesPath: context.compilesPath,
          version,
          finding
        });
        runReview.appendFindingReview(label, { kind: "review", href: url }, []);
      }
    }
  };
}
