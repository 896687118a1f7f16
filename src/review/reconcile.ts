import path from "node:path";
import { loadDetectorRun } from "../detect/detectorRun.js";
import { isDirectory, safeWrite } from "../io/files.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { DetectorRun, Project } from "../types.js";
import { createFileArtifactStore, type ReviewArtifactStore } from "./artifactStore.js";
import { ReviewLedger, type OutcomeCounts } from "./ledger.js";
import { generateMainIndex, INDEX_FILE } from "./mainIndex.js";
import { versionFindingsPath, type ReconcileContext, type ReviewStrategy } from "./strategies.js";

export interface ReconcileOptions {
  detector: string;
  findingsPath: string;
  reviewPath: string;
  compilesPath: string;
  forcePrepare?: boolean;
  projects: Project[];
  strategy: ReviewStrategy;
  store?: ReviewArtifactStore;
  logger?: Logger;
  loadRun?: (findingsPath: string) => Promise<DetectorRun>;
}

export type ReconcileResult = {
  ledger: ReviewLedger;
  counts: OutcomeCounts;
  indexPath: string;
  mainIndexPath: string | null;
};

/**
 * One sequential pass over every project and version. The detector index is
 * written only after every version was processed, so a failed pass leaves the
 * previous index in place.
 */
export async function reconcileReviews(options: ReconcileOptions): Promise<ReconcileResult> {
  const logger = options.logger ?? noopLogger;
  const context: ReconcileContext = {
    detector: options.detector,
    findingsPath: options.findingsPath,
    reviewPath: options.reviewPath,
    compilesPath: options.compilesPath,
    forcePrepare: options.forcePrepare ?? false,
    store: options.store ?? createFileArtifactStore(),
    logger,
    loadRun: options.loadRun ?? loadDetectorRun
  };

  logger.info(
    options.strategy.mode === "all-findings"
      ? `Preparing review of all findings of ${options.detector}...`
      : `Preparing review for results of ${options.detector}...`
  );

  const ledger = new ReviewLedger(options.detector);
  for (const project of options.projects) {
    const projectReview = ledger.startProjectReview(project.id);
    for (const version of project.versions) {
      const run = await context.loadRun(versionFindingsPath(context, project.id, version.id));
      const runReview = projectReview.startRunReview(version.id, run);
      await options.strategy.prepareVersion({ project, version, run, runReview }, context);
    }
  }

  const indexPath = path.join(options.reviewPath, INDEX_FILE);
  await safeWrite(ledger.toHtml(), indexPath, { append: false });
  logger.info(`Review index written to ${indexPath}.`);

  const mainFindingsDir = path.dirname(path.resolve(options.findingsPath));
  let mainIndexPath: string | null = null;
  if (await isDirectory(mainFindingsDir)) {
    mainIndexPath = await generateMainIndex(path.dirname(path.resolve(options.reviewPath)), mainFindingsDir);
    logger.debug(`Detector overview written to ${mainIndexPath}.`);
  }

  return { ledger, counts: ledger.countOutcomes(), indexPath, mainIndexPath };
}
