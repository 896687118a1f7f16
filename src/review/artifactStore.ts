import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { MalformedReviewRecordError } from "../errors/review.errors.js";
import { YamlParseError } from "../errors/io.errors.js";
import { ensureDir, isDirectory, pathExists, removeTree } from "../io/files.js";
import { formatIssues } from "../io/validate.js";
import { readYaml, writeYamlAll } from "../io/yaml.js";
import { findingToRecord, type Finding, type ReviewRecord } from "../types.js";

export const REVIEW_SITE_FILE = "review.html";
export const POTENTIAL_HITS_FILE = "potentialhits.yml";
export const REVIEW_RECORD_PATTERN = "review*.yml";

const ReviewRecordSchema = z.object({ reviewer: z.string().nullish() }).passthrough();

/**
 * Per-misuse review directory. A directory is absent, present and empty (no
 * hits), or present with `review.html` plus any number of `review*.yml`
 * annotations written by reviewers.
 */
export type ReviewArtifactStore = {
  existsAndReusable: (reviewDir: string, force: boolean) => Promise<boolean>;
  hasReviewSite: (reviewDir: string) => Promise<boolean>;
  loadExistingReviews: (reviewDir: string) => Promise<ReviewRecord[]>;
  clear: (reviewDir: string) => Promise<void>;
  createEmpty: (reviewDir: string) => Promise<void>;
  persistCandidates: (candidates: readonly Finding[], reviewDir: string) => Promise<void>;
};

export function reviewersOf(records: readonly ReviewRecord[]): string[] {
  const reviewers: string[] = [];
  for (const record of records) {
    if (record.reviewer) reviewers.push(record.reviewer);
  }
  return reviewers;
}

async function readReviewRecord(filePath: string): Promise<ReviewRecord> {
  let raw: unknown;
  try {
    raw = await readYaml(filePath);
  } catch (err) {
    if (err instanceof YamlParseError) {
      throw new MalformedReviewRecordError(filePath, err.message);
    }
    throw err;
  }
  const parsed = ReviewRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedReviewRecordError(filePath, formatIssues(parsed.error));
  }
  const { reviewer, ...extras } = parsed.data;
  return reviewer ? { reviewer, extras } : { extras };
}

export function createFileArtifactStore(): ReviewArtifactStore {
  return {
    existsAndReusable: async (reviewDir, force) => !force && (await pathExists(reviewDir)),

    hasReviewSite: async (reviewDir) => pathExists(path.join(reviewDir, REVIEW_SITE_FILE)),

    loadExistingReviews: async (reviewDir) => {
      if (!(await isDirectory(reviewDir))) return [];
      const files = (await fg(REVIEW_RECORD_PATTERN, { cwd: reviewDir, onlyFiles: true, deep: 1 })).sort();
      const records: ReviewRecord[] = [];
      for (const file of files) {
        records.push(await readReviewRecord(path.join(reviewDir, file)));
      }
      return records;
    },

    clear: async (reviewDir) => removeTree(reviewDir),

    createEmpty: async (reviewDir) => ensureDir(reviewDir),

    persistCandidates: async (candidates, reviewDir) =>
      writeYamlAll(path.join(reviewDir, POTENTIAL_HITS_FILE), candidates.map(findingToRecord))
  };
}
