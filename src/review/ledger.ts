import type { DetectorRun, RunResult } from "../types.js";
import { escapeHtml, link, renderDocument } from "./html.js";

export type FindingOutcome =
  | { kind: "run-failure"; result: RunResult }
  | { kind: "no-hits" }
  | { kind: "review"; href: string }
  | { kind: "download"; href: string; label: string };

export type OutcomeKind = FindingOutcome["kind"];

export type OutcomeCounts = Record<OutcomeKind, number>;

export const NO_REVIEWERS_LABEL = "none";

export function describeOutcome(outcome: FindingOutcome): string {
  switch (outcome.kind) {
    case "run-failure":
      return `run: ${outcome.result}`;
    case "no-hits":
      return "no potential hits";
    case "review":
      return "review";
    case "download":
      return outcome.label;
  }
}

function renderOutcome(outcome: FindingOutcome): string {
  switch (outcome.kind) {
    case "review":
    case "download":
      return link(outcome.href, describeOutcome(outcome));
    default:
      return escapeHtml(describeOutcome(outcome));
  }
}

export function formatReviewers(reviewers: readonly string[]): string {
  return reviewers.length ? `reviewed by ${reviewers.join(", ")}` : NO_REVIEWERS_LABEL;
}

export class FindingReview {
  readonly reviewers: readonly string[];

  constructor(
    readonly name: string,
    readonly outcome: FindingOutcome,
    reviewers: readonly string[]
  ) {
    this.reviewers = [...reviewers];
  }

  toHtml(): string {
    return `
            <tr>
                <td>Misuse:</td>
                <td>${escapeHtml(this.name)}</td>
                <td>[${renderOutcome(this.outcome)}]</td>
                <td>${escapeHtml(formatReviewers(this.reviewers))}</td>
            </tr>`;
  }
}

export class RunReview {
  private readonly findings: FindingReview[] = [];

  constructor(
    readonly versionId: string,
    readonly run: DetectorRun
  ) {}

  get findingReviews(): readonly FindingReview[] {
    return this.findings;
  }

  appendFindingReview(name: string, outcome: FindingOutcome, reviewers: readonly string[]): FindingReview {
    const review = new FindingReview(name, outcome, reviewers);
    this.findings.push(review);
    return review;
  }

  toHtml(): string {
    const heading = `${this.versionId} (result: ${this.run.result}, findings: ${this.run.findings.length}, duration: ${this.run.runtime}s)`;
    return `
            <tr>
                <td>Version:</td>
                <td>${escapeHtml(heading)}</td>
            </tr>
            <tr>
                <td></td>
                <td>
                    <table>${this.findings.map((review) => review.toHtml()).join("")}
                    </table>
                </td>
            </tr>`;
  }
}

export class ProjectReview {
  private readonly runs: RunReview[] = [];

  constructor(readonly projectId: string) {}

  get runReviews(): readonly RunReview[] {
    return this.runs;
  }

  startRunReview(versionId: string, run: DetectorRun): RunReview {
    const review = new RunReview(versionId, run);
    this.runs.push(review);
    return review;
  }

  toHtml(): string {
    return `
            <h2>Project: ${escapeHtml(this.projectId)}</h2>
            <table>${this.runs.map((review) => review.toHtml()).join("")}
            </table>`;
  }
}

/**
 * Append-only record of the decision taken for every visited misuse. Callers
 * hold the handles returned by `startProjectReview` / `startRunReview` and
 * append through them.
 */
export class ReviewLedger {
  private readonly projects: ProjectReview[] = [];

  constructor(readonly detector: string) {}

  get projectReviews(): readonly ProjectReview[] {
    return this.projects;
  }

  startProjectReview(projectId: string): ProjectReview {
    const review = new ProjectReview(projectId);
    this.projects.push(review);
    return review;
  }

  countOutcomes(): OutcomeCounts {
    const counts: OutcomeCounts = { "run-failure": 0, "no-hits": 0, review: 0, download: 0 };
    for (const project of this.projects) {
      for (const run of project.runReviews) {
        for (const finding of run.findingReviews) {
          counts[finding.outcome.kind] += 1;
        }
      }
    }
    return counts;
  }

  toHtml(): string {
    const body = `<h1>Detector: ${escapeHtml(this.detector)}</h1>${this.projects.map((review) => review.toHtml()).join("")}`;
    return renderDocument(`Review: ${this.detector}`, body);
  }
}
