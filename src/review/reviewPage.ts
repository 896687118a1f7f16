import path from "node:path";
import { pathExists, readTextFile, safeWrite } from "../io/files.js";
import { findingToRecord, type Finding, type Misuse, type Project, type ProjectVersion } from "../types.js";
import { REVIEW_SITE_FILE } from "./artifactStore.js";
import { escapeHtml, renderDocument } from "./html.js";
import { normalizeFindingFile } from "./locationMatcher.js";

export const ORIGINAL_SOURCE_DIR = "original-src";

export type ReviewPageParams = {
  reviewDir: string;
  detector: string;
  compilesPath: string;
  project: Project;
  version: ProjectVersion;
  misuse: Misuse;
  potentialHits: readonly Finding[];
};

export type FindingPageParams = {
  outputFile: string;
  detector: string;
  compilesPath: string;
  version: ProjectVersion;
  finding: Finding;
};

const formatValue = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) return value.join("\n");
  return JSON.stringify(value) ?? String(value);
};

function renderFindingTable(finding: Finding): string {
  const rows = Object.entries(findingToRecord(finding))
    .map(
      ([key, value]) => `
      <tr>
        <th>${escapeHtml(key)}</th>
        <td><pre>${escapeHtml(formatValue(value))}</pre></td>
      </tr>`
    )
    .join("");
  return `
    <table class="finding">${rows}
    </table>`;
}

export function sourceFilePath(compilesPath: string, projectId: string, versionId: string, file: string): string {
  return path.join(compilesPath, projectId, versionId, ORIGINAL_SOURCE_DIR, file);
}

async function renderSource(sourcePath: string, label: string): Promise<string> {
  if (!(await pathExists(sourcePath))) {
    return `
    <p>Source of ${escapeHtml(label)} is not available.</p>`;
  }
  const source = await readTextFile(sourcePath);
  return `
    <h2>Source: ${escapeHtml(label)}</h2>
    <pre class="source">${escapeHtml(source)}</pre>`;
}

export async function generateReviewPage(params: ReviewPageParams): Promise<string> {
  const { misuse, project, version } = params;
  const title = `Review: ${params.detector} / ${project.id} / ${version.id} / ${misuse.id}`;
  const hits = params.potentialHits
    .map((finding, index) => `
    <h3>Potential hit ${index + 1}</h3>${renderFindingTable(finding)}`)
    .join("");
  const source = await renderSource(
    sourceFilePath(params.compilesPath, project.id, version.id, misuse.location.file),
    misuse.location.file
  );
  const body = `
    <h1>${escapeHtml(title)}</h1>
    <table class="misuse">
      <tr><th>Detector</th><td>${escapeHtml(params.detector)}</td></tr>
      <tr><th>Project</th><td>${escapeHtml(project.name ?? project.id)}</td></tr>
      <tr><th>Version</th><td>${escapeHtml(version.id)}</td></tr>
      <tr><th>Misuse</th><td>${escapeHtml(misuse.id)}</td></tr>
      <tr><th>Description</th><td>${escapeHtml(misuse.description ?? "")}</td></tr>
      <tr><th>File</th><td>${escapeHtml(misuse.location.file)}</td></tr>
      <tr><th>Method</th><td>${escapeHtml(misuse.location.method)}</td></tr>
    </table>
    <h2>Potential hits (${params.potentialHits.length})</h2>${hits}${source}`;

  const outputFile = path.join(params.reviewDir, REVIEW_SITE_FILE);
  await safeWrite(renderDocument(title, body), outputFile);
  return outputFile;
}

export async function generateFindingPage(params: FindingPageParams): Promise<string> {
  const { finding, version } = params;
  const label = finding.id === undefined ? "finding" : `finding ${finding.id}`;
  const title = `Review: ${params.detector} / ${version.projectId} / ${version.id} / ${label}`;
  const sourceFile = normalizeFindingFile(finding.file);
  const source = await renderSource(
    sourceFilePath(params.compilesPath, version.projectId, version.id, sourceFile),
    sourceFile
  );
  const body = `
    <h1>${escapeHtml(title)}</h1>${renderFindingTable(finding)}${source}`;

  await safeWrite(renderDocument(title, body), params.outputFile);
  return params.outputFile;
}
