import path from "node:path";
import { listDirectories, pathExists, safeWrite } from "../io/files.js";
import { escapeHtml, link, renderDocument } from "./html.js";

export const INDEX_FILE = "index.html";

/**
 * Landing page across detectors: one entry per detector directory found under
 * `mainFindingsDir`, linking to that detector's review index when prepared.
 */
export async function generateMainIndex(mainReviewDir: string, mainFindingsDir: string): Promise<string> {
  const detectors = await listDirectories(mainFindingsDir);
  const items: string[] = [];
  for (const detector of detectors) {
    const href = `${detector}/${INDEX_FILE}`;
    const prepared = await pathExists(path.join(mainReviewDir, detector, INDEX_FILE));
    items.push(
      prepared
        ? `
      <li>${link(href, detector)}</li>`
        : `
      <li>${escapeHtml(detector)} (not prepared)</li>`
    );
  }
  const body = `
    <h1>Detectors</h1>
    <ul>${items.join("")}
    </ul>`;
  const outputFile = path.join(mainReviewDir, INDEX_FILE);
  await safeWrite(renderDocument("Detectors", body), outputFile);
  return outputFile;
}
