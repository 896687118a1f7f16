import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import type { TestContext } from "node:test";
import type { Finding, Misuse, Project, ProjectVersion } from "../../types.js";

export async function makeTempDir(t: TestContext, prefix = "misuse-review-"): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

export async function writeFixture(root: string, relativePath: string, content: string): Promise<string> {
  const target = path.join(root, relativePath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content, "utf-8");
  return target;
}

export const makeFinding = (file: string, method?: string, extras: Record<string, unknown> = {}): Finding =>
  method === undefined ? { file, extras } : { file, method, extras };

export const makeMisuse = (
  id: string,
  location: { file: string; method: string },
  scope: { projectId?: string; versionId?: string } = {}
): Misuse => ({
  id,
  projectId: scope.projectId ?? "p",
  versionId: scope.versionId ?? "v",
  location,
  metadata: {}
});

export const makeVersion = (projectId: string, id: string, misuses: Misuse[]): ProjectVersion => ({
  id,
  projectId,
  misuses,
  metadata: {}
});

export const makeProject = (id: string, versions: ProjectVersion[]): Project => ({ id, versions });
