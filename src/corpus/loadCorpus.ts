import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { CorpusLoadError } from "../errors/corpus.errors.js";
import { pathExists } from "../io/files.js";
import { formatIssues } from "../io/validate.js";
import { readYaml } from "../io/yaml.js";
import type { Misuse, Project, ProjectVersion } from "../types.js";

export const PROJECT_FILE = "project.yml";
export const VERSION_FILE = "version.yml";
export const MISUSE_FILE = "misuse.yml";

const idSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const ProjectFileSchema = z.object({ name: z.string().nullish() }).passthrough();

const VersionFileSchema = z.object({ misuses: z.array(idSchema).nullish() }).passthrough();

const MisuseFileSchema = z
  .object({
    location: z.object({
      file: z.string().min(1),
      method: z.string().nullish()
    }),
    description: z.string().nullish()
  })
  .passthrough();

export type CorpusFilter = {
  only: string[];
  skip: string[];
};

export const EMPTY_FILTER: CorpusFilter = { only: [], skip: [] };

const versionKey = (projectId: string, versionId: string): string => `${projectId}.${versionId}`;

export function isProjectSelected(projectId: string, filter: CorpusFilter): boolean {
  if (filter.skip.includes(projectId)) return false;
  if (filter.only.length === 0) return true;
  return filter.only.some((entry) => entry === projectId || entry.startsWith(`${projectId}.`));
}

export function isVersionSelected(projectId: string, versionId: string, filter: CorpusFilter): boolean {
  const key = versionKey(projectId, versionId);
  if (filter.skip.includes(projectId) || filter.skip.includes(key)) return false;
  if (filter.only.length === 0) return true;
  return filter.only.some((entry) => entry === projectId || entry === key);
}

async function parseFile<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  const parsed = schema.safeParse(await readYaml(filePath));
  if (!parsed.success) {
    throw new CorpusLoadError(`Invalid corpus file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

async function listEntries(cwd: string, pattern: string): Promise<string[]> {
  if (!(await pathExists(cwd))) return [];
  const entries = await fg(pattern, { cwd, onlyDirectories: true, deep: 1 });
  return entries.sort();
}

async function loadMisuse(projectDir: string, projectId: string, versionId: string, misuseId: string): Promise<Misuse> {
  const misuseFile = path.join(projectDir, "misuses", misuseId, MISUSE_FILE);
  if (!(await pathExists(misuseFile))) {
    throw new CorpusLoadError(`Version ${versionKey(projectId, versionId)} references unknown misuse ${misuseId}.`);
  }
  const { location, description, ...metadata } = await parseFile(misuseFile, MisuseFileSchema);
  const misuse: Misuse = {
    id: misuseId,
    projectId,
    versionId,
    location: { file: location.file, method: location.method ?? "" },
    metadata
  };
  if (description) misuse.description = description;
  return misuse;
}

async function loadVersion(
  projectDir: string,
  projectId: string,
  versionId: string
): Promise<ProjectVersion> {
  const versionFile = path.join(projectDir, "versions", versionId, VERSION_FILE);
  const raw = (await pathExists(versionFile))
    ? await parseFile(versionFile, VersionFileSchema)
    : VersionFileSchema.parse({});
  const { misuses: misuseIds, ...metadata } = raw;
  const misuses: Misuse[] = [];
  for (const misuseId of misuseIds ?? []) {
    misuses.push(await loadMisuse(projectDir, projectId, versionId, misuseId));
  }
  return { id: versionId, projectId, misuses, metadata };
}

async function loadProject(dataDir: string, projectId: string, filter: CorpusFilter): Promise<Project> {
  const projectDir = path.join(dataDir, projectId);
  const projectFile = path.join(projectDir, PROJECT_FILE);
  const meta = (await pathExists(projectFile)) ? await parseFile(projectFile, ProjectFileSchema) : null;

  const versions: ProjectVersion[] = [];
  for (const versionId of await listEntries(path.join(projectDir, "versions"), "*")) {
    if (!isVersionSelected(projectId, versionId, filter)) continue;
    versions.push(await loadVersion(projectDir, projectId, versionId));
  }

  const project: Project = { id: projectId, versions };
  if (meta?.name) project.name = meta.name;
  return project;
}

/**
 * Loads the benchmark corpus: `<dataDir>/<project>/versions/<version>/version.yml`
 * lists misuse ids resolved against `<dataDir>/<project>/misuses/<id>/misuse.yml`.
 * Projects and versions come back sorted by id.
 */
export async function loadCorpus(dataDir: string, filter: CorpusFilter = EMPTY_FILTER): Promise<Project[]> {
  if (!(await pathExists(dataDir))) {
    throw new CorpusLoadError(`Corpus directory not found: ${dataDir}`);
  }
  const projects: Project[] = [];
  for (const projectId of await listEntries(dataDir, "*")) {
    if (!isProjectSelected(projectId, filter)) continue;
    projects.push(await loadProject(dataDir, projectId, filter));
  }
  return projects;
}
