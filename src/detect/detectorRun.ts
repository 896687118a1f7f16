import path from "node:path";
import { z } from "zod";
import { DetectorRunParseError } from "../errors/detect.errors.js";
import { pathExists } from "../io/files.js";
import { formatIssues } from "../io/validate.js";
import { readYaml, readYamlAll } from "../io/yaml.js";
import { RunResultId, type DetectorRun, type Finding } from "../types.js";

export const RUN_FILE = "run.yml";
export const FINDINGS_FILE = "findings.yml";

const RunFileSchema = z
  .object({
    result: z.enum([RunResultId.Success, RunResultId.Error, RunResultId.Timeout, RunResultId.NotRun]),
    runtime: z.number().nonnegative().nullish()
  })
  .passthrough();

export const FindingSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    file: z.string().min(1),
    method: z.string().nullish()
  })
  .passthrough();

export type RawFinding = z.infer<typeof FindingSchema>;

export function toFinding(raw: RawFinding): Finding {
  const { id, file, method, ...extras } = raw;
  const finding: Finding = { file, extras };
  if (id !== null && id !== undefined) finding.id = id;
  if (method !== null && method !== undefined) finding.method = method;
  return finding;
}

export function parseFindings(docs: unknown[], sourcePath: string): Finding[] {
  return docs.map((doc, index) => {
    const parsed = FindingSchema.safeParse(doc);
    if (!parsed.success) {
      throw new DetectorRunParseError(sourcePath, `finding #${index + 1}: ${formatIssues(parsed.error)}`);
    }
    return toFinding(parsed.data);
  });
}

async function loadRunFile(runFilePath: string): Promise<Pick<DetectorRun, "result" | "runtime">> {
  if (!(await pathExists(runFilePath))) {
    return { result: RunResultId.NotRun, runtime: 0 };
  }
  const parsed = RunFileSchema.safeParse(await readYaml(runFilePath));
  if (!parsed.success) {
    throw new DetectorRunParseError(runFilePath, formatIssues(parsed.error));
  }
  return { result: parsed.data.result, runtime: parsed.data.runtime ?? 0 };
}

/**
 * Reads the persisted outcome of one detector execution. Each call reads the
 * files again; a missing directory reports `not run` instead of throwing.
 */
export async function loadDetectorRun(findingsPath: string): Promise<DetectorRun> {
  const { result, runtime } = await loadRunFile(path.join(findingsPath, RUN_FILE));
  const findingsFilePath = path.join(findingsPath, FINDINGS_FILE);
  const findings = (await pathExists(findingsFilePath))
    ? parseFindings(await readYamlAll(findingsFilePath), findingsFilePath)
    : [];
  return { result, runtime, findings };
}
