export type FindingId = string | number;

/**
 * One location reported by a detector. `file` is whatever the detector printed
 * (absolute, relative or a compiled class name); `method` is optional because
 * some detectors only report at file granularity.
 */
export interface Finding {
  id?: FindingId;
  file: string;
  method?: string;
  extras: Record<string, unknown>;
}

export const RunResultId = {
  Success: "success",
  Error: "error",
  Timeout: "timeout",
  NotRun: "not run"
} as const;

export type RunResult = (typeof RunResultId)[keyof typeof RunResultId];

export interface DetectorRun {
  result: RunResult;
  /** Execution time in seconds. */
  runtime: number;
  findings: Finding[];
}

export type MisuseLocation = {
  file: string;
  method: string;
};

export interface Misuse {
  id: string;
  projectId: string;
  versionId: string;
  location: MisuseLocation;
  description?: string;
  metadata: Record<string, unknown>;
}

export interface ProjectVersion {
  id: string;
  projectId: string;
  misuses: Misuse[];
  metadata: Record<string, unknown>;
}

export interface Project {
  id: string;
  name?: string;
  versions: ProjectVersion[];
}

export type ReviewRecord = {
  reviewer?: string;
  extras: Record<string, unknown>;
};

export function isRunSuccess(run: DetectorRun): boolean {
  return run.result === RunResultId.Success;
}

export function findingToRecord(finding: Finding): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  if (finding.id !== undefined) record.id = finding.id;
  record.file = finding.file;
  if (finding.method !== undefined) record.method = finding.method;
  return { ...record, ...finding.extras };
}
