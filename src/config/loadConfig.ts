import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { readBooleanEnv, readEnv, readListEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_DIRS,
  DEFAULT_XML_ARTIFACT_DETECTORS,
  STATE_DIR_NAME
} from "./defaults.js";
import { ConfigInvalidFileError, ConfigMissingPathError } from "../errors/config.errors.js";
import { formatIssues } from "../io/validate.js";

export interface ReviewConfig {
  projectRoot: string;
  stateDir: string;
  dataDir: string;
  findingsDir: string;
  reviewsDir: string;
  compilesDir: string;
  forcePrepare: boolean;
  xmlArtifactDetectors: string[];
}

export type ConfigOverrides = Partial<Omit<ReviewConfig, "projectRoot" | "stateDir">>;

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
}

export type DetectorPaths = {
  findingsPath: string;
  reviewPath: string;
  compilesPath: string;
};

const ConfigFileSchema = z
  .object({
    dataDir: z.string().min(1),
    findingsDir: z.string().min(1),
    reviewsDir: z.string().min(1),
    compilesDir: z.string().min(1),
    forcePrepare: z.boolean(),
    xmlArtifactDetectors: z.array(z.string().min(1))
  })
  .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigFile> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigInvalidFileError(candidate, message);
    }
    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigInvalidFileError(candidate, formatIssues(result.error));
    }
    return result.data;
  }

  if (configPath) {
    throw new ConfigMissingPathError(path.resolve(projectRoot, configPath));
  }
  return {};
}

/**
 * Precedence: explicit overrides (CLI flags), then MISUSE_REVIEW_* environment
 * variables, then the config file, then defaults. Directories resolve against
 * `projectRoot`.
 */
export async function loadConfig(params: LoadConfigParams): Promise<ReviewConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const overrides = params.overrides ?? {};
  const resolveDir = (value: string) => path.resolve(params.projectRoot, value);

  return {
    projectRoot: params.projectRoot,
    stateDir: path.join(params.projectRoot, STATE_DIR_NAME),
    dataDir: resolveDir(
      overrides.dataDir ?? readEnv("MISUSE_REVIEW_DATA_DIR") ?? configFile.dataDir ?? DEFAULT_DIRS.data
    ),
    findingsDir: resolveDir(
      overrides.findingsDir ??
        readEnv("MISUSE_REVIEW_FINDINGS_DIR") ??
        configFile.findingsDir ??
        DEFAULT_DIRS.findings
    ),
    reviewsDir: resolveDir(
      overrides.reviewsDir ??
        readEnv("MISUSE_REVIEW_REVIEWS_DIR") ??
        configFile.reviewsDir ??
        DEFAULT_DIRS.reviews
    ),
    compilesDir: resolveDir(
      overrides.compilesDir ??
        readEnv("MISUSE_REVIEW_COMPILES_DIR") ??
        configFile.compilesDir ??
        DEFAULT_DIRS.compiles
    ),
    forcePrepare:
      overrides.forcePrepare ?? readBooleanEnv("MISUSE_REVIEW_FORCE_PREPARE") ?? configFile.forcePrepare ?? false,
    xmlArtifactDetectors:
      overrides.xmlArtifactDetectors ??
      readListEnv("MISUSE_REVIEW_XML_DETECTORS") ??
      configFile.xmlArtifactDetectors ??
      DEFAULT_XML_ARTIFACT_DETECTORS
  };
}

export function resolveDetectorPaths(config: ReviewConfig, detector: string): DetectorPaths {
  return {
    findingsPath: path.join(config.findingsDir, detector),
    reviewPath: path.join(config.reviewsDir, detector),
    compilesPath: config.compilesDir
  };
}
