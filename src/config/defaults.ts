export const CONFIG_FILE_NAMES = ["misuse-review.config.json", ".misuse-reviewrc.json"];

export const STATE_DIR_NAME = ".misuse-review";

export const DEFAULT_DIRS = {
  data: "data",
  findings: "findings",
  reviews: "reviews",
  compiles: "compiles"
} as const;

/** Detectors whose only reviewable output is an XML violations report. */
export const DEFAULT_XML_ARTIFACT_DETECTORS = ["jadet", "tikanga"];

export const XML_ARTIFACT_FILE = "violations.xml";
