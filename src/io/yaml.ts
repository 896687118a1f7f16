import * as yaml from "js-yaml";
import { YamlParseError } from "../errors/io.errors.js";
import { readTextFile, safeWrite } from "./files.js";

const DOCUMENT_SEPARATOR = "---\n";

function parseWith<T>(filePath: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new YamlParseError(filePath, err.message);
    }
    throw err;
  }
}

export async function readYaml(filePath: string): Promise<unknown> {
  const raw = await readTextFile(filePath);
  return parseWith(filePath, () => yaml.load(raw, { filename: filePath }));
}

/** Every document of a multi-document file; empty documents are dropped. */
export async function readYamlAll(filePath: string): Promise<unknown[]> {
  const raw = await readTextFile(filePath);
  const docs = parseWith(filePath, () => yaml.loadAll(raw, null, { filename: filePath }));
  return docs.filter((doc) => doc !== null && doc !== undefined);
}

export function dumpYamlAll(docs: unknown[]): string {
  return docs.map((doc) => yaml.dump(doc, { noRefs: true })).join(DOCUMENT_SEPARATOR);
}

export async function writeYamlAll(filePath: string, docs: unknown[]): Promise<void> {
  await safeWrite(dumpYamlAll(docs), filePath);
}
