import assert from "node:assert/strict";
import { test } from "node:test";
import path from "node:path";
import { makeTempDir, writeFixture } from "../../__tests__/helpers/fixtures.js";
import { DetectorRunParseError } from "../../errors/detect.errors.js";
import { YamlParseError } from "../../errors/io.errors.js";
import { loadDetectorRun, parseFindings } from "../detectorRun.js";

test("a missing run directory reads as not run", async (t) => {
  const root = await makeTempDir(t);

  assert.deepStrictEqual(await loadDetectorRun(path.join(root, "absent")), {
    result: "not run",
    runtime: 0,
    findings: []
  });
});

test("run result, runtime and findings are read in file order", async (t) => {
  const root = await makeTempDir(t);
  await writeFixture(root, "run.yml", "result: success\nruntime: 12.5\nmd5: abc\n");
  await writeFixture(
    root,
    "findings.yml",
    "id: 2\nfile: pkg/A.java\nmethod: foo(int)\nrank: 1\n---\nfile: B.class\nmethod: null\n---\n"
  );

  const run = await loadDetectorRun(root);

  assert.deepStrictEqual(run, {
    result: "success",
    runtime: 12.5,
    findings: [
      { id: 2, file: "pkg/A.java", method: "foo(int)", extras: { rank: 1 } },
      { file: "B.class", extras: {} }
    ]
  });
});

test("a run without findings output has no findings", async (t) => {
  const root = await makeTempDir(t);
  await writeFixture(root, "run.yml", "result: timeout\n");

  assert.deepStrictEqual(await loadDetectorRun(root), { result: "timeout", runtime: 0, findings: [] });
});

test("every call reads the files again", async (t) => {
  const root = await makeTempDir(t);
  await writeFixture(root, "run.yml", "result: error\n");
  assert.equal((await loadDetectorRun(root)).result, "error");

  await writeFixture(root, "run.yml", "result: success\n");
  assert.equal((await loadDetectorRun(root)).result, "success");
});

test("unknown run results are rejected", async (t) => {
  const root = await makeTempDir(t);
  await writeFixture(root, "run.yml", "result: crashed\n");

  await assert.rejects(loadDetectorRun(root), DetectorRunParseError);
});

test("unparseable findings output is reported with its path", async (t) => {
  const root = await makeTempDir(t);
  await writeFixture(root, "run.yml", "result: success\n");
  const findingsFile = await writeFixture(root, "findings.yml", "file: [A.java\n");

  await assert.rejects(
    loadDetectorRun(root),
    (err) => err instanceof YamlParseError && err.filePath === findingsFile
  );
});

test("parseFindings names the offending document", () => {
  assert.throws(
    () => parseFindings([{ file: "A.java" }, { method: "foo()" }], "findings.yml"),
    (err) => err instanceof DetectorRunParseError && err.message.includes("finding #2: file:")
  );
});
