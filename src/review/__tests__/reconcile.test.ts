import assert from "node:assert/strict";
import { test } from "node:test";
import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import {
  makeMisuse,
  makeProject,
  makeTempDir,
  makeVersion,
  writeFixture
} from "../../__tests__/helpers/fixtures.js";
import { MalformedReviewRecordError } from "../../errors/review.errors.js";
import type { DetectorRun, Project } from "../../types.js";
import { createFileArtifactStore, type ReviewArtifactStore } from "../artifactStore.js";
import type { FindingReview, ReviewLedger } from "../ledger.js";
import { reconcileReviews, type ReconcileOptions } from "../reconcile.js";
import { createKnownMisuseMatching } from "../strategies.js";

type Workspace = {
  root: string;
  findingsPath: string;
  reviewPath: string;
  compilesPath: string;
  reviewDir: string;
};

const MATCHING_FINDINGS = "file: src/pkg/A.java\nmethod: foo(int)\n---\nfile: B.java\nmethod: bar()\n";

const corpus = (): Project[] => {
  const misuse = makeMisuse("m1", { file: "pkg/A.java", method: "void foo(int)" });
  return [makeProject("p", [makeVersion("p", "v", [misuse])])];
};

async function setUp(root: string, runFile: string | null, findings = MATCHING_FINDINGS): Promise<Workspace> {
  const findingsPath = path.join(root, "findings", "det");
  if (runFile !== null) {
    await writeFixture(findingsPath, "p/v/run.yml", runFile);
  }
  await writeFixture(findingsPath, "p/v/findings.yml", findings);
  const reviewPath = path.join(root, "reviews", "det");
  return {
    root,
    findingsPath,
    reviewPath,
    compilesPath: path.join(root, "compiles"),
    reviewDir: path.join(reviewPath, "p", "v", "m1")
  };
}

const run = (workspace: Workspace, options: Partial<ReconcileOptions> = {}) =>
  reconcileReviews({
    detector: "det",
    findingsPath: workspace.findingsPath,
    reviewPath: workspace.reviewPath,
    compilesPath: workspace.compilesPath,
    projects: corpus(),
    strategy: createKnownMisuseMatching(),
    ...options
  });

const onlyRow = (ledger: ReviewLedger): FindingReview => {
  const rows = ledger.projectReviews.flatMap((project) =>
    project.runReviews.flatMap((runReview) => runReview.findingReviews)
  );
  assert.equal(rows.length, 1);
  return rows[0];
};

function createRecordingStore(): { store: ReviewArtifactStore; calls: string[] } {
  const inner = createFileArtifactStore();
  const calls: string[] = [];
  const store: ReviewArtifactStore = {
    existsAndReusable: (reviewDir, force) => inner.existsAndReusable(reviewDir, force),
    hasReviewSite: (reviewDir) => inner.hasReviewSite(reviewDir),
    loadExistingReviews: (reviewDir) => inner.loadExistingReviews(reviewDir),
    clear: async (reviewDir) => {
      calls.push("clear");
      await inner.clear(reviewDir);
    },
    createEmpty: async (reviewDir) => {
      calls.push("createEmpty");
      await inner.createEmpty(reviewDir);
    },
    persistCandidates: async (candidates, reviewDir) => {
      calls.push("persistCandidates");
      await inner.persistCandidates(candidates, reviewDir);
    }
  };
  return { store, calls };
}

test("a first pass writes the review site, candidates and both indexes", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\nruntime: 1.5\n");

  const result = await run(workspace);

  const row = onlyRow(result.ledger);
  assert.equal(row.name, "m1");
  assert.deepStrictEqual(row.outcome, { kind: "review", href: "p/v/m1/review.html" });
  assert.deepStrictEqual(row.reviewers, []);
  assert.ok(existsSync(path.join(workspace.reviewDir, "review.html")));
  assert.equal(
    await readFile(path.join(workspace.reviewDir, "potentialhits.yml"), "utf-8"),
    "file: src/pkg/A.java\nmethod: foo(int)\n"
  );
  assert.deepStrictEqual(result.counts, { "run-failure": 0, "no-hits": 0, review: 1, download: 0 });

  assert.equal(result.indexPath, path.join(workspace.reviewPath, "index.html"));
  const index = await readFile(result.indexPath, "utf-8");
  assert.ok(index.includes("<td>v (result: success, findings: 2, duration: 1.5s)</td>"));
  assert.ok(index.includes('<td>[<a href="p/v/m1/review.html">review</a>]</td>'));

  assert.equal(result.mainIndexPath, path.join(workspace.root, "reviews", "index.html"));
  const mainIndex = await readFile(path.join(workspace.root, "reviews", "index.html"), "utf-8");
  assert.ok(mainIndex.includes('<li><a href="det/index.html">det</a></li>'));
});

test("a finding reported with a shorter path than the misuse file gets a review", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n", "file: A.java\nmethod: foo(int)\n");
  assert.equal(existsSync(workspace.reviewDir), false);

  const result = await run(workspace);

  const row = onlyRow(result.ledger);
  assert.deepStrictEqual(row.outcome, { kind: "review", href: "p/v/m1/review.html" });
  assert.deepStrictEqual(row.reviewers, []);
  assert.ok(existsSync(path.join(workspace.reviewDir, "review.html")));
  assert.equal(
    await readFile(path.join(workspace.reviewDir, "potentialhits.yml"), "utf-8"),
    "file: A.java\nmethod: foo(int)\n"
  );
});

test("a second pass reuses the directory and reports its reviewers", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n");
  await run(workspace);
  const reviewSite = path.join(workspace.reviewDir, "review.html");
  const before = await readFile(reviewSite, "utf-8");
  await writeFixture(workspace.reviewDir, "review-alice.yml", "reviewer: alice\nhit: yes\n");
  const { store, calls } = createRecordingStore();

  const result = await run(workspace, { store });

  const row = onlyRow(result.ledger);
  assert.deepStrictEqual(row.outcome, { kind: "review", href: "p/v/m1/review.html" });
  assert.deepStrictEqual(row.reviewers, ["alice"]);
  assert.deepStrictEqual(calls, []);
  assert.equal(await readFile(reviewSite, "utf-8"), before);
  assert.ok((await readFile(result.indexPath, "utf-8")).includes("<td>reviewed by alice</td>"));
});

test("an existing directory without a review site stays a no-hits row", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n");
  await mkdir(workspace.reviewDir, { recursive: true });

  const result = await run(workspace);

  assert.deepStrictEqual(onlyRow(result.ledger).outcome, { kind: "no-hits" });
  assert.deepStrictEqual(await readdir(workspace.reviewDir), []);
});

test("forcing regeneration discards reviewer annotations", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n");
  await run(workspace);
  await writeFixture(workspace.reviewDir, "review-alice.yml", "reviewer: alice\n");

  const result = await run(workspace, { forcePrepare: true });

  const row = onlyRow(result.ledger);
  assert.deepStrictEqual(row.outcome, { kind: "review", href: "p/v/m1/review.html" });
  assert.deepStrictEqual(row.reviewers, []);
  assert.deepStrictEqual((await readdir(workspace.reviewDir)).sort(), ["potentialhits.yml", "review.html"]);
});

test("forcing regeneration without candidates leaves an empty directory", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n", "file: Other.java\n");
  await writeFixture(workspace.reviewDir, "review.html", "<html>stale</html>");
  await writeFixture(workspace.reviewDir, "review-alice.yml", "reviewer: alice\n");
  const { store, calls } = createRecordingStore();

  const result = await run(workspace, { forcePrepare: true, store });

  assert.deepStrictEqual(onlyRow(result.ledger).outcome, { kind: "no-hits" });
  assert.deepStrictEqual(calls, ["clear", "createEmpty"]);
  assert.deepStrictEqual(await readdir(workspace.reviewDir), []);
});

test("a failed run is reported without touching the review tree", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: error\n");

  const result = await run(workspace);

  const row = onlyRow(result.ledger);
  assert.deepStrictEqual(row.outcome, { kind: "run-failure", result: "error" });
  assert.deepStrictEqual(row.reviewers, []);
  assert.equal(existsSync(path.join(workspace.reviewPath, "p")), false);
  assert.ok((await readFile(result.indexPath, "utf-8")).includes("<td>[run: error]</td>"));
});

test("a version the detector never ran on is reported as not run", async (t) => {
  const workspace = await setUp(await makeTempDir(t), null);

  const result = await run(workspace);

  assert.deepStrictEqual(onlyRow(result.ledger).outcome, { kind: "run-failure", result: "not run" });
  assert.equal(existsSync(workspace.reviewDir), false);
});

test("the ledger mirrors the corpus shape and reloads the run for every misuse", async (t) => {
  const root = await makeTempDir(t);
  const projects = ["p1", "p2"].map((projectId) =>
    makeProject(
      projectId,
      ["v1", "v2"].map((versionId) =>
        makeVersion(
          projectId,
          versionId,
          ["m1", "m2", "m3"].map((misuseId) =>
            makeMisuse(misuseId, { file: "A.java", method: "void foo()" }, { projectId, versionId })
          )
        )
      )
    )
  );
  const loaded: string[] = [];
  const loadRun = async (findingsPath: string): Promise<DetectorRun> => {
    loaded.push(findingsPath);
    return { result: "success", runtime: 0, findings: [] };
  };

  const result = await reconcileReviews({
    detector: "det",
    findingsPath: path.join(root, "findings", "det"),
    reviewPath: path.join(root, "reviews", "det"),
    compilesPath: path.join(root, "compiles"),
    projects,
    strategy: createKnownMisuseMatching(),
    loadRun
  });

  assert.deepStrictEqual(
    result.ledger.projectReviews.map((project) => [
      project.projectId,
      project.runReviews.map((runReview) => [
        runReview.versionId,
        runReview.findingReviews.map((review) => review.name)
      ])
    ]),
    [
      ["p1", [["v1", ["m1", "m2", "m3"]], ["v2", ["m1", "m2", "m3"]]]],
      ["p2", [["v1", ["m1", "m2", "m3"]], ["v2", ["m1", "m2", "m3"]]]]
    ]
  );
  assert.equal(result.counts["no-hits"], 12);
  assert.equal(loaded.length, 4 + 12);
  assert.equal(loaded[0], path.join(root, "findings", "det", "p1", "v1"));
  assert.equal(result.mainIndexPath, null);
});

test("a malformed review record aborts the pass and keeps the previous index", async (t) => {
  const workspace = await setUp(await makeTempDir(t), "result: success\n");
  const first = await run(workspace);
  await writeFile(first.indexPath, "previous index", "utf-8");
  await writeFixture(workspace.reviewDir, "review-bob.yml", "reviewer: [bob\n");

  await assert.rejects(run(workspace), MalformedReviewRecordError);

  assert.equal(await readFile(first.indexPath, "utf-8"), "previous index");
});
