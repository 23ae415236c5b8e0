/**
 * Tests for candidate probing and the first-match-wins cascade.
 * Run with: npx tsx --test lib/fetch/cascade.test.ts
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { getFirstAvailableConfig, probeCandidate, type FetchScope } from "./cascade.js";
import {
  ConfigNotFoundError,
  DuplicateConfigNameError,
  ForgeFetchError,
  UnsupportedCapabilityError,
} from "../errors.js";
import { CaptureLogger, TestForge, testRepo, TEST_PIPELINE, TEST_USER } from "../testing/index.js";
import type { RepoConfigPolicy } from "../types.js";

function scopeFor(forge: TestForge, policy: Partial<RepoConfigPolicy> = {}, signal?: AbortSignal) {
  const logger = new CaptureLogger();
  const scope: FetchScope = { forge, user: TEST_USER, repo: testRepo(policy), pipeline: TEST_PIPELINE, logger, signal };
  return { scope, logger };
}

describe("probeCandidate", () => {
  it("treats a missing file as a miss", async () => {
    const { scope } = scopeFor(new TestForge());
    assert.deepStrictEqual(await probeCandidate(scope, "main.yml"), { kind: "miss", note: "main.yml: file not found" });
  });

  it("treats an empty file as a miss", async () => {
    const forge = new TestForge();
    forge.seedFile("main.yml", "");
    const { scope } = scopeFor(forge);
    assert.deepStrictEqual(await probeCandidate(scope, "main.yml"), { kind: "miss", note: "main.yml: file is empty" });
  });

  it("wraps a found file as a one-element set", async () => {
    const forge = new TestForge();
    forge.seedFile("main.yml", "steps: [build]\n");
    const { scope, logger } = scopeFor(forge);

    const result = await probeCandidate(scope, "main.yml");

    assert.strictEqual(result.kind, "found");
    assert.deepStrictEqual(result.kind === "found" && result.files, [
      { name: "main.yml", data: Buffer.from("steps: [build]\n") },
    ]);
    assert.deepStrictEqual(logger.messages("info"), ["found config file: 'main.yml'"]);
  });

  it("passes the scan depth and the path without trailing slash to dir", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/build.yml");
    const { scope } = scopeFor(forge, { scanDepth: 3 });

    await probeCandidate(scope, "ci/");

    assert.deepStrictEqual(forge.callsTo("dir"), [
      { method: "dir", args: { path: "ci", depth: 3, commit: TEST_PIPELINE.commit } },
    ]);
  });

  it("misses without calling anything when the forge cannot list directories", async () => {
    const forge = new TestForge({ supportsDir: false });
    forge.seedFile("ci/build.yml");
    const { scope } = scopeFor(forge);

    const result = await probeCandidate(scope, "ci/");

    assert.deepStrictEqual(result, { kind: "miss", note: "ci/: not found or not implemented" });
    assert.deepStrictEqual(forge.calls, []);
  });

  it("misses when the forge reports the capability unsupported for this repo", async () => {
    const forge = new TestForge();
    forge.failNext("dir", "ci", new UnsupportedCapabilityError("test", "dir"));
    const { scope, logger } = scopeFor(forge);

    assert.deepStrictEqual(await probeCandidate(scope, "ci/"), { kind: "miss", note: "ci/: not found or not implemented" });
    assert.deepStrictEqual(logger.messages("error"), []);
  });

  it("keeps other directory errors as evidence and logs them", async () => {
    const forge = new TestForge();
    const boom = new Error("502 bad gateway");
    forge.failNext("dir", "ci", boom);
    const { scope, logger } = scopeFor(forge);

    const result = await probeCandidate(scope, "ci/");

    assert.deepStrictEqual(result, { kind: "error", error: boom, note: "ci/: error - 502 bad gateway" });
    assert.deepStrictEqual(logger.messages("error"), ["could not get folder from forge: 502 bad gateway"]);
  });

  it("notes listings where nothing qualifies", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/README.md");
    forge.seedFile("ci/run.sh");
    const { scope, logger } = scopeFor(forge);

    const result = await probeCandidate(scope, "ci/");

    const note = "ci/: found 2 items but none are pipeline files: [ci/README.md ci/run.sh]";
    assert.deepStrictEqual(result, { kind: "miss", note });
    assert.deepStrictEqual(logger.messages("debug"), [note]);
  });
});

describe("getFirstAvailableConfig", () => {
  it("falls through a missing file to a directory, keeping listing order", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/build.yml", "build");
    forge.seedFile("ci/deploy.yml", "deploy");
    const { scope } = scopeFor(forge, { scanDepth: 1 });

    const files = await getFirstAvailableConfig(scope, ["main.yml", "ci/"]);

    assert.deepStrictEqual(files, [
      { name: "ci/build.yml", data: Buffer.from("build") },
      { name: "ci/deploy.yml", data: Buffer.from("deploy") },
    ]);
    assert.deepStrictEqual(forge.probedPaths(), ["main.yml", "ci"]);
  });

  it("excludes template files when the repo says so", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/build.yml");
    forge.seedFile("ci/deploy.yml");
    forge.seedFile("ci/templates/base.yml");
    const { scope } = scopeFor(forge, { scanDepth: 1, ignoreTemplateFiles: true });

    const files = await getFirstAvailableConfig(scope, ["main.yml", "ci/"]);

    assert.deepStrictEqual(files.map((f) => f.name), ["ci/build.yml", "ci/deploy.yml"]);
  });

  it("includes nested files only down to the scan depth", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/build.yml");
    forge.seedFile("ci/a/lint.yml");
    forge.seedFile("ci/a/b/deep.yml");
    const { scope } = scopeFor(forge, { scanDepth: 0 });

    const files = await getFirstAvailableConfig(scope, ["ci/"]);

    assert.deepStrictEqual(files.map((f) => f.name), ["ci/build.yml"]);
  });

  it("never consults a candidate after the first match", async () => {
    const forge = new TestForge();
    forge.seedFile(".ci.yaml");
    forge.seedFile(".ci.yml");
    const { scope } = scopeFor(forge);

    const files = await getFirstAvailableConfig(scope, [".ci.yaml", ".ci.yml"]);

    assert.deepStrictEqual(files.map((f) => f.name), [".ci.yaml"]);
    assert.deepStrictEqual(forge.probedPaths(), [".ci.yaml"]);
  });

  it("aborts on duplicate logical names without trying later candidates", async () => {
    const forge = new TestForge();
    forge.seedFile("main.yml");
    forge.seedFile("ci/main.yml");
    forge.seedFile("fallback.yml");
    const { scope, logger } = scopeFor(forge, { scanDepth: 1 });

    await assert.rejects(
      getFirstAvailableConfig(scope, ["/", "fallback.yml"]),
      (err: unknown) => err instanceof DuplicateConfigNameError
        && err.fileName === "main" && err.firstPath === "main.yml" && err.secondPath === "ci/main.yml",
    );
    assert.deepStrictEqual(forge.probedPaths(), [""]);
    assert.deepStrictEqual(logger.messages("error"), ["duplicate config file names found"]);
  });

  it("aborts on a duplicate even after earlier candidates failed", async () => {
    const forge = new TestForge();
    forge.failNext("file", "first.yml", new Error("timeout talking to forge"));
    forge.seedFile("ci/a/job.yml");
    forge.seedFile("ci/b/job.yaml");
    const { scope } = scopeFor(forge, { scanDepth: 1 });

    await assert.rejects(getFirstAvailableConfig(scope, ["first.yml", "ci/"]), DuplicateConfigNameError);
  });

  it("reports not found with every candidate when nothing failed", async () => {
    const forge = new TestForge();
    const { scope, logger } = scopeFor(forge);

    await assert.rejects(
      getFirstAvailableConfig(scope, ["main.yml", "ci/"]),
      (err: unknown) => {
        assert.ok(err instanceof ConfigNotFoundError);
        assert.deepStrictEqual(err.configs, ["main.yml", "ci/"]);
        return true;
      },
    );
    assert.deepStrictEqual(logger.messages("warn"), [
      "No config found. Searched: [main.yml: file not found, ci/: not found or not implemented]",
    ]);
  });

  it("aggregates forge errors when nothing matched", async () => {
    const forge = new TestForge();
    const dirErr = new Error("dir exploded");
    const fileErr = new Error("file exploded");
    forge.failNext("dir", "ci", dirErr);
    forge.failNext("file", "main.yml", fileErr);
    const { scope } = scopeFor(forge);

    await assert.rejects(
      getFirstAvailableConfig(scope, ["ci/", "missing.yml", "main.yml"]),
      (err: unknown) => {
        assert.ok(err instanceof ForgeFetchError);
        assert.deepStrictEqual(err.errors, [dirErr, fileErr]);
        assert.strictEqual(err.message, "forge errors while fetching config: dir exploded; file exploded");
        return true;
      },
    );
  });

  it("ignores earlier errors once a later candidate matches", async () => {
    const forge = new TestForge();
    forge.failNext("dir", "ci", new Error("flaky"));
    forge.seedFile(".ci.yml");
    const { scope } = scopeFor(forge);

    const files = await getFirstAvailableConfig(scope, ["ci/", ".ci.yml"]);

    assert.deepStrictEqual(files.map((f) => f.name), [".ci.yml"]);
  });

  it("stops probing once the signal is aborted", async () => {
    const forge = new TestForge();
    forge.seedFile("main.yml");
    const controller = new AbortController();
    controller.abort(new Error("deadline"));
    const { scope } = scopeFor(forge, {}, controller.signal);

    await assert.rejects(
      getFirstAvailableConfig(scope, ["main.yml"]),
      (err: unknown) => err instanceof ForgeFetchError && err.errors[0] instanceof Error && err.errors[0].message === "deadline",
    );
    assert.deepStrictEqual(forge.calls, []);
  });
});
