/**
 * Tests for the `pipeconf resolve` command.
 * Run with: npx tsx --test lib/cli.test.ts
 */
import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { Command } from "commander";
import { formatFiles, parseRepo, registerCli, runResolve, type CliDeps, type ResolveOptions } from "./cli.js";
import { createCommandStub, TestForge } from "./testing/index.js";

function depsFor(forge: TestForge) {
  const out: string[] = [];
  const err: string[] = [];
  const deps: CliDeps = {
    runCommand: createCommandStub([]).runCommand,
    forge,
    stdout: (text) => { out.push(text); },
    stderr: (text) => { err.push(text); },
  };
  return { deps, out, err };
}

const BASE: ResolveOptions = { commit: "0123abcd", user: "cli", logLevel: "error" };

describe("runResolve", () => {
  it("prints name and size of each resolved file", async () => {
    const forge = new TestForge();
    forge.seedFile(".ci.yml", "steps: []\n");
    const { deps, out, err } = depsFor(forge);

    const code = await runResolve("acme/widgets", BASE, deps);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(out, [".ci.yml\t10\n"]);
    assert.deepStrictEqual(err, []);
    assert.deepStrictEqual(forge.probedPaths(), [".ci", ".ci.yaml", ".ci.yml"]);
  });

  it("prints JSON with --json", async () => {
    const forge = new TestForge();
    forge.seedFile(".ci/build.yml", "build");
    const { deps, out } = depsFor(forge);

    await runResolve("acme/widgets", { ...BASE, json: true }, deps);

    assert.deepStrictEqual(JSON.parse(out.join("")), [{ name: ".ci/build.yml", size: 5, content: "build" }]);
  });

  it("applies --config, --depth and --ignore-templates", async () => {
    const forge = new TestForge();
    forge.seedFile("pipelines/build.yml");
    forge.seedFile("pipelines/nested/lint.yml");
    forge.seedFile("pipelines/nested/template-base.yml");
    const { deps, out } = depsFor(forge);

    const code = await runResolve(
      "acme/widgets",
      { ...BASE, config: "pipelines/", depth: 1, ignoreTemplates: true },
      deps,
    );

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(out, ["pipelines/build.yml\t10\npipelines/nested/lint.yml\t10\n"]);
  });

  it("exits 1 with the error message when nothing is found", async () => {
    const { deps, out, err } = depsFor(new TestForge());

    const code = await runResolve("acme/widgets", BASE, deps);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(out, []);
    assert.deepStrictEqual(err, ["pipeconf: config not found in: .ci/, .ci.yaml, .ci.yml\n"]);
  });

  it("rejects an out-of-range depth before touching the forge", async () => {
    const forge = new TestForge();
    const { deps, err } = depsFor(forge);

    const code = await runResolve("acme/widgets", { ...BASE, depth: 11 }, deps);

    assert.strictEqual(code, 1);
    assert.ok(err[0]?.startsWith("pipeconf: "));
    assert.deepStrictEqual(forge.calls, []);
  });

  it("rejects a repository without owner", async () => {
    const { deps, err } = depsFor(new TestForge());

    assert.strictEqual(await runResolve("widgets", BASE, deps), 1);
    assert.deepStrictEqual(err, ['pipeconf: Invalid repository "widgets": expected owner/name\n']);
  });
});

describe("registerCli", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("parses flags into a resolution", async () => {
    const forge = new TestForge();
    forge.seedFile("ci/a.yml", "a");
    forge.seedFile("ci/sub/b.yml", "bb");
    const { deps, out } = depsFor(forge);
    const program = new Command("pipeconf").exitOverride();
    registerCli(program, deps);

    await program.parseAsync(
      ["resolve", "acme/widgets", "--commit", "0123abcd", "--config", "ci/", "--depth", "1", "--log-level", "error"],
      { from: "user" },
    );

    assert.strictEqual(process.exitCode, 0);
    assert.deepStrictEqual(out, ["ci/a.yml\t1\nci/sub/b.yml\t2\n"]);
    assert.deepStrictEqual(forge.callsTo("dir"), [
      { method: "dir", args: { path: "ci", depth: 1, commit: "0123abcd" } },
    ]);
  });
});

describe("parseRepo", () => {
  it("splits GitLab subgroups at the last slash", () => {
    assert.deepStrictEqual(parseRepo("group/sub/widgets"), { owner: "group/sub", name: "widgets", fullName: "group/sub/widgets" });
  });
});

describe("formatFiles", () => {
  it("prints contents with --print", () => {
    const files = [
      { name: "a.yml", data: Buffer.from("one\n") },
      { name: "b.yml", data: Buffer.from("two\n") },
    ];
    assert.strictEqual(formatFiles(files, { print: true }), "--- a.yml\none\n\n--- b.yml\ntwo\n");
  });
});
