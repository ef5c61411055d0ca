import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { generate } from "../src/commands/generate.js";
import { integrate } from "../src/commands/integrate.js";
import { validateAll } from "../src/commands/validate.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { CollectingReporter, StreamReporter } from "../src/core/reporter.js";
import { DIGEST_A, FakeImageRegistry, FakeSourceControl, UPSTREAM_SHA, listing } from "./fakes.js";

function write(file: string, text: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text);
}

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "benchctl-cmd-"));
  fs.mkdirSync(path.join(root, "fuzzers", "afl"), { recursive: true });
  write(path.join(root, "benchmarks", "libxml_parse", "build.sh"), "make\n");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("generate", () => {
  it("renders rules for the scanned tree", async () => {
    const reporter = new CollectingReporter();
    const res = await generate({ cwd: root, env: {}, reporter });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.partial).toBe(false);
    expect(res.outputPath).toBeUndefined();
    expect(res.makefile.split("\n")).toContain("build-afl-all: build-afl-libxml_parse");
    expect(res.makefile.split("\n")).toContain("build-afl-libxml_parse: afl-libxml_parse-runner");
    expect(reporter.diagnostics).toEqual([
      {
        level: "info",
        code: "GENERATED",
        message: "Generated 23 targets.",
        details: { fuzzers: 1, standard_benchmarks: 1, external_benchmarks: 0 },
      },
    ]);
  });

  it("writes the rules to a file when asked", async () => {
    const res = await generate({ cwd: root, env: {}, output: "out/Makefile" });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.outputPath).toBe(path.join(root, "out", "Makefile"));
    expect(fs.readFileSync(path.join(root, "out", "Makefile"), "utf8")).toBe(res.makefile);
  });

  it("uses the environment layer's registry prefix", async () => {
    const res = await generate({ cwd: root, env: {}, envName: "ci" });
    expect(res.ok && res.makefile.split("\n")).toContain("\tdocker pull gcr.io/fuzzbench-ci/base-image");
  });

  it("marks the result partial when a fuzzer is skipped", async () => {
    write(path.join(root, "fuzzers", "broken", "variants.yaml"), "variants: 3\n");
    const reporter = new CollectingReporter();
    const res = await generate({ cwd: root, env: {}, reporter });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.partial).toBe(true);
    expect(res.graph.failures.map((f) => [f.fuzzer, f.code])).toEqual([["broken", "MALFORMED_VARIANT_CONFIG"]]);
    expect(res.makefile.split("\n")).toContain("build-all: build-afl-all");
    expect(reporter.codes()).toEqual(["MALFORMED_VARIANT_CONFIG", "GENERATED"]);
  });

  it("prefers build.sh when a benchmark carries both markers", async () => {
    write(
      path.join(root, "benchmarks", "libxml_parse", "oss-fuzz.yaml"),
      "project: libxml\nfuzz_target: libxml_parse\ncommit: null\ncommit_date: 2021-05-01T00:00:00.000Z\nrepo_path: /src/libxml\n",
    );
    const reporter = new CollectingReporter();
    const res = await generate({ cwd: root, env: {}, reporter });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.partial).toBe(false);
    expect(res.graph.variables).toEqual([]);
    expect(res.makefile.split("\n")).toContain("build-afl-libxml_parse: afl-libxml_parse-runner");
    expect(reporter.codes()).toEqual(["BENCHMARK_KIND_CONFLICT", "GENERATED"]);
  });

  it("warns about externally-derived benchmarks without a builder hash", async () => {
    write(
      path.join(root, "benchmarks", "foo_foo_fuzzer", "oss-fuzz.yaml"),
      "project: foo\nfuzz_target: foo_fuzzer\ncommit: null\ncommit_date: 2021-05-01T00:00:00.000Z\nrepo_path: /src/foo\n",
    );
    const reporter = new CollectingReporter();
    const res = await generate({ cwd: root, env: {}, reporter });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.partial).toBe(false);
    expect(reporter.diagnostics[0]).toEqual({
      level: "warn",
      code: "MISSING_BUILDER_HASH",
      message:
        "foo_foo_fuzzer: oss-fuzz.yaml has no oss_fuzz_builder_hash; set foo_foo_fuzzer-oss-fuzz-builder-hash when invoking make.",
      details: { benchmark: "foo_foo_fuzzer" },
    });
    expect(reporter.codes()).toEqual(["MISSING_BUILDER_HASH", "GENERATED"]);
  });

  it("skips a benchmark named all and still generates every fuzzer", async () => {
    write(path.join(root, "benchmarks", "all", "build.sh"), "make\n");
    const reporter = new CollectingReporter();
    const res = await generate({ cwd: root, env: {}, reporter });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.partial).toBe(true);
    expect(res.graph.failures).toEqual([]);
    expect(res.graph.skippedBenchmarks.map((b) => [b.benchmark, b.code])).toEqual([["all", "RESERVED_BENCHMARK_NAME"]]);
    expect(res.makefile.split("\n")).toContain("build-afl-all: build-afl-libxml_parse");
    expect(reporter.codes()).toEqual(["RESERVED_BENCHMARK_NAME", "GENERATED"]);
  });

  it("fails on an invalid config", async () => {
    const res = await generate({ cwd: root, env: { BENCHCTL_BASE_TAG: "Not A Tag" } });
    expect(!res.ok && res.error.code).toBe("CONFIG_INVALID");
  });
});

describe("integrate", () => {
  it("integrates into the configured benchmarks directory", async () => {
    const projectDir = path.join(root, "third_party", "oss-fuzz", "projects", "foo");
    write(path.join(projectDir, "Dockerfile"), "FROM gcr.io/oss-fuzz-base/base-builder\n");
    const registry = new FakeImageRegistry(listing(["2021-04-01T00:00:00Z", DIGEST_A]));

    const res = await integrate({
      project: "foo",
      fuzzTarget: "foo_fuzzer",
      repoPath: "/src/foo",
      date: "2021-05-01",
      cwd: root,
      env: {},
      sourceControl: new FakeSourceControl(UPSTREAM_SHA),
      registry,
    });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.benchmarkDir).toBe(path.join(root, "benchmarks", "foo_foo_fuzzer"));
    expect(registry.images).toEqual(["gcr.io/oss-fuzz-base/base-builder"]);
    expect(res.manifest.base_builder_digest).toBe(DIGEST_A);
  });

  it("reports the failure through the reporter", async () => {
    const reporter = new CollectingReporter();
    const res = await integrate({
      project: "foo",
      fuzzTarget: "foo_fuzzer",
      repoPath: "/src/foo",
      date: "2021-05-01",
      cwd: root,
      env: {},
      reporter,
      sourceControl: new FakeSourceControl(null),
      registry: new FakeImageRegistry(listing()),
    });

    expect(res.ok).toBe(false);
    expect(reporter.diagnostics.map((d) => [d.level, d.code])).toEqual([
      ["warn", "NO_PRIOR_COMMIT"],
      ["error", "NO_PRIOR_COMMIT"],
    ]);
  });
});

describe("validateAll", () => {
  it("summarizes a valid tree", async () => {
    write(path.join(root, "fuzzers", "afl", "variants.yaml"), "variants:\n  - name: afl_a\n  - name: afl_b\n");
    expect(await validateAll({ cwd: root, env: {} })).toEqual({
      ok: true,
      summary: { fuzzers: 1, variants: 2, standardBenchmarks: 1, externalBenchmarks: 0 },
    });
  });

  it("collects every problem with its path", async () => {
    write(path.join(root, "benchmarks", "bad_manifest", "oss-fuzz.yaml"), "project: foo\n");
    write(path.join(root, "fuzzers", "afl", "variants.yaml"), "variants:\n  - name: afl\n");

    const res = await validateAll({ cwd: root, env: {} });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors.map((e) => [e.code, e.path])).toEqual([
      ["MALFORMED_VARIANT_CONFIG", path.join(root, "fuzzers", "afl")],
      ["MANIFEST_INVALID", path.join(root, "benchmarks", "bad_manifest")],
    ]);
  });

  it("stops at an invalid config", async () => {
    const res = await validateAll({ cwd: root, env: { BENCHCTL_COVERAGE_FUZZERS: "Bad Name" } });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
  });
});

describe("StreamReporter", () => {
  function sink(): { out: { write(chunk: string): boolean }; lines: string[] } {
    const lines: string[] = [];
    return { lines, out: { write: (chunk: string) => lines.push(chunk) > 0 } };
  }

  it("prefixes warnings and errors in human format", () => {
    const { out, lines } = sink();
    const reporter = new StreamReporter("human", out);
    reporter.report({ level: "warn", code: "X", message: "careful" });
    reporter.report({ level: "info", code: "Y", message: "done" });
    expect(lines).toEqual(["warn: careful\n", "done\n"]);
  });

  it("writes one JSON object per line in jsonl format", () => {
    const { out, lines } = sink();
    new StreamReporter("jsonl", out).report({ level: "error", code: "E", message: "bad" });
    expect(lines).toEqual(['{"level":"error","code":"E","message":"bad"}\n']);
  });
});

describe("EXIT", () => {
  it("keeps distinct codes per outcome", () => {
    expect(new Set(Object.values(EXIT)).size).toBe(4);
    expect(EXIT.PARTIAL_GENERATION).toBe(2);
  });
});
