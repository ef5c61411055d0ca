import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BenchmarkIntegrator, benchmarkName } from "../src/integrate/integrator.js";
import { readBenchmarkManifest } from "../src/integrate/manifest.js";
import { PinningResolver } from "../src/pinning/resolver.js";
import { CollectingReporter } from "../src/core/reporter.js";
import type { RegistryListing } from "../src/registry/image-registry.js";
import { DIGEST_A, DIGEST_B, FakeImageRegistry, FakeSourceControl, UPSTREAM_SHA, listing } from "./fakes.js";

const BASE_IMAGE = "gcr.io/oss-fuzz-base/base-builder";

describe("benchmarkName", () => {
  it("defaults to <project>_<fuzz target>", () => {
    expect(benchmarkName("libpng", "libpng_read_fuzzer")).toBe("libpng_libpng_read_fuzzer");
    expect(benchmarkName("libpng", "libpng_read_fuzzer", "png")).toBe("png");
  });
});

describe("BenchmarkIntegrator", () => {
  let tmp: string;
  let ossFuzzDir: string;
  let benchmarksDir: string;
  let reporter: CollectingReporter;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "benchctl-integrate-"));
    ossFuzzDir = path.join(tmp, "oss-fuzz");
    benchmarksDir = path.join(tmp, "benchmarks");
    const projectDir = path.join(ossFuzzDir, "projects", "foo");
    fs.mkdirSync(projectDir, { recursive: true });
    fs.mkdirSync(benchmarksDir);
    fs.writeFileSync(path.join(projectDir, "Dockerfile"), `FROM ${BASE_IMAGE}\nRUN git clone foo\n`);
    fs.writeFileSync(path.join(projectDir, "build.sh"), "make\n");
    fs.writeFileSync(path.join(projectDir, "project.yaml"), "language: c\n");
    reporter = new CollectingReporter();
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function integrator(git: FakeSourceControl, registryListing: RegistryListing): BenchmarkIntegrator {
    const resolver = new PinningResolver({
      sourceControl: git,
      registry: new FakeImageRegistry(registryListing),
      baseImage: BASE_IMAGE,
      reporter,
    });
    return new BenchmarkIntegrator({ resolver, ossFuzzDir, benchmarksDir, reporter });
  }

  const request = { project: "foo", fuzzTarget: "foo_fuzzer", repoPath: "/src/foo", date: "2021-05-01" };

  it("copies the project, pins the base image and writes the manifest", async () => {
    const git = new FakeSourceControl(UPSTREAM_SHA);
    const res = await integrator(
      git,
      listing(["2021-04-01T00:00:00Z", DIGEST_A], ["2021-06-01T00:00:00Z", DIGEST_B]),
    ).integrate(request);

    if (!res.ok) throw new Error(res.error.message);
    const dir = path.join(benchmarksDir, "foo_foo_fuzzer");
    expect(res.benchmark).toBe("foo_foo_fuzzer");
    expect(res.benchmarkDir).toBe(dir);
    expect(res.copiedFiles).toEqual(["Dockerfile", "build.sh", "project.yaml"]);
    expect(res.upstreamCommit).toBe(UPSTREAM_SHA);
    expect(git.calls).toEqual([
      "log projects/foo 2021-05-01T00:00:00.000Z",
      `checkout ${UPSTREAM_SHA} projects/foo`,
      "reset",
    ]);

    expect(fs.readFileSync(path.join(dir, "Dockerfile"), "utf8")).toBe(`FROM ${BASE_IMAGE}@${DIGEST_A}\nRUN git clone foo\n`);
    expect(fs.readFileSync(path.join(dir, "build.sh"), "utf8")).toBe("make\n");
    expect(res.manifestPath).toBe(path.join(dir, "oss-fuzz.yaml"));
    expect(await readBenchmarkManifest(dir)).toEqual({
      project: "foo",
      fuzz_target: "foo_fuzzer",
      commit: null,
      commit_date: "2021-05-01T00:00:00.000Z",
      repo_path: "/src/foo",
      benchmark: "foo_foo_fuzzer",
      oss_fuzz_commit: UPSTREAM_SHA,
      base_builder_digest: DIGEST_A,
    });
    expect(reporter.codes()).toEqual(["UPSTREAM_PINNED", "BASE_IMAGE_PINNED"]);
  });

  it("creates nothing when no commit precedes the date", async () => {
    const git = new FakeSourceControl(null);
    const res = await integrator(git, listing()).integrate(request);

    expect(res.ok).toBe(false);
    expect(!res.ok && res.error.code).toBe("NO_PRIOR_COMMIT");
    expect(fs.existsSync(path.join(benchmarksDir, "foo_foo_fuzzer"))).toBe(false);
    expect(reporter.codes()).toEqual(["NO_PRIOR_COMMIT"]);
  });

  it("completes without a base-image pin when the registry tool is missing", async () => {
    const res = await integrator(new FakeSourceControl(UPSTREAM_SHA), {
      status: "skipped",
      code: "EXTERNAL_TOOL_MISSING",
      reason: "gcloud not found in PATH",
    }).integrate({ ...request, commit: "abc1234" });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.basePin.status).toBe("skipped");
    expect(res.manifest.base_builder_digest).toBeUndefined();
    expect(res.manifest.commit).toBe("abc1234");
    expect(fs.readFileSync(path.join(res.benchmarkDir, "Dockerfile"), "utf8")).toBe(`FROM ${BASE_IMAGE}\nRUN git clone foo\n`);
    expect(reporter.codes()).toEqual(["UPSTREAM_PINNED", "EXTERNAL_TOOL_MISSING"]);
  });

  it("warns when the benchmark directory already exists", async () => {
    const dir = path.join(benchmarksDir, "custom");
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, "keep.txt"), "x");

    const res = await integrator(new FakeSourceControl(UPSTREAM_SHA), listing()).integrate({ ...request, benchmarkName: "custom" });

    expect(res.ok).toBe(true);
    expect(reporter.codes()[0]).toBe("BENCHMARK_DIR_EXISTS");
    expect(fs.readFileSync(path.join(dir, "keep.txt"), "utf8")).toBe("x");
  });

  it("rejects a benchmark name outside the target grammar", async () => {
    const git = new FakeSourceControl(UPSTREAM_SHA);
    const res = await integrator(git, listing()).integrate({ ...request, project: "Foo" });

    expect(!res.ok && res.error.code).toBe("INVALID_BENCHMARK_NAME");
    expect(git.calls).toEqual([]);
  });

  it("refuses the umbrella name all", async () => {
    const git = new FakeSourceControl(UPSTREAM_SHA);
    const res = await integrator(git, listing()).integrate({ ...request, benchmarkName: "all" });

    expect(!res.ok && res.error.code).toBe("RESERVED_BENCHMARK_NAME");
    expect(git.calls).toEqual([]);
    expect(fs.existsSync(path.join(benchmarksDir, "all"))).toBe(false);
  });

  it("rejects an unparseable date", async () => {
    const git = new FakeSourceControl(UPSTREAM_SHA);
    const res = await integrator(git, listing()).integrate({ ...request, date: "last tuesday" });

    expect(!res.ok && res.error.code).toBe("INVALID_DATE");
    expect(git.calls).toEqual([]);
  });
});
