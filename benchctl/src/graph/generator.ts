import { BenchError, ReservedBenchmarkNameError, errorMessage } from "../core/errors.js";
import { isReservedBenchmarkName } from "../core/security.js";
import type { ExternalBenchmark, Fuzzer, StandardBenchmark, Variant } from "../types/benchmark.js";
import type {
  BenchmarkFailure,
  BuildAction,
  EnvEntry,
  Expr,
  FuzzerFailure,
  MakeVariable,
  TargetGraph,
} from "../types/target.js";
import { GraphBuilder } from "./builder.js";

export type GeneratorInput = {
  fuzzers: Fuzzer[];
  standardBenchmarks: StandardBenchmark[];
  externalBenchmarks: ExternalBenchmark[];
  /** Registry prefix for every image, e.g. gcr.io/fuzzbench. */
  baseTag: string;
};

/** What the run/test-run/debug targets of one benchmark run against. */
type RunnerRef = {
  fuzzer: string;
  benchmark: string;
  runner: string;
  pullRunner: string;
  external: boolean;
};

/** One fuzzer × benchmark pair after its image chain has been emitted. */
type Chain = {
  benchmark: string;
  builder: string;
  /** null for coverage-only fuzzers, which have no runner image. */
  runner: RunnerRef | null;
};

type DockerBuild = Extract<BuildAction, { kind: "build" }>;

export const BASE_TARGETS = {
  image: "base-image",
  builder: "base-builder",
  runner: "base-runner",
} as const;

const pull = (name: string): string => `pull-${name}`;

export function projectNameVariable(benchmark: string): string {
  return `${benchmark}-project-name`;
}

export function fuzzTargetVariable(benchmark: string): string {
  return `${benchmark}-fuzz-target`;
}

export function builderHashVariable(benchmark: string): string {
  return `${benchmark}-oss-fuzz-builder-hash`;
}

/**
 * Expand fuzzers × benchmarks into the ordered build graph.
 *
 * Output order follows input order; callers that need reproducible output
 * across machines sort their inputs (the directory scan does by default).
 * A fuzzer that cannot be generated (name collision, bad name) is rolled back
 * and reported in `failures`; the rest of the graph is unaffected. A benchmark
 * whose name would shadow an umbrella target is left out of every chain and
 * reported in `skippedBenchmarks`.
 */
export function generateTargetGraph(input: GeneratorInput): TargetGraph {
  const skippedBenchmarks: BenchmarkFailure[] = [];
  const usable = <B extends { name: string }>(benchmarks: B[]): B[] =>
    benchmarks.filter((b) => {
      if (!isReservedBenchmarkName(b.name)) return true;
      const e = new ReservedBenchmarkNameError(b.name);
      skippedBenchmarks.push({ benchmark: b.name, code: e.code, message: e.message });
      return false;
    });
  const standardBenchmarks = usable(input.standardBenchmarks);
  const externalBenchmarks = usable(input.externalBenchmarks);

  const g = new GraphEmitter(input.baseTag);
  g.emitBase();

  const owners: string[] = [];
  const failures: FuzzerFailure[] = [];

  for (const fuzzer of input.fuzzers) {
    const mark = g.graph.mark();
    try {
      owners.push(...g.emitFuzzer(fuzzer, standardBenchmarks, externalBenchmarks));
    } catch (e: unknown) {
      g.graph.rollback(mark);
      failures.push({
        fuzzer: fuzzer.name,
        code: e instanceof BenchError ? e.code : "GENERATION_FAILED",
        message: errorMessage(e),
      });
    }
  }

  g.graph.add("build-all", owners.map((o) => `build-${o}-all`));
  g.graph.add("pull-all", owners.map((o) => `pull-${o}-all`));

  return {
    variables: externalVariables(externalBenchmarks),
    targets: g.graph.build(),
    failures,
    skippedBenchmarks,
  };
}

function externalVariables(benchmarks: ExternalBenchmark[]): MakeVariable[] {
  const vars: MakeVariable[] = [];
  for (const b of benchmarks) {
    vars.push({ name: projectNameVariable(b.name), value: b.manifest.project });
    vars.push({ name: fuzzTargetVariable(b.name), value: b.manifest.fuzz_target });
    if (b.manifest.oss_fuzz_builder_hash) {
      vars.push({ name: builderHashVariable(b.name), value: b.manifest.oss_fuzz_builder_hash });
    }
  }
  return vars;
}

class GraphEmitter {
  readonly graph = new GraphBuilder();

  constructor(private readonly baseTag: string) {}

  private image(...parts: string[]): string {
    return [this.baseTag, ...parts].join("/");
  }

  emitBase(): void {
    const { image, builder, runner } = BASE_TARGETS;
    const g = this.graph;

    g.add(image, [], this.dockerBuild(this.image(image), "docker/base-image/Dockerfile", "docker/base-image"));
    g.add(pull(image), [], { kind: "pull", image: this.image(image) });
    g.add(builder, [image], this.dockerBuild(this.image(builder), "docker/base-builder/Dockerfile", "docker/base-builder"));
    g.add(pull(builder), [pull(image)], { kind: "pull", image: this.image(builder) });
    g.add(runner, [image], this.dockerBuild(this.image(runner), "docker/base-runner/Dockerfile", "."));
    g.add(pull(runner), [pull(image)], { kind: "pull", image: this.image(runner) });
  }

  /** Emits one fuzzer and its variants; returns the owners that got umbrella targets. */
  emitFuzzer(fuzzer: Fuzzer, standard: StandardBenchmark[], external: ExternalBenchmark[]): string[] {
    const f = fuzzer.name;
    const g = this.graph;

    g.add(`${f}-builder`, [BASE_TARGETS.builder], this.dockerBuild(this.image("builders", f), `fuzzers/${f}/builder.Dockerfile`, `fuzzers/${f}`));
    g.add(pull(`${f}-builder`), [pull(BASE_TARGETS.builder)], { kind: "pull", image: this.image("builders", f) });

    const chains: Chain[] = [];
    for (const b of standard) chains.push(this.emitStandardChain(fuzzer, b.name));
    for (const b of external) chains.push(this.emitExternalChain(fuzzer, b.name));

    for (const c of chains) this.emitConvenience(f, c, {});
    this.emitUmbrella(f, chains);

    const owners = [f];
    for (const v of fuzzer.variants) {
      for (const c of chains) this.emitConvenience(v.name, c, v.env);
      this.emitUmbrella(v.name, chains);
      owners.push(v.name);
    }
    return owners;
  }

  private emitStandardChain(fuzzer: Fuzzer, b: string): Chain {
    const f = fuzzer.name;
    const g = this.graph;
    const builder = `${f}-${b}-builder`;

    g.add(builder, [`${f}-builder`], this.dockerBuild(this.image("builders", f, b), "docker/benchmark-builder/Dockerfile", ".", [
      { name: "fuzzer", value: f },
      { name: "benchmark", value: b },
    ]));
    g.add(pull(builder), [pull(`${f}-builder`)], { kind: "pull", image: this.image("builders", f, b) });

    if (fuzzer.coverageOnly) return { benchmark: b, runner: null, builder };

    const runner = this.emitRunnerChain(f, b, `${f}-${b}`, builder, "docker/benchmark-runner/Dockerfile");
    return { benchmark: b, runner: { ...runner, external: false }, builder };
  }

  /**
   * Externally-derived benchmarks build on the project's own builder image,
   * so the fuzzer's builder is rebuilt on top of it first (the intermediate).
   */
  private emitExternalChain(fuzzer: Fuzzer, b: string): Chain {
    const f = fuzzer.name;
    const g = this.graph;
    const prefix = `${f}-${b}-oss-fuzz`;
    const intermediate = `${prefix}-builder-intermediate`;
    const builder = `${prefix}-builder`;
    const intermediateImage = this.image("builders", f, `${b}-intermediate`);

    const projectImage: Expr = [
      `${this.image("oss-fuzz")}/`,
      { variable: projectNameVariable(b) },
      "@sha256:",
      { variable: builderHashVariable(b) },
    ];
    g.add(intermediate, [], this.dockerBuild(intermediateImage, `fuzzers/${f}/builder.Dockerfile`, `fuzzers/${f}`, [
      { name: "parent_image", value: projectImage },
    ]));
    g.add(pull(intermediate), [], { kind: "pull", image: intermediateImage });

    g.add(builder, [intermediate], this.dockerBuild(this.image("builders", f, b), "docker/oss-fuzz-builder/Dockerfile", ".", [
      { name: "parent_image", value: intermediateImage },
      { name: "fuzzer", value: f },
      { name: "benchmark", value: b },
    ]));
    g.add(pull(builder), [pull(intermediate)], { kind: "pull", image: this.image("builders", f, b) });

    if (fuzzer.coverageOnly) return { benchmark: b, runner: null, builder };

    const runner = this.emitRunnerChain(f, b, prefix, builder, "docker/oss-fuzz-runner/Dockerfile");
    return { benchmark: b, runner: { ...runner, external: true }, builder };
  }

  private emitRunnerChain(
    f: string,
    b: string,
    prefix: string,
    builder: string,
    dockerfile: string,
  ): Omit<RunnerRef, "external"> {
    const g = this.graph;
    const intermediate = `${prefix}-intermediate-runner`;
    const runner = `${prefix}-runner`;
    const intermediateImage = this.image("runners", f, `${b}-intermediate`);

    g.add(intermediate, [BASE_TARGETS.runner], this.dockerBuild(intermediateImage, `fuzzers/${f}/runner.Dockerfile`, `fuzzers/${f}`));
    g.add(pull(intermediate), [pull(BASE_TARGETS.runner)], { kind: "pull", image: intermediateImage });

    g.add(runner, [builder, intermediate], this.dockerBuild(this.image("runners", f, b), dockerfile, ".", [
      { name: "fuzzer", value: f },
      { name: "benchmark", value: b },
    ]));
    g.add(pull(runner), [pull(builder), pull(intermediate)], { kind: "pull", image: this.image("runners", f, b) });

    return { fuzzer: f, benchmark: b, runner, pullRunner: pull(runner) };
  }

  /**
   * build-/pull- aliases for `owner` (a fuzzer or one of its variants), plus
   * run-/test-run-/debug- when a runner exists. Coverage-only fuzzers have no
   * runner, so their aliases point at the builder.
   */
  private emitConvenience(owner: string, chain: Chain, overrides: Variant["env"]): void {
    const g = this.graph;
    const { builder, runner } = chain;
    const suffix = `${owner}-${chain.benchmark}`;

    if (!runner) {
      g.add(`build-${suffix}`, [builder]);
      g.add(`pull-${suffix}`, [pull(builder)]);
      return;
    }

    g.add(`build-${suffix}`, [runner.runner]);
    g.add(`pull-${suffix}`, [runner.pullRunner]);

    const image = this.image("runners", runner.fuzzer, runner.benchmark);
    const base = runEnv(runner);
    const variantEnv: EnvEntry[] = Object.entries(overrides).map(([name, value]) => ({ name, value }));

    g.add(`run-${suffix}`, [runner.runner], {
      kind: "run",
      image,
      env: [...base, ...variantEnv],
      cpus: 1,
      interactive: true,
    });
    g.add(`test-run-${suffix}`, [runner.runner], {
      kind: "run",
      image,
      env: [...base, { name: "MAX_TOTAL_TIME", value: "20" }, { name: "SNAPSHOT_PERIOD", value: "10" }, ...variantEnv],
      interactive: false,
    });
    g.add(`debug-${suffix}`, [runner.runner], {
      kind: "run",
      image,
      env: [...base, ...variantEnv],
      cpus: 1,
      interactive: true,
      entrypoint: "/bin/bash",
    });
  }

  private emitUmbrella(owner: string, chains: Chain[]): void {
    this.graph.add(`build-${owner}-all`, chains.map((c) => `build-${owner}-${c.benchmark}`));
    this.graph.add(`pull-${owner}-all`, chains.map((c) => `pull-${owner}-${c.benchmark}`));
  }

  private dockerBuild(
    tag: string,
    dockerfile: string,
    context: string,
    buildArgs: DockerBuild["buildArgs"] = [],
  ): DockerBuild {
    return { kind: "build", tag, dockerfile, context, buildArgs, cacheFrom: true };
  }
}

/** Environment shared by run, test-run and debug, before variant overrides. */
function runEnv(runner: RunnerRef): EnvEntry[] {
  const env: EnvEntry[] = [{ name: "FUZZ_OUTSIDE_EXPERIMENT", value: "1" }];
  if (runner.external) env.push({ name: "FORCE_LOCAL", value: "1" });
  env.push(
    { name: "TRIAL_ID", value: "1" },
    { name: "FUZZER", value: runner.fuzzer },
    { name: "BENCHMARK", value: runner.benchmark },
  );
  if (runner.external) env.push({ name: "FUZZ_TARGET", value: [{ variable: fuzzTargetVariable(runner.benchmark) }] });
  return env;
}
