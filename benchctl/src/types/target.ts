/** In-memory build graph, serialized to Makefile text by graph/makefile.ts. */

/** A piece of text the build tool fills in later (a make variable). */
export type Fragment = string | { variable: string };

/** A literal string, or a concatenation that contains variable references. */
export type Expr = string | Fragment[];

export type EnvEntry = { name: string; value: Expr };

export type BuildAction =
  | { kind: "delegate" }
  | {
      kind: "build";
      tag: string;
      dockerfile: string;
      context: string;
      buildArgs: Array<{ name: string; value: Expr }>;
      cacheFrom: boolean;
    }
  | { kind: "pull"; image: string }
  | {
      kind: "run";
      image: string;
      env: EnvEntry[];
      cpus?: number;
      interactive: boolean;
      entrypoint?: string;
    };

export type BuildTarget = {
  name: string;
  deps: string[];
  action: BuildAction;
};

export type MakeVariable = { name: string; value: string };

export type FuzzerFailure = {
  fuzzer: string;
  code: string;
  message: string;
};

export type BenchmarkFailure = {
  benchmark: string;
  code: string;
  message: string;
};

export type TargetGraph = {
  variables: MakeVariable[];
  targets: BuildTarget[];
  failures: FuzzerFailure[];
  /** Benchmarks left out of every fuzzer's chains. */
  skippedBenchmarks: BenchmarkFailure[];
};
