/** Benchmark, fuzzer and manifest descriptors derived from the persisted directories. */
export type BenchmarkKind = "standard" | "externally-derived";

/** Contents of a benchmark's oss-fuzz.yaml. */
export type BenchmarkManifest = {
  project: string;
  fuzz_target: string;
  commit: string | null;
  commit_date: string;
  repo_path: string;
  benchmark?: string;
  oss_fuzz_commit?: string;
  base_builder_digest?: string;
  oss_fuzz_builder_hash?: string;
};

export type StandardBenchmark = {
  name: string;
  kind: "standard";
};

export type ExternalBenchmark = {
  name: string;
  kind: "externally-derived";
  manifest: BenchmarkManifest;
};

export type Benchmark = StandardBenchmark | ExternalBenchmark;

export type Variant = {
  name: string;
  /** Environment overrides in declaration order. */
  env: Record<string, string>;
};

export type Fuzzer = {
  name: string;
  coverageOnly: boolean;
  variants: Variant[];
};
