/** Configuration types: layered config system (base.yaml ← <env>.yaml ← BENCHCTL_*). */
export type BenchConfig = {
  schema_version: string;
  root_dir: string;
  benchmarks_dir: string;
  fuzzers_dir: string;
  oss_fuzz_dir: string;
  base_tag: string;
  base_builder_image: string;
  registry_tool: string;
  coverage_fuzzers: string[];
};

/** Config with every directory resolved to an absolute path. */
export type ResolvedPaths = {
  rootDir: string;
  benchmarksDir: string;
  fuzzersDir: string;
  ossFuzzDir: string;
};
