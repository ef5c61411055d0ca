import fs from "node:fs";
import path from "node:path";
import { loadValidConfig } from "../config/validator.js";
import { resolvePaths } from "../config/loader.js";
import { BenchError, errorMessage } from "../core/errors.js";
import { silentReporter, type Reporter } from "../core/reporter.js";
import { builderHashVariable, generateTargetGraph } from "../graph/generator.js";
import { renderMakefile } from "../graph/makefile.js";
import { scanBenchmarks, scanFuzzers } from "../scan/scan.js";
import { diag } from "../types/diagnostic.js";
import type { TargetGraph } from "../types/target.js";

export type GenerateResult =
  | { ok: true; makefile: string; graph: TargetGraph; partial: boolean; outputPath?: string }
  | { ok: false; error: { code: string; message: string } };

export type GenerateOptions = {
  configDir?: string;
  envName?: string;
  /** Write here instead of returning the text only. */
  output?: string;
  /** false keeps directory order (not reproducible across filesystems). */
  sort?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
};

/**
 * Scan fuzzers/ and benchmarks/ and produce the Makefile rule stream.
 * Fuzzers and benchmarks that fail to load are reported and left out.
 */
export async function generate(opts: GenerateOptions = {}): Promise<GenerateResult> {
  const reporter = opts.reporter ?? silentReporter;
  const cwd = opts.cwd ?? process.cwd();

  try {
    const config = await loadValidConfig({ envName: opts.envName, configDir: opts.configDir, env: opts.env });
    const paths = resolvePaths(config, cwd);
    const sort = opts.sort ?? true;

    const benchmarks = await scanBenchmarks(paths.benchmarksDir, { sort });
    const fuzzers = await scanFuzzers(paths.fuzzersDir, config.coverage_fuzzers, { sort });

    // Both chains would emit the same convenience targets; the standard one is kept.
    const standardNames = new Set(benchmarks.standard.map((b) => b.name));
    const external = benchmarks.external.filter((b) => !standardNames.has(b.name));
    for (const b of benchmarks.external) {
      if (standardNames.has(b.name)) {
        reporter.report(
          diag("warn", "BENCHMARK_KIND_CONFLICT", `${b.name} has both build.sh and oss-fuzz.yaml; using build.sh.`),
        );
      }
    }

    const graph = generateTargetGraph({
      fuzzers: fuzzers.fuzzers,
      standardBenchmarks: benchmarks.standard,
      externalBenchmarks: external,
      baseTag: config.base_tag,
    });
    graph.skippedBenchmarks.unshift(...benchmarks.failures);
    graph.failures.unshift(...fuzzers.failures);

    for (const b of graph.skippedBenchmarks) {
      reporter.report(diag("error", b.code, `Skipping benchmark ${b.benchmark}: ${b.message}`));
    }
    // integrate does not record the project builder hash; without it the
    // intermediate's parent_image ends in an empty "@sha256:".
    for (const b of external) {
      if (b.manifest.oss_fuzz_builder_hash) continue;
      reporter.report(
        diag(
          "warn",
          "MISSING_BUILDER_HASH",
          `${b.name}: oss-fuzz.yaml has no oss_fuzz_builder_hash; set ${builderHashVariable(b.name)} when invoking make.`,
          { details: { benchmark: b.name } },
        ),
      );
    }

    for (const f of graph.failures) {
      reporter.report(diag("error", f.code, `Skipping fuzzer ${f.fuzzer}: ${f.message}`));
    }

    const makefile = renderMakefile(graph);
    let outputPath: string | undefined;
    if (opts.output) {
      outputPath = path.resolve(cwd, opts.output);
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(outputPath, makefile, "utf8");
    }

    reporter.report(
      diag("info", "GENERATED", `Generated ${graph.targets.length} targets.`, {
        details: {
          fuzzers: fuzzers.fuzzers.length,
          standard_benchmarks: benchmarks.standard.length,
          external_benchmarks: external.length,
        },
      }),
    );

    const partial = graph.failures.length > 0 || graph.skippedBenchmarks.length > 0;
    return { ok: true, makefile, graph, partial, outputPath };
  } catch (e: unknown) {
    const code = e instanceof BenchError ? e.code : "GENERATE_FAILED";
    return { ok: false, error: { code, message: errorMessage(e) } };
  }
}
