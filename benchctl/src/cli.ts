#!/usr/bin/env node

import { Command, Option } from "commander";
import { generate } from "./commands/generate.js";
import { integrate } from "./commands/integrate.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { StreamReporter, type OutputFormat } from "./core/reporter.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Diagnostic format: human|jsonl").choices(["human", "jsonl"]).default("human");

program
  .name("benchctl")
  .description("Fuzzer benchmark build-graph generator and OSS-Fuzz benchmark integrator")
  .version("0.1.0");

program
  .command("generate")
  .description("Write Makefile rules for every fuzzer, variant and benchmark to stdout")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layer (config/<name>.yaml)")
  .option("--output <file>", "Write the rules to a file instead of stdout")
  .option("--no-sort", "Keep directory order instead of sorting fuzzers and benchmarks")
  .addOption(formatOption())
  .action(async (opts: { config?: string; env?: string; output?: string; sort: boolean; format: OutputFormat }) => {
    const reporter = new StreamReporter(opts.format);
    const res = await generate({
      configDir: opts.config,
      envName: opts.env,
      output: opts.output,
      sort: opts.sort,
      reporter,
    });

    if (!res.ok) {
      reporter.report({ level: "error", code: res.error.code, message: res.error.message });
      process.exit(EXIT.INVALID_ARGS);
    }
    if (!res.outputPath) process.stdout.write(res.makefile);
    process.exitCode = res.partial ? EXIT.PARTIAL_GENERATION : EXIT.SUCCESS;
  });

program
  .command("integrate")
  .description("Integrate an OSS-Fuzz project as a benchmark pinned to a date")
  .requiredOption("-p, --project <name>", "OSS-Fuzz project for the benchmark")
  .requiredOption("-f, --fuzz-target <name>", "Fuzz target for the benchmark")
  .requiredOption("-r, --repo-path <path>", "Absolute path of the project repo in the OSS-Fuzz image (e.g. /src/systemd)")
  .requiredOption("-d, --date <date>", "ISO-8601 date the benchmark is pinned to")
  .option("-c, --commit <sha>", "Project commit hash")
  .option("-n, --benchmark-name <name>", "Benchmark name (default: <project>_<fuzz-target>)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layer (config/<name>.yaml)")
  .addOption(formatOption())
  .action(
    async (opts: {
      project: string;
      fuzzTarget: string;
      repoPath: string;
      date: string;
      commit?: string;
      benchmarkName?: string;
      config?: string;
      env?: string;
      format: OutputFormat;
    }) => {
      const reporter = new StreamReporter(opts.format);
      const res = await integrate({
        project: opts.project,
        fuzzTarget: opts.fuzzTarget,
        repoPath: opts.repoPath,
        date: opts.date,
        commit: opts.commit,
        benchmarkName: opts.benchmarkName,
        configDir: opts.config,
        envName: opts.env,
        reporter,
      });

      if (!res.ok) process.exit(EXIT.INTEGRATION_FAILED);

      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", benchmark: res.benchmark, manifest: res.manifestPath, base_pin: res.basePin.status }) + "\n",
        );
      } else {
        console.log(`Integrated ${res.benchmark} at ${res.upstreamCommit} (${res.manifestPath})`);
      }
    },
  );

program
  .command("validate")
  .description("Validate config, fuzzer variants and benchmark manifests")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layer (config/<name>.yaml)")
  .addOption(formatOption())
  .action(async (opts: { config?: string; env?: string; format: OutputFormat }) => {
    const reporter = new StreamReporter(opts.format);
    const res = await validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      for (const err of res.errors) reporter.report(err);
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...res.summary }) + "\n");
    } else {
      const s = res.summary;
      console.log(
        `OK: ${s.fuzzers} fuzzers (${s.variants} variants), ${s.standardBenchmarks} standard and ${s.externalBenchmarks} OSS-Fuzz benchmarks`,
      );
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
