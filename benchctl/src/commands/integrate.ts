import { loadValidConfig } from "../config/validator.js";
import { resolvePaths } from "../config/loader.js";
import { BenchError, errorMessage } from "../core/errors.js";
import { silentReporter, type Reporter } from "../core/reporter.js";
import { GitSourceControl, type SourceControl } from "../git/source-control.js";
import { BenchmarkIntegrator, type IntegrationRequest, type IntegrationResult } from "../integrate/integrator.js";
import { PinningResolver } from "../pinning/resolver.js";
import { GcloudImageRegistry, type ImageRegistry } from "../registry/image-registry.js";
import { diag } from "../types/diagnostic.js";

export type IntegrateOptions = IntegrationRequest & {
  configDir?: string;
  envName?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  /** Collaborators default to git in the OSS-Fuzz checkout and the configured registry tool. */
  sourceControl?: SourceControl;
  registry?: ImageRegistry;
};

/** Onboard one OSS-Fuzz project as an externally-derived benchmark. */
export async function integrate(opts: IntegrateOptions): Promise<IntegrationResult> {
  const reporter = opts.reporter ?? silentReporter;

  let integrator: BenchmarkIntegrator;
  try {
    const config = await loadValidConfig({ envName: opts.envName, configDir: opts.configDir, env: opts.env });
    const paths = resolvePaths(config, opts.cwd);

    const resolver = new PinningResolver({
      sourceControl: opts.sourceControl ?? new GitSourceControl(paths.ossFuzzDir),
      registry: opts.registry ?? new GcloudImageRegistry(config.registry_tool),
      baseImage: config.base_builder_image,
      reporter,
    });
    integrator = new BenchmarkIntegrator({
      resolver,
      ossFuzzDir: paths.ossFuzzDir,
      benchmarksDir: paths.benchmarksDir,
      reporter,
    });
  } catch (e: unknown) {
    const code = e instanceof BenchError ? e.code : "INTEGRATION_FAILED";
    return { ok: false, error: { code, message: errorMessage(e) } };
  }

  const result = await integrator.integrate({
    project: opts.project,
    fuzzTarget: opts.fuzzTarget,
    repoPath: opts.repoPath,
    date: opts.date,
    commit: opts.commit,
    benchmarkName: opts.benchmarkName,
  });
  if (!result.ok) {
    reporter.report(diag("error", result.error.code, result.error.message, { details: result.error.details }));
  }
  return result;
}
