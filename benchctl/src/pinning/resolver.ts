import fs from "node:fs";
import { DigestIndex } from "../digest/digest-index.js";
import { NoPriorCommitError, NoSuitableArtifactError, errorMessage } from "../core/errors.js";
import { silentReporter, type Reporter } from "../core/reporter.js";
import { diag } from "../types/diagnostic.js";
import type { SourceControl } from "../git/source-control.js";
import type { ImageRegistry } from "../registry/image-registry.js";
import type { Outcome } from "../types/outcome.js";
import { rewriteParentImage } from "./dockerfile.js";

export type BaseImagePin = Outcome<{ digest: string; reference: string }>;

export type PinnedCheckout<T> = {
  commit: string;
  result: T;
};

export type PinningResolverDeps = {
  sourceControl: SourceControl;
  registry: ImageRegistry;
  /** Image whose history is searched, e.g. gcr.io/oss-fuzz-base/base-builder. */
  baseImage: string;
  reporter?: Reporter;
};

/**
 * Pins an upstream project to the state it had at a given date: the last
 * commit touching its subtree (mandatory) and the last base image published
 * before that date (best-effort).
 */
export class PinningResolver {
  private readonly reporter: Reporter;

  constructor(private readonly deps: PinningResolverDeps) {
    this.reporter = deps.reporter ?? silentReporter;
  }

  /**
   * Check out `subtree` as it was at `targetDate`, run `body` against the
   * checked-out tree, then hard-reset the working tree whatever happened.
   *
   * @throws NoPriorCommitError when no commit touches `subtree` before `targetDate`.
   */
  async withPinnedCheckout<T>(
    project: string,
    targetDate: Date,
    subtree: string,
    body: (commit: string) => Promise<T> | T,
  ): Promise<PinnedCheckout<T>> {
    const { sourceControl } = this.deps;

    const commit = await sourceControl.logBefore(targetDate, subtree);
    if (!commit) {
      this.reporter.report(
        diag("warn", "NO_PRIOR_COMMIT", `No suitable earlier commit found for ${project}.`, {
          details: { subtree, before: targetDate.toISOString() },
        }),
      );
      throw new NoPriorCommitError(subtree, targetDate);
    }

    let failed = false;
    try {
      await sourceControl.checkout(commit, subtree);
      const result = await body(commit);
      return { commit, result };
    } catch (e: unknown) {
      failed = true;
      throw e;
    } finally {
      await this.releaseCheckout(failed);
    }
  }

  /**
   * Rewrite the parent image of `dockerfilePath` to the newest base image
   * digest published at or before `targetDate`. Every reason not to pin is a
   * `skipped` outcome; only a failing registry command throws.
   */
  async pinBaseImage(targetDate: Date, dockerfilePath: string): Promise<BaseImagePin> {
    const { registry, baseImage } = this.deps;

    if (!fs.existsSync(dockerfilePath)) {
      return this.skip({
        status: "skipped",
        code: "NO_BUILD_DESCRIPTOR",
        reason: `No build descriptor at ${dockerfilePath}; parent image left unpinned.`,
      });
    }

    const listing = await registry.listTagsSortedByTimestamp(baseImage);
    if (listing.status === "skipped") {
      return this.skip({ ...listing, reason: `${listing.reason}; parent image left unpinned.` });
    }

    const index = DigestIndex.fromEntries(listing.entries);
    let digest: string;
    try {
      digest = index.findLatestBefore(targetDate);
    } catch (e: unknown) {
      if (!(e instanceof NoSuitableArtifactError)) throw e;
      return this.skip({ status: "skipped", code: "NO_SUITABLE_ARTIFACT", reason: `${baseImage}: ${e.message}` });
    }

    const reference = `${baseImage}@${digest}`;
    const rewritten = rewriteParentImage(fs.readFileSync(dockerfilePath, "utf8"), reference);
    if (!rewritten.replaced) {
      return this.skip({
        status: "skipped",
        code: "NO_BUILD_DESCRIPTOR",
        reason: `${dockerfilePath} has no FROM line; parent image left unpinned.`,
      });
    }
    fs.writeFileSync(dockerfilePath, rewritten.text, "utf8");

    this.reporter.report(diag("info", "BASE_IMAGE_PINNED", `Using ${baseImage} with digest ${digest}.`));
    return { status: "ok", digest, reference };
  }

  private skip(outcome: Extract<BaseImagePin, { status: "skipped" }>): BaseImagePin {
    this.reporter.report(diag("warn", outcome.code, outcome.reason));
    return outcome;
  }

  /** The reset error wins only when nothing else already failed. */
  private async releaseCheckout(alreadyFailed: boolean): Promise<void> {
    try {
      await this.deps.sourceControl.resetHard();
    } catch (e: unknown) {
      if (!alreadyFailed) throw e;
      this.reporter.report(diag("warn", "RESET_FAILED", `Working tree reset failed: ${errorMessage(e)}`));
    }
  }
}
