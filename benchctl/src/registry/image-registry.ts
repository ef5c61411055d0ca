import { ExternalCommandFailedError, ExternalToolMissingError } from "../core/errors.js";
import { runCommand, type CommandRunner } from "../core/exec.js";
import { createRegistry } from "../schema/registry.js";
import type { DigestEntry } from "../digest/digest-index.js";
import type { Outcome } from "../types/outcome.js";

export type RegistryListing = Outcome<{ entries: DigestEntry[] }>;

/** Container-registry collaborator: tag listing for one image, oldest first. */
export interface ImageRegistry {
  listTagsSortedByTimestamp(image: string): Promise<RegistryListing>;
}

/**
 * gcloud timestamps look like "2020-09-16 07:10:33-07:00". Returns null for
 * anything Date cannot read once the space separator becomes "T".
 */
export function parseRegistryTimestamp(text: string): Date | null {
  const iso = text.trim().replace(" ", "T");
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

export class GcloudImageRegistry implements ImageRegistry {
  constructor(
    private readonly tool = "gcloud",
    private readonly run: CommandRunner = runCommand,
    private readonly schemaDir?: string,
  ) {}

  async listTagsSortedByTimestamp(image: string): Promise<RegistryListing> {
    const args = ["container", "images", "list-tags", image, "--format=json", "--sort-by=timestamp"];
    const command = [this.tool, ...args];

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.tool, args));
    } catch (e: unknown) {
      if (e instanceof ExternalToolMissingError) {
        return { status: "skipped", code: "EXTERNAL_TOOL_MISSING", reason: e.message };
      }
      throw e;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (e: unknown) {
      throw new ExternalCommandFailedError(command, `unparseable output: ${e instanceof Error ? e.message : String(e)}`);
    }

    const schemas = await createRegistry(this.schemaDir);
    const check = await schemas.validate("registry-listing", parsed);
    if (!check.valid) {
      throw new ExternalCommandFailedError(command, `unexpected output: ${check.errors}`);
    }

    const entries: DigestEntry[] = [];
    for (const image of check.value) {
      const timestamp = parseRegistryTimestamp(image.timestamp.datetime);
      if (!timestamp) {
        throw new ExternalCommandFailedError(command, `bad timestamp ${JSON.stringify(image.timestamp.datetime)}`);
      }
      entries.push({ timestamp, digest: image.digest });
    }
    return { status: "ok", entries };
  }
}
