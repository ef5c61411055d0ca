import type { Diagnostic } from "../types/diagnostic.js";

export type OutputFormat = "human" | "jsonl";

export interface Reporter {
  report(d: Diagnostic): void;
}

type Writable = { write(chunk: string): unknown };

/** Writes diagnostics to stderr so stdout stays free for the rule stream. */
export class StreamReporter implements Reporter {
  constructor(
    private readonly format: OutputFormat,
    private readonly out: Writable = process.stderr,
  ) {}

  report(d: Diagnostic): void {
    if (this.format === "jsonl") {
      this.out.write(JSON.stringify(d) + "\n");
      return;
    }
    const prefix = d.level === "info" ? "" : `${d.level}: `;
    this.out.write(`${prefix}${d.message}\n`);
  }
}

export class CollectingReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];

  report(d: Diagnostic): void {
    this.diagnostics.push(d);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}

export const silentReporter: Reporter = { report: () => undefined };
