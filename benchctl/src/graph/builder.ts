import { DuplicateTargetError, InvalidTargetNameError } from "../core/errors.js";
import { isNameToken } from "../core/security.js";
import type { BuildAction, BuildTarget } from "../types/target.js";

const DELEGATE: BuildAction = { kind: "delegate" };

/**
 * Append-only target list. A target may only depend on targets added before
 * it, which keeps the emitted graph acyclic.
 */
export class GraphBuilder {
  private readonly targets: BuildTarget[] = [];
  private readonly names = new Set<string>();

  add(name: string, deps: string[], action: BuildAction = DELEGATE): string {
    if (!isNameToken(name)) throw new InvalidTargetNameError(name);
    if (this.names.has(name)) throw new DuplicateTargetError(name);
    for (const dep of deps) {
      if (!this.names.has(dep)) {
        throw new Error(`Target ${name} depends on ${dep}, which has not been emitted`);
      }
    }
    this.targets.push({ name, deps: [...deps], action });
    this.names.add(name);
    return name;
  }

  /** Position to roll back to if the next batch of targets fails. */
  mark(): number {
    return this.targets.length;
  }

  rollback(mark: number): void {
    for (const t of this.targets.splice(mark)) this.names.delete(t.name);
  }

  build(): BuildTarget[] {
    return this.targets.map((t) => ({ ...t, deps: [...t.deps] }));
  }
}
