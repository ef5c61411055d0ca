import { shellQuote } from "../core/security.js";
import type { BuildAction, BuildTarget, Expr, MakeVariable, TargetGraph } from "../types/target.js";

export const HEADER = "# Generated by benchctl generate. Do not edit.";

/** Expands to --cache-from <image> only when RUNNING_ON_CI is set. */
export const CACHE_FROM_HELPER = "cache_from = $(if ${RUNNING_ON_CI},--cache-from $(1),)";

const INDENT = "    ";

/** Make expands `$` in recipes and values, so literal dollars are doubled. */
function escapeMake(text: string): string {
  return text.split("$").join("$$");
}

/** Shell word for `expr`: literals quoted as needed, variable references left bare. */
export function renderExpr(expr: Expr): string {
  if (typeof expr === "string") return escapeMake(shellQuote(expr));
  return expr
    .map((part) => (typeof part === "string" ? (part === "" ? "" : escapeMake(shellQuote(part))) : `$(${part.variable})`))
    .join("");
}

function renderVariable(v: MakeVariable): string {
  return `${v.name} := ${escapeMake(v.value).replace(/#/g, "\\#")}`;
}

/** docker argv as a backslash-continued recipe; the first word sits on the tab line. */
function recipe(words: string[]): string {
  const [first, ...rest] = words;
  if (rest.length === 0) return `\t${first}`;
  const lines = [`\t${first} \\`];
  rest.forEach((w, i) => lines.push(`${INDENT}${w}${i === rest.length - 1 ? "" : " \\"}`));
  return lines.join("\n");
}

function actionWords(action: Exclude<BuildAction, { kind: "delegate" }>): string[] {
  switch (action.kind) {
    case "build": {
      const words = ["docker build", `--tag ${action.tag}`, `--file ${action.dockerfile}`];
      for (const arg of action.buildArgs) words.push(`--build-arg ${arg.name}=${renderExpr(arg.value)}`);
      if (action.cacheFrom) words.push(`$(call cache_from,${action.tag})`);
      words.push(action.context);
      return words;
    }
    case "pull":
      return [`docker pull ${action.image}`];
    case "run": {
      const words = ["docker run"];
      if (action.cpus !== undefined) words.push(`--cpus=${action.cpus}`);
      words.push("--cap-add SYS_NICE", "--cap-add SYS_PTRACE");
      for (const e of action.env) words.push(`-e ${e.name}=${renderExpr(e.value)}`);
      if (action.entrypoint) words.push(`--entrypoint ${shellQuote(action.entrypoint)}`);
      words.push(action.interactive ? `-it ${action.image}` : action.image);
      return words;
    }
  }
}

export function renderTarget(target: BuildTarget): string {
  const head = target.deps.length > 0 ? `${target.name}: ${target.deps.join(" ")}` : `${target.name}:`;
  if (target.action.kind === "delegate") return head;
  return `${head}\n${recipe(actionWords(target.action))}`;
}

/** Serialize the graph. Equal graphs render to identical text. */
export function renderMakefile(graph: Pick<TargetGraph, "variables" | "targets">): string {
  const blocks = [HEADER, CACHE_FROM_HELPER];
  if (graph.variables.length > 0) blocks.push(graph.variables.map(renderVariable).join("\n"));
  for (const t of graph.targets) blocks.push(renderTarget(t));
  return blocks.join("\n\n") + "\n";
}
