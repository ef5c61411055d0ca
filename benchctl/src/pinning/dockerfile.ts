const PARENT_IMAGE_LINE = /^(\s*)FROM(\s|$)/i;

export type RewriteResult = {
  text: string;
  replaced: boolean;
};

/**
 * Point the first `FROM` line at `reference`. Indentation and the line's own
 * terminator are kept; every other line is returned untouched.
 */
export function rewriteParentImage(text: string, reference: string): RewriteResult {
  const lines = text.split(/(?<=\n)/);
  const index = lines.findIndex((line) => PARENT_IMAGE_LINE.test(line));
  if (index === -1) return { text, replaced: false };

  const line = lines[index];
  const indent = /^[ \t]*/.exec(line)?.[0] ?? "";
  const ending = /\r?\n$/.exec(line)?.[0] ?? "";
  lines[index] = `${indent}FROM ${reference}${ending}`;
  return { text: lines.join(""), replaced: true };
}
