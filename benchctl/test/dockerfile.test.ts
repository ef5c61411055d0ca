import { describe, expect, it } from "vitest";
import { rewriteParentImage } from "../src/pinning/dockerfile.js";

const REF = "gcr.io/oss-fuzz-base/base-builder@sha256:abc";

describe("rewriteParentImage", () => {
  it("rewrites only the first FROM line", () => {
    const text = "# header\nFROM gcr.io/oss-fuzz-base/base-builder\nRUN apt-get update\nFROM scratch\n";
    const res = rewriteParentImage(text, REF);
    expect(res.replaced).toBe(true);
    expect(res.text).toBe(`# header\nFROM ${REF}\nRUN apt-get update\nFROM scratch\n`);
  });

  it("keeps CRLF line endings", () => {
    const text = "FROM base\r\nCOPY build.sh $SRC/\r\n";
    expect(rewriteParentImage(text, REF).text).toBe(`FROM ${REF}\r\nCOPY build.sh $SRC/\r\n`);
  });

  it("handles a FROM line without a trailing newline", () => {
    expect(rewriteParentImage("RUN true\nFROM base", REF).text).toBe(`RUN true\nFROM ${REF}`);
  });

  it("keeps leading indentation", () => {
    expect(rewriteParentImage("  FROM base\n", REF).text).toBe(`  FROM ${REF}\n`);
  });

  it("does not treat words starting with FROM as the marker", () => {
    const text = "FROMAGE x\n";
    expect(rewriteParentImage(text, REF)).toEqual({ text, replaced: false });
  });

  it("leaves text without a FROM line untouched", () => {
    const text = "RUN echo hi\n";
    expect(rewriteParentImage(text, REF)).toEqual({ text, replaced: false });
  });
});
