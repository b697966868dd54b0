import { describe, it, expect } from "vitest";
import { cleanText, formatDuration } from "./utils";

describe("formatDuration", () => {
  it("uses milliseconds below one second", () => {
    expect(formatDuration(0)).toBe("0ms");
    expect(formatDuration(850)).toBe("850ms");
  });

  it("uses tenths of a second below one minute", () => {
    expect(formatDuration(4_230)).toBe("4.2s");
    expect(formatDuration(59_940)).toBe("59.9s");
  });

  it("switches to minutes with padded seconds", () => {
    expect(formatDuration(59_960)).toBe("1m 00s");
    expect(formatDuration(125_000)).toBe("2m 05s");
  });
});

describe("cleanText", () => {
  it("collapses whitespace runs and trims", () => {
    expect(cleanText("  a \n\t b  ")).toBe("a b");
  });
});
