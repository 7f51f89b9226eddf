import { describe, expect, it } from "vitest";
import { TRUNCATION_MARKER, formatOverflow, splitMessage, tail, trimMessage } from "./overflow.ts";

describe("splitMessage", () => {
  it("returns no chunks for empty text", () => {
    expect(splitMessage("", 50)).toEqual([]);
  });

  it("keeps short text in one chunk", () => {
    expect(splitMessage("hello", 50)).toEqual(["hello"]);
  });

  it("keeps text of exactly the limit in one chunk", () => {
    const text = "x".repeat(50);
    expect(splitMessage(text, 50)).toEqual([text]);
  });

  it("cuts after a paragraph break in the second half of the window", () => {
    const first = "a".repeat(30) + "\n\n";
    const second = "b".repeat(30);
    expect(splitMessage(first + second, 40)).toEqual([first, second]);
  });

  it("prefers a line break when the paragraph break is too early", () => {
    // Paragraph break ends at 7 (< 20), line break after the 30 b's.
    const text = "aaaaa\n\n" + "b".repeat(30) + "\n" + "c".repeat(20);
    expect(splitMessage(text, 40)).toEqual(["aaaaa\n\n" + "b".repeat(30) + "\n", "c".repeat(20)]);
  });

  it("hard-cuts a line longer than the limit", () => {
    expect(splitMessage("x".repeat(25), 10)).toEqual(["x".repeat(10), "x".repeat(10), "x".repeat(5)]);
  });

  it("does not split a surrogate pair", () => {
    const text = "a".repeat(9) + "😀" + "b";
    const chunks = splitMessage(text, 10);
    expect(chunks).toEqual(["a".repeat(9), "😀b"]);
  });

  it("reassembles to the original text for every length", () => {
    const limit = 40;
    const source = Array.from({ length: 60 }, (_, i) => `line ${i} ${"w".repeat(i % 13)}`).join("\n");
    for (let length = 0; length <= limit * 10; length += 7) {
      const text = source.slice(0, length);
      const chunks = splitMessage(text, limit);
      expect(chunks.join("")).toBe(text);
      for (const chunk of chunks) {
        expect(chunk.length).toBeGreaterThan(0);
        expect(chunk.length).toBeLessThanOrEqual(limit);
      }
    }
  });
});

describe("trimMessage", () => {
  it("returns no chunks for empty text", () => {
    expect(trimMessage("", 50)).toEqual([]);
  });

  it("leaves text within the limit untouched", () => {
    expect(trimMessage("short", 50)).toEqual(["short"]);
  });

  it("cuts and marks text over the limit", () => {
    const [chunk] = trimMessage("x".repeat(100), 50);
    expect(chunk).toBe("x".repeat(50 - TRUNCATION_MARKER.length) + TRUNCATION_MARKER);
    expect(chunk).toHaveLength(50);
  });
});

describe("formatOverflow", () => {
  it("dispatches on the policy", () => {
    const text = "x".repeat(120);
    expect(formatOverflow(text, "split", 50)).toHaveLength(3);
    expect(formatOverflow(text, "trim", 50)).toHaveLength(1);
  });

  it("rejects limits too small for the marker", () => {
    expect(() => formatOverflow("x", "split", 5)).toThrow(RangeError);
    expect(() => formatOverflow("x", "split", 50.5)).toThrow(RangeError);
  });
});

describe("tail", () => {
  it("returns short text unchanged", () => {
    expect(tail("abc", 10)).toBe("abc");
  });

  it("keeps the last characters behind an ellipsis", () => {
    expect(tail("abcdefghij", 5)).toBe("…ghij");
  });
});
