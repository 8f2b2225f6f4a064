import { AssertionError } from "node:assert";

function hex2(b: number): string {
  return b.toString(16).padStart(2, "0");
}

/**
 * Render `bytes[start, end)` as `offset: hh hh ...` lines, 16 bytes per line.
 */
export function hexdump(bytes: Uint8Array, start = 0, end = bytes.byteLength): string {
  const s = Math.max(0, Math.min(start, bytes.byteLength));
  const e = Math.max(s, Math.min(end, bytes.byteLength));
  const lines: string[] = [];
  for (let off = s - (s % 16); off < e; off += 16) {
    const parts: string[] = [];
    for (let i = off; i < Math.min(off + 16, e); i++) {
      parts.push(i < s ? "  " : hex2(bytes[i] ?? 0));
    }
    lines.push(`${off.toString(16).padStart(8, "0")}: ${parts.join(" ")}`);
  }
  return lines.join("\n");
}

/**
 * Byte-exact comparison. On mismatch, reports the first differing offset and
 * a hexdump window around it from both sides.
 */
export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array, label = "bytes"): void {
  const n = Math.min(actual.byteLength, expected.byteLength);
  let firstDiff = -1;
  for (let i = 0; i < n; i++) {
    if (actual[i] !== expected[i]) {
      firstDiff = i;
      break;
    }
  }
  if (firstDiff === -1 && actual.byteLength === expected.byteLength) return;
  if (firstDiff === -1) firstDiff = n;

  const from = Math.max(0, firstDiff - 16);
  const to = firstDiff + 16;
  throw new AssertionError({
    message: [
      `${label}: mismatch at offset ${firstDiff} (actual length ${actual.byteLength}, expected length ${expected.byteLength})`,
      "actual:",
      hexdump(actual, from, to),
      "expected:",
      hexdump(expected, from, to),
    ].join("\n"),
    actual: actual.byteLength,
    expected: expected.byteLength,
    operator: "assertBytesEqual",
  });
}

/** Number of (possibly overlapping) occurrences of `needle` in `haystack`. */
export function countSubsequence(haystack: Uint8Array, needle: readonly number[]): number {
  if (needle.length === 0) return 0;
  let count = 0;
  outer: for (let i = 0; i + needle.length <= haystack.byteLength; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    count++;
  }
  return count;
}
