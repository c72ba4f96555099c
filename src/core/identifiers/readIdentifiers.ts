import { readFile } from "fs/promises";
import type { IdentifierSet } from "../remap/remap.types";

// Unicode code point order, not UTF-16 code unit or locale order.
const compareCodePoints = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
};

/**
 * One identifier per line. Tokens are trimmed, blank lines dropped, duplicates removed,
 * and the result sorted so that repeated runs over the same file issue the same chunks.
 */
export const parseIdentifierList = (text: string): IdentifierSet => {
  const unique = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const token = line.trim();
    if (token !== "") unique.add(token);
  }
  return Array.from(unique).sort(compareCodePoints);
};

export const readIdentifierFile = async (path: string): Promise<IdentifierSet> => {
  const text = await readFile(path, "utf8");
  return parseIdentifierList(text);
};
