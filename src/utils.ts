import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LOG_PREFIX, NUMBER_PREFIX_PATTERN } from "./constants.js";
import { errorMessage, invalidInput } from "./errors.js";
import type { RgbColor } from "./types.js";

type NaturalPart = number | string;

function naturalParts(name: string): NaturalPart[] {
  const parts = name.toLowerCase().match(/\d+|\D+/g) ?? [];
  return parts.map((p) => (/^\d+$/.test(p) ? parseInt(p, 10) : p));
}

function compareParts(a: NaturalPart[], b: NaturalPart[]): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a[i];
    const y = b[i];
    if (x === y) continue;
    if (typeof x === "number" && typeof y === "number") return x - y;
    // Digit runs sort before text
    if (typeof x === "number") return -1;
    if (typeof y === "number") return 1;
    return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

/**
 * Orders image paths the way the stitch actions consume them: names that
 * start with "<n> " or "<n>" first, by n, then everything else in natural
 * case-insensitive order.
 */
export function compareImagePaths(a: string, b: string): number {
  const nameA = path.basename(a);
  const nameB = path.basename(b);
  const numA = nameA.match(/^(\d+)\b/);
  const numB = nameB.match(/^(\d+)\b/);

  if (numA && numB) {
    const diff = parseInt(numA[1], 10) - parseInt(numB[1], 10);
    if (diff !== 0) return diff;
    return compareParts(naturalParts(nameA), naturalParts(nameB));
  }
  if (numA) return -1;
  if (numB) return 1;
  return compareParts(naturalParts(nameA), naturalParts(nameB));
}

/** Byte order of the UTF-8 encoding: case-sensitive, locale-independent. */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext !== "" && extensions.includes(ext);
}

export function stripNumberPrefix(filename: string): string {
  return filename.replace(NUMBER_PREFIX_PATTERN, "");
}

export function readNumberPrefix(filename: string): number | null {
  const match = filename.match(NUMBER_PREFIX_PATTERN);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Renames without replacing: the new name is hard-linked first, so a taken
 * `to` fails with EEXIST instead of being overwritten.
 */
export async function renameExclusive(from: string, to: string): Promise<void> {
  await fs.link(from, to);
  try {
    await fs.unlink(from);
  } catch (error) {
    try {
      await fs.unlink(to);
    } catch (cleanupError: unknown) {
      console.warn(`${LOG_PREFIX} Failed to remove link ${to}: ${errorMessage(cleanupError)}`);
    }
    throw error;
  }
}

/**
 * Accepts "#rgb", "#rrggbb" (hash optional) or "r,g,b".
 */
export function parseColor(value: string): RgbColor {
  const input = value.trim();

  const triple = input.match(/^(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})$/);
  if (triple) {
    const [r, g, b] = [triple[1], triple[2], triple[3]].map((c) => parseInt(c, 10));
    if (r > 255 || g > 255 || b > 255) {
      throw invalidInput(`Colour channels must be 0-255, got "${value}"`);
    }
    return { r, g, b };
  }

  const hex = input.replace(/^#/, "");
  if (/^[0-9a-f]{3}$/i.test(hex)) {
    const [r, g, b] = hex.split("").map((c) => parseInt(c + c, 16));
    return { r, g, b };
  }
  if (/^[0-9a-f]{6}$/i.test(hex)) {
    return {
      r: parseInt(hex.slice(0, 2), 16),
      g: parseInt(hex.slice(2, 4), 16),
      b: parseInt(hex.slice(4, 6), 16),
    };
  }

  throw invalidInput(`Invalid colour "${value}". Use #rrggbb, #rgb or r,g,b.`);
}
