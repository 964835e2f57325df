/**
 * Colour parsing for Canvas arguments.
 *
 * Accepted forms: a named colour, `#RGB`, `#RRGGBB`, `#RRGGBBAA`, or a
 * comma list `r,g,b[,a]`. A list whose r, g and b are all at most 1 is read
 * as 0-1 fractions, otherwise as 0-255 bytes; alpha is judged on its own.
 */
import * as fs from "node:fs";
import { z } from "zod";

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

const channel = z.number().int().min(0).max(255);
const namedColorsSchema = z.record(z.string(), z.tuple([channel, channel, channel]));

function loadNamedColors(): Map<string, Rgba> {
  const raw = fs.readFileSync(new URL("./named-colors.json", import.meta.url), "utf-8");
  const table = namedColorsSchema.parse(JSON.parse(raw));
  return new Map(Object.entries(table).map(([name, [r, g, b]]): [string, Rgba] => [name, { r, g, b, a: 255 }]));
}

const NAMED = loadNamedColors();

export function namedColors(): string[] {
  return [...NAMED.keys()];
}

const HEX = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function clampByte(v: number): number {
  return Math.min(255, Math.max(0, Math.round(v)));
}

function parseHex(text: string): Rgba | null {
  if (!HEX.test(text)) return null;
  let digits = text.slice(1);
  if (digits.length === 3) digits = [...digits].map((d) => d + d).join("");
  if (digits.length === 6) digits += "ff";
  const byte = (i: number) => parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  return { r: byte(0), g: byte(1), b: byte(2), a: byte(3) };
}

function parseList(text: string): Rgba | null {
  const parts = text.split(",").map((p) => p.trim());
  if (parts.length < 3 || parts.length > 4) return null;
  if (!parts.every((p) => DECIMAL.test(p))) return null;
  const [r, g, b, a = 255] = parts.map(Number);
  const scale = r > 1 || g > 1 || b > 1 ? 1 : 255;
  const alpha = a > 1 ? a : a * 255;
  return {
    r: clampByte(r * scale),
    g: clampByte(g * scale),
    b: clampByte(b * scale),
    a: clampByte(alpha),
  };
}

/** Parses a colour string, or returns null when it is not a colour. */
export function parseColor(input: string): Rgba | null {
  const text = input.trim().toLowerCase();
  if (text === "") return null;
  const named = NAMED.get(text);
  if (named) return { ...named };
  if (text.startsWith("#")) return parseHex(text);
  if (text.includes(",")) return parseList(text);
  return null;
}

function hexByte(v: number): string {
  return v.toString(16).padStart(2, "0");
}

/** `#rrggbbaa` form, used in recorded display lists. */
export function toHex(color: Rgba): string {
  return `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}${hexByte(color.a)}`;
}
