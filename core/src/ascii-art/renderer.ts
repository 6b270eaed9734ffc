/**
 * ASCII-art renderer.
 *
 * Each character becomes a fixed-height glyph; glyphs are laid side by side
 * with a two-space gap after every glyph, including the last.
 */

import { DEFAULT_FONT, getFont } from "./fonts.js";
import type { Font, Glyph } from "./types.js";

export const GLYPH_SEPARATOR = "  ";

/**
 * Glyph for a single (already upper-cased) character. Characters the font
 * lacks fall back to the blank glyph.
 */
export function glyphFor(font: Font, char: string): Glyph {
  return font.glyphs[char] ?? font.glyphs[" "] ?? [];
}

export function renderText(text: string, fontName: string = DEFAULT_FONT): string {
  const font = getFont(fontName);
  const rows: string[] = Array.from({ length: font.height }, () => "");

  for (const char of text.toUpperCase()) {
    const glyph = glyphFor(font, char);
    for (let i = 0; i < font.height; i++) {
      rows[i] += (glyph[i] ?? "") + GLYPH_SEPARATOR;
    }
  }

  return rows.join("\n");
}
