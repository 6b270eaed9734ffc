/**
 * Font registry.
 *
 * Glyph tables live in ./fonts/*.json and are validated on load.
 */

import { z } from "zod";
import standardData from "./fonts/standard.json";
import { UnknownFontError } from "../errors.js";
import type { Font } from "./types.js";

export const DEFAULT_FONT = "standard";

const fontSchema = z
  .object({
    name: z.string().min(1),
    height: z.number().int().positive(),
    glyphs: z.record(z.array(z.string())),
  })
  .refine((font) => " " in font.glyphs, { message: "font has no space glyph" })
  .refine((font) => Object.values(font.glyphs).every((rows) => rows.length === font.height), {
    message: "every glyph must have exactly `height` rows",
  });

function loadFont(data: unknown): Font {
  return fontSchema.parse(data);
}

const FONTS: ReadonlyMap<string, Font> = new Map(
  [loadFont(standardData)].map((font) => [font.name, font]),
);

export function listFonts(): string[] {
  return [...FONTS.keys()];
}

/**
 * Look up a font by name. Throws UnknownFontError naming every available font.
 */
export function getFont(name: string): Font {
  const font = FONTS.get(name);
  if (!font) {
    throw new UnknownFontError(name, listFonts());
  }
  return font;
}
