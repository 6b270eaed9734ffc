export type { Font, Glyph } from "./types.js";
export { DEFAULT_FONT, listFonts, getFont } from "./fonts.js";
export { GLYPH_SEPARATOR, glyphFor, renderText } from "./renderer.js";
