/**
 * Types for the ASCII-art renderer.
 */

/** One character drawn as `height` rows of text. */
export type Glyph = readonly string[];

export interface Font {
  name: string;
  /** Row count shared by every glyph. */
  height: number;
  /** Keyed by upper-case character. Must contain " ". */
  glyphs: Readonly<Record<string, Glyph>>;
}
