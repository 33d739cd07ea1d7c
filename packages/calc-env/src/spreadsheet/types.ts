/**
 * Values accepted by `set_cell` / `set_range`. Numbers are written as numeric
 * cell values; everything else is written as text.
 */
export type CellScalar = string | number | boolean | null;

/**
 * Values the office process reports for a cell inside a range read
 * (`getDataArray` semantics): numeric cells come back as numbers, everything
 * else as its display text. Blank cells are `""`.
 */
export type CellValue = string | number;

/**
 * One cell as the office process sees it.
 */
export interface CellReading {
  /** Display text (what the user sees in the grid). Empty for blank cells. */
  text: string;
  /** Numeric value; `0` for text and blank cells. */
  value: number;
  /** Formula including the leading "=", or the plain content for non-formula cells. */
  formula: string;
}

export interface FormatOptions {
  bold?: boolean;
  italic?: boolean;
  /** `#RRGGBB` or a packed 0xRRGGBB integer. */
  color?: string | number;
}

/**
 * Office character properties applied by `format_cell`.
 */
export interface CellProperties {
  CharWeight?: number;
  CharPosture?: number;
  CharColor?: number;
}

// com.sun.star.awt.FontWeight / FontSlant constants.
export const FONT_WEIGHT_BOLD = 150;
export const FONT_WEIGHT_NORMAL = 100;
export const FONT_SLANT_ITALIC = 2;
export const FONT_SLANT_NONE = 0;

export function isBlankText(text: string): boolean {
  return text.trim() === "";
}
