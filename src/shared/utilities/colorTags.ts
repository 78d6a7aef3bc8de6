/**
 * In-game titles may carry `<color=0xAARRGGBB>text</color>` markup
 */
const COLOR_TAG = /<color=0x(?:[A-Fa-f0-9]{2})?([A-Fa-f0-9]{6})>(.*?)<\/color>/;

export interface ColoredText {
  text: string;
  /** `#RRGGBB`, or null when the text carries no colour tag */
  color: string | null;
}

export function parseColorTag(value: string): ColoredText {
  const match = COLOR_TAG.exec(value);
  if (!match) {
    return { text: value, color: null };
  }

  const [, hex, text] = match;
  return { text, color: `#${hex}` };
}
