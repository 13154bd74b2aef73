export const HEX_COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

export type ForegroundColor = 'black' | 'white';

/**
 * Readable text color on a `#RRGGBB` background, by perceived luminance
 */
export function foregroundFor(background: string): ForegroundColor {
  if (!HEX_COLOR_PATTERN.test(background)) {
    return 'black';
  }

  const r = Number.parseInt(background.slice(1, 3), 16);
  const g = Number.parseInt(background.slice(3, 5), 16);
  const b = Number.parseInt(background.slice(5, 7), 16);
  const luminance = (r * 299 + g * 587 + b * 114) / 1000;

  return luminance > 140 ? 'black' : 'white';
}
