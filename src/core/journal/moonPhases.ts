import { DecodeError } from '../../utils/errors.js';

export const MOON_PHASES = {
  new: '🌑',
  'waxing-crescent': '🌒',
  'first-quarter': '🌓',
  'waxing-gibbous': '🌔',
  full: '🌕',
  'waning-gibbous': '🌖',
  'last-quarter': '🌗',
  'waning-crescent': '🌘',
} as const satisfies Record<string, string>;

export type MoonPhaseCode = keyof typeof MOON_PHASES;

export function isMoonPhaseCode(code: string): code is MoonPhaseCode {
  return Object.prototype.hasOwnProperty.call(MOON_PHASES, code);
}

export function moonGlyph(code: string): string {
  if (!isMoonPhaseCode(code)) {
    throw new DecodeError(`Unknown moon phase code "${code}"`, 'UNKNOWN_MOON_PHASE');
  }
  return MOON_PHASES[code];
}
