import { InvalidScanFormatError } from './errors.js';
import type { ParsedScan } from './types.js';

/**
 * Splits a scanner keystroke string of the form `<DRUM_TYPE> <DRUM_NUMBER>`.
 * The number is the last token; every token before it forms the type.
 */
export function parseScan(raw: string): ParsedScan {
  const tokens = raw.trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 2) {
    throw new InvalidScanFormatError(raw);
  }
  const drumNumber = tokens[tokens.length - 1];
  return {
    raw,
    drumType: tokens.slice(0, -1).join(' '),
    drumNumber
  };
}
