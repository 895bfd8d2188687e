/**
 * Markup helpers for notification body text
 *
 * Servers advertising "body-markup" interpret a small HTML subset in the
 * body, so literal <, > and & must be escaped there. Without markup support
 * the text passes through untouched.
 */

const REPLACEMENTS: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;'
};

export function escapeMarkup(text: string, markupEnabled: boolean): string {
  if (!markupEnabled) return text;
  return text.replace(/[<>&]/g, ch => REPLACEMENTS[ch] ?? ch);
}

const FULL_DATE = /^\d{4}[-./ ]\d{2}[-./ ]\d{2}$/;

/**
 * Reduce a full YYYY-MM-DD style date to its year for display.
 * Anything else is returned escaped and otherwise unchanged.
 */
export function displayYear(date: string, markupEnabled: boolean): string {
  if (FULL_DATE.test(date)) {
    return date.slice(0, 4);
  }
  return escapeMarkup(date, markupEnabled);
}

/**
 * Finite, non-zero and not subnormal.
 */
export function isNormalNumber(value: number | undefined): value is number {
  return value !== undefined
    && Number.isFinite(value)
    && Math.abs(value) >= 2.2250738585072014e-308;
}
