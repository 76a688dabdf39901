import { LANGUAGE_LEVEL_CODES } from './config.js';

export function isLanguageLevel(value: string): boolean {
  return LANGUAGE_LEVEL_CODES.has(value.trim());
}

/**
 * Renders a proficiency cell. A level code becomes `"<header> (Level n)"`,
 * any other non-sentinel answer passes through as a language name, and a
 * sentinel yields `""` so the caller can leave it out.
 */
export function encodeLanguageLevel(
  headerLabel: string,
  cellValue: string,
  sentinels: ReadonlySet<string>,
): string {
  if (isLanguageLevel(cellValue)) {
    return `${headerLabel} (Level ${cellValue})`;
  }
  if (!sentinels.has(cellValue)) {
    return cellValue;
  }
  return '';
}
