/**
 * Formatting helpers shared across the application.
 * @module utils
 */
import { CURRENCY, LOCALE } from './config.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

const currencyFormatter = new Intl.NumberFormat(LOCALE, { style: 'currency', currency: CURRENCY });

/**
 * Creates a slug from arbitrary text.
 * @param text - Source text.
 * @returns Slugified string.
 */
export const slugify = (text: string): string =>
  text
    .toLowerCase()
    .trim()
    .normalize('NFD')
    .replace(/[^\w\s-]+/g, '')
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');

/**
 * Formats value as a price in the store currency.
 * @param value - Numeric value.
 * @returns Formatted currency string.
 */
export const formatCurrency = (value: number): string => currencyFormatter.format(value);

/**
 * Formats a rating with one decimal place.
 * @param rating - Rating value, conventionally 0 to 5.
 * @returns Display label.
 */
export const formatRating = (rating: number): string => `Rating: ${rating.toFixed(1)} ⭐️`;

/**
 * Escapes text for interpolation into HTML markup.
 * @param input - Raw text.
 * @returns Escaped string.
 */
export const escapeHtml = (input: string): string =>
  input.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);
