// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFileSync } from 'fs';

type PrimitiveValue = string | number | boolean | undefined | Date;

let currentLocale = new Map<string, string>();

/**
 * Loads a message table from a JSON file (a flat object of key to translated template).
 *
 * Passing undefined restores the built-in (untranslated) messages.
 */
export function setLocale(localeFile: string | undefined) {
  if (!localeFile) {
    currentLocale = new Map();
    return;
  }

  const content: unknown = JSON.parse(readFileSync(localeFile, 'utf8'));
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    throw new Error(`Locale file '${localeFile}' must contain a JSON object`);
  }

  const table = new Map<string, string>();
  for (const [key, value] of Object.entries(content)) {
    if (typeof value === 'string') {
      table.set(key, value);
    }
  }
  currentLocale = table;
}

/**
 * generates the translation key for a given message
 *
 * @param literals
 * @returns the key
 */
function indexOf(literals: TemplateStringsArray) {
  const content = literals.flatMap((k) => [k, '$']);
  content.length--; // drop the trailing placeholder.
  return content.join('').trim().replace(/ [a-z]/g, ([, b]) => b.toUpperCase()).replace(/[^a-zA-Z$]/g, '');
}

/**
 * Support for tagged template literals for i18n.
 *
 * Translated messages refer to the inserted values as ${p0}, ${p1}, ...
 *
 * @translator
 */
export function i(literals: TemplateStringsArray, ...values: Array<PrimitiveValue>): string {
  const key = indexOf(literals);
  if (key) {
    const str = currentLocale.get(key);
    if (str) {
      return str.replace(/\$\{p(\d+)\}/g, (whole, index: string) => {
        const n = Number.parseInt(index, 10);
        return n < values.length ? String(values[n]) : whole;
      });
    }
  }
  // if the translation isn't available, just resolve the string template normally.
  return String.raw(literals, ...values);
}
