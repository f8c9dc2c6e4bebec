// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFileSync } from 'fs';

let currentLocale = new Map<string, string>();

/**
 * loads a translation file (a JSON object of message key to localized text)
 *
 * passing undefined restores the built-in messages.
 */
export function setLocale(newLocale: string | undefined) {
  currentLocale = new Map<string, string>();
  if (newLocale) {
    const content: unknown = JSON.parse(readFileSync(newLocale, 'utf8'));
    if (typeof content === 'object' && content !== null) {
      for (const [key, text] of Object.entries(content)) {
        if (typeof text === 'string') {
          currentLocale.set(key, text);
        }
      }
    }
  }
}

/**
 * generates the translation key for a given message
 *
 * @param literals
 * @returns the key
 */
export function indexOf(literals: TemplateStringsArray | Array<string>) {
  const content = literals.flatMap((k) => [k, '$']);
  content.length--; // drop the trailing placeholder.
  return content.join('').trim().replace(/ [a-z]/g, ([, b]) => b.toUpperCase()).replace(/[^a-zA-Z$]/g, '');
}

/**
 * Support for tagged template literals for i18n.
 *
 * Localized text refers to the inserted values as ${p0}, ${p1}, ...
 *
 * @param literals the literal values in the tagged template
 * @param values the inserted values in the template
 *
 * @translator
 */
export function i(literals: TemplateStringsArray, ...values: Array<string | number | boolean | undefined | Date>): string {
  const key = indexOf(literals);
  if (key) {
    const str = currentLocale.get(key); // get localized string
    if (str) {
      // fill out the template string.
      return str.replace(/\$\{p(\d+)\}/g, (_, index: string) => String(values[Number(index)] ?? ''));
    }
  }
  // if the translation isn't available, just resolve the string template normally.
  return String.raw(literals, ...values);
}
