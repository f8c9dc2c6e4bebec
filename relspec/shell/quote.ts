// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/** single-quotes a value for a POSIX shell */
export function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Compiles a ${NAME}-style template into a shell word.
 *
 * Literal text is single-quoted, known variables become "${NAME}" expansions and unknown
 * placeholders are dropped, so the shell produces what `interpolate` would.
 */
export function compileTemplate(template: string, known: ReadonlyArray<string>): string {
  const parts = new Array<string>();
  let last = 0;
  for (const match of template.matchAll(/\$\{([^}]*)\}/g)) {
    const index = match.index ?? 0;
    if (index > last) {
      parts.push(quote(template.substring(last, index)));
    }
    if (known.includes(match[1])) {
      parts.push(`"\${${match[1]}}"`);
    }
    last = index + match[0].length;
  }
  if (last < template.length) {
    parts.push(quote(template.substring(last)));
  }
  return parts.length ? parts.join('') : `''`;
}
