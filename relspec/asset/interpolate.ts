// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type Variables = Readonly<Record<string, string | undefined>>;

const placeholder = /\$\{([^}]*)\}/g;

/**
 * Replaces each ${NAME} placeholder with its value.
 *
 * A placeholder that has no value in `variables` is replaced with the empty string.
 */
export function interpolate(template: string, variables: Variables): string {
  const lookup = new Map(Object.entries(variables));
  return template.replace(placeholder, (_, name: string) => lookup.get(name) ?? '');
}

/** TAG is the version as resolved; VERSION drops one leading 'v' */
export function versionVariables(tag: string) {
  return {
    TAG: tag,
    VERSION: tag.startsWith('v') ? tag.substring(1) : tag,
  };
}
