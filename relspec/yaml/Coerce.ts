// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { isScalar } from 'yaml';

export /** @internal */ class Coerce {
  /** strings, and numbers as they were written (so `1.10` stays `1.10`) */
  static String(value: unknown): string | undefined {
    if (isScalar(value)) {
      if (typeof value.value === 'number' && value.source !== undefined) {
        return value.source;
      }
      value = value.value;
    }
    return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : undefined;
  }
  static Number(value: unknown): number | undefined {
    if (isScalar(value)) {
      value = value.value;
    }
    return typeof value === 'number' ? value : undefined;
  }
  static Boolean(value: unknown): boolean | undefined {
    if (isScalar(value)) {
      value = value.value;
    }
    return typeof value === 'boolean' ? value : undefined;
  }
  static IsNull(value: unknown): boolean {
    return value === null || value === undefined || (isScalar(value) && (value.value === null || value.value === undefined));
  }
}
