// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ErrorKind } from './error-kind';

/** [start, valueEnd, nodeEnd] offsets into the source document */
export type SourceRange = [number, number, number];

export interface ValidationMessage {
  message: string;
  range?: SourceRange;
  category: ErrorKind;
}
