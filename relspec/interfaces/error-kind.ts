// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export enum ErrorKind {
  FieldMissing = 'FieldMissing',
  IncorrectType = 'IncorrectType',
  InvalidValue = 'InvalidValue',
  UnknownKey = 'UnknownKey',
  UnsafeValue = 'UnsafeValue',
  ParseError = 'ParseError',
}
