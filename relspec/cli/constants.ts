// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export const cli = 'relspec';
export const blank = '\n';
