// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export const toolName = 'pawn-toolchain';
export const cli = 'pawn-toolchain';
export const cacheFolderVariable = 'PAWN_TOOLCHAIN_CACHE';
export const userAgent = `${toolName}/1.0`;

/** milliseconds to wait for a connection, for the first response byte, and between bytes of the body */
export const networkTimeout = 15000;

/** package definition files, in the order they are looked for */
export const packageDefinitionFiles = ['pawn.json', 'pawn.yaml'] as const;

/** the folder (relative to the project) the compiler is installed into when none is given */
export const defaultCompilerFolder = '.compiler';
