// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';

/** The pipeline stage an acquisition failed in. */
export type AcquisitionStage = 'resolve' | 'cache' | 'network' | 'extract';

export type ErrorKind = 'configuration' | 'fetch' | 'cache' | 'extraction' | 'acquisition';

/** Base class for every error raised by the toolchain pipeline. */
export abstract class ToolchainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A defect in the static catalog or in caller input. Never retried. */
export class ConfigurationError extends ToolchainError {
  readonly kind = 'configuration';
}

export class TemplateError extends ConfigurationError {
  constructor(public readonly template: string, message: string) {
    super(message);
  }
}

export class UnsupportedPlatformError extends ConfigurationError {
  constructor(public readonly platform: string, supported: ReadonlyArray<string>) {
    super(i`Unsupported platform '${platform}'. Supported platforms: ${supported.join(', ')}`);
  }
}

export class FetchError extends ToolchainError {
  readonly kind = 'fetch';

  constructor(public readonly url: string, message: string, options?: { cause?: unknown, statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }

  readonly statusCode: number | undefined;
}

export class CacheError extends ToolchainError {
  readonly kind = 'cache';

  constructor(public readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The cached file exists but cannot be extracted. */
export class CorruptCacheError extends CacheError {
}

export type ExtractionErrorCode = 'MISSING_MEMBER' | 'INVALID_ARCHIVE' | 'IO_FAILED';

export class ExtractionError extends ToolchainError {
  readonly kind = 'extraction';

  constructor(public readonly archivePath: string, public readonly code: ExtractionErrorCode, message: string, options?: { cause?: unknown, member?: string }) {
    super(message, options);
    this.member = options?.member;
  }

  /** the archive member being processed when the failure occurred */
  readonly member: string | undefined;
}

export class MissingMemberError extends ExtractionError {
  constructor(archivePath: string, member: string) {
    super(archivePath, 'MISSING_MEMBER', i`Archive '${archivePath}' does not contain the member '${member}'`, { member });
  }
}

export class InvalidArchiveError extends ExtractionError {
  constructor(archivePath: string, detail: string, options?: { cause?: unknown, member?: string }) {
    super(archivePath, 'INVALID_ARCHIVE', i`Invalid or corrupt archive '${archivePath}': ${detail}`, options);
  }
}

/** Wraps the failure of one pipeline stage with the request that was being served. */
export class AcquisitionError extends ToolchainError {
  readonly kind = 'acquisition';

  constructor(public readonly stage: AcquisitionStage, public readonly platform: string, public readonly version: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Returns the message of an unknown thrown value. */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Returns the node.js error code (ENOENT, EACCES, ...) of a thrown value, if it has one. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
