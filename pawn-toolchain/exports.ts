// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export { acquireArtifact, acquireCompiler } from './acquire';
export type { AcquisitionResult } from './acquire';
export { TarGzUnpacker } from './archivers/tar';
export { Unpacker } from './archivers/unpacker';
export type { ExtractionKind, UnpackOptions } from './archivers/unpacker';
export { unpackerFor } from './archivers/unpackers';
export { ZipUnpacker } from './archivers/zip';
export { getCacheFolder } from './cache/cache-folder';
export { CacheStore } from './cache/cache-store';
export type { CacheEntry, CacheLookup } from './cache/cache-store';
export { instantiateDescriptor, resolveDescriptor } from './catalog/descriptor';
export type { ResolvedDescriptor } from './catalog/descriptor';
export { hostPlatform, isPlatform, lookupPackage, supportedPlatforms } from './catalog/platforms';
export type { PackageDescriptor, Platform } from './catalog/platforms';
export { parseTemplate, resolveTemplate, validateTemplate } from './catalog/template';
export { Fetcher } from './fs/fetcher';
export { GotHttpClient } from './fs/https';
export type { HttpClient, HttpResponse } from './fs/https';
export { setLocale } from './i18n';
export type { AcquireEvents, AcquireOptions, DownloadEvents, FileEntry, UnpackEvents } from './interfaces/events';
export { loadPackageDefinition, parsePackageDefinition } from './project/package-definition';
export type { PackageDefinition } from './project/package-definition';
export { Session } from './session';
export type { SessionSettings } from './session';
export * from './util/exceptions';
