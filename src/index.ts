export { KeyStream } from './crypto/keyStream.js';
export { CipherArchiveError, isCipherArchiveError } from './errors.js';
export type { CipherArchiveErrorCode } from './errors.js';
export { DEFAULT_ARCHIVE_SETTINGS, resolveSettings } from './config.js';
export type { ArchiveSettings } from './config.js';
export { createNameFilter, resolveFileSet } from './fileSet.js';
export type { FileDescriptor, FileSet, FileSetOptions, FileSetResult } from './fileSet.js';
export { ProgressChannel } from './progress/ProgressChannel.js';
export type { LogLevel, LogMessage, ProgressReporter, ProgressSnapshot, ProgressSource } from './progress/ProgressChannel.js';

export { writeArchive } from './writer/ArchiveWriter.js';
export type { ArchiveWriteOptions, ArchiveWriteResult } from './writer/ArchiveWriter.js';
export { readArchive } from './reader/ArchiveReader.js';
export type { ArchiveReadOptions, ArchiveReadResult } from './reader/ArchiveReader.js';

export { ArchiveOperation } from './operation/ArchiveOperation.js';
export type {
  IdentifyResult,
  OperationKind,
  OperationOptions,
  OperationResult,
  OperationState
} from './operation/ArchiveOperation.js';
export { EncryptOperation } from './operation/EncryptOperation.js';
export { DecryptOperation } from './operation/DecryptOperation.js';
export { formatProgress, monitorOperation } from './operation/monitor.js';
export type { MonitorOptions } from './operation/monitor.js';
export { decrypt, encrypt } from './operation/run.js';
export type { RunOptions } from './operation/run.js';
export { createDiagnosticLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { VERSION } from './version.js';
