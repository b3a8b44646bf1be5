/**
 * Ingestion Error Classes
 * Every one of these is scoped to a single file: the run logs it, skips the
 * file and carries on with the rest of the corpus.
 */

import { RagError } from '../../shared/errors/rag-error';

export class IngestionError extends RagError {
  constructor(
    message: string,
    code: string,
    public readonly filePath: string,
    originalError?: Error,
  ) {
    super(message, code, false, originalError);
    this.name = 'IngestionError';
  }
}

export class UnsupportedFileTypeError extends IngestionError {
  constructor(filePath: string, extension: string) {
    super(
      `Extension not supported: ${extension || 'none'}`,
      'INGEST_UNSUPPORTED_FORMAT',
      filePath,
    );
    this.name = 'UnsupportedFileTypeError';
  }
}

export class CorruptedFileError extends IngestionError {
  constructor(filePath: string, message: string, originalError?: Error) {
    super(
      `File is corrupted or unreadable: ${message}`,
      'INGEST_CORRUPTED_FILE',
      filePath,
      originalError,
    );
    this.name = 'CorruptedFileError';
  }
}

export class EmptyFileError extends IngestionError {
  constructor(filePath: string) {
    super(
      'No content extracted from file. The file appears to be empty.',
      'INGEST_EMPTY_FILE',
      filePath,
    );
    this.name = 'EmptyFileError';
  }
}
