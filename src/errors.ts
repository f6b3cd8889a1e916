import { ErrorCode } from './types/enums.js';

export class PharsmithError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FileNotFound extends PharsmithError {
  constructor(readonly path: string) {
    super(ErrorCode.FILE_NOT_FOUND, `The file "${path}" does not exist.`);
  }
}

export class InvalidArchive extends PharsmithError {
  constructor(readonly path: string, readonly reason: string, options?: { cause?: unknown }) {
    super(ErrorCode.INVALID_ARCHIVE, `Could not open the file "${path}" as an archive: ${reason}.`, options);
  }

  static wrap(path: string, err: unknown): InvalidArchive {
    if (err instanceof InvalidArchive) return err;
    const reason = err instanceof Error ? err.message.replace(/\.$/, '') : String(err);
    return new InvalidArchive(path, reason, { cause: err });
  }
}

export class ArchiveEntryError extends PharsmithError {}

export class ExternalToolFailure extends PharsmithError {
  constructor(readonly commandLine: string, readonly exitCode: number | null, readonly stderr: string) {
    const detail = stderr.trim().length > 0 ? `: ${stderr.trim()}` : '';
    const status = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`;
    super(ErrorCode.EXTERNAL_TOOL_FAILURE, `The command "${commandLine}" ${status}${detail}`);
  }
}

export class UnsupportedOptionCombination extends PharsmithError {
  constructor(message: string) {
    super(ErrorCode.UNSUPPORTED_OPTION_COMBINATION, message);
  }
}

export class InvalidConfiguration extends PharsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.INVALID_CONFIGURATION, message, options);
  }
}
