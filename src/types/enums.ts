export enum CompressionAlgorithm {
  NONE = 'None',
  GZ = 'GZ',
  BZ2 = 'BZ2'
}

export enum SignatureAlgorithm {
  NONE = 'None',
  MD5 = 'MD5',
  SHA1 = 'SHA-1',
  SHA256 = 'SHA-256',
  SHA512 = 'SHA-512',
  OPENSSL = 'OpenSSL'
}

export enum DiffMode {
  FILE_NAME = 'file-name',
  GNU = 'gnu',
  GIT = 'git'
}

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  CONTENT_DIFFERENCE = 3
}

export enum ErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  INVALID_ARCHIVE = 'INVALID_ARCHIVE',
  INVALID_ENTRY_PATH = 'INVALID_ENTRY_PATH',
  ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',
  UNSUPPORTED_COMPRESSION = 'UNSUPPORTED_COMPRESSION',
  EXTERNAL_TOOL_FAILURE = 'EXTERNAL_TOOL_FAILURE',
  UNSUPPORTED_OPTION_COMBINATION = 'UNSUPPORTED_OPTION_COMBINATION',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_OPERATION = 'INVALID_OPERATION'
}
