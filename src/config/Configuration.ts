import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import type { ZodIssue } from 'zod';
import { CONFIG_FILE_NAMES, rawConfigSchema, type RawConfig } from './schema.js';
import { InvalidConfiguration } from '../errors.js';
import { CompressionAlgorithm, SignatureAlgorithm } from '../types/enums.js';

export const DEFAULT_MAIN = 'index.php';
export const DEFAULT_OUTPUT = 'index.phar';
export const DEFAULT_SHEBANG = '#!/usr/bin/env php';
export const DUMP_DIR = '.pharsmith_dump';

export type StubSource = { kind: 'generated' } | { kind: 'custom'; path: string } | { kind: 'default' };

export interface Configuration {
  readonly configPath: string | null;
  readonly basePath: string;
  /** Absolute path of the main script, `null` when there is none. */
  readonly mainScriptPath: string | null;
  readonly outputPath: string;
  /** Absolute paths of the files to add besides the main script, sorted. */
  readonly files: readonly string[];
  readonly alias: string;
  readonly banner: string | null;
  readonly shebang: string | null;
  readonly stub: StubSource;
  readonly metadata: string | null;
  readonly compression: CompressionAlgorithm;
  readonly signatureAlgorithm: SignatureAlgorithm;
  readonly fileMode: number | null;
  readonly timestamp: Date | null;
}

export interface LoadConfigurationOptions {
  cwd: string;
  /** Explicit configuration file. */
  configPath?: string;
  /** Ignores any configuration file found in `cwd`. */
  noConfig?: boolean;
}

const SIGNATURE_ALGORITHMS: Record<NonNullable<RawConfig['algorithm']>, SignatureAlgorithm> = {
  MD5: SignatureAlgorithm.MD5,
  SHA1: SignatureAlgorithm.SHA1,
  SHA256: SignatureAlgorithm.SHA256,
  SHA512: SignatureAlgorithm.SHA512
};

export function loadConfiguration(options: LoadConfigurationOptions): Configuration {
  if (options.noConfig) {
    return createConfiguration(null, {}, options.cwd);
  }
  const configPath = locateConfigFile(options);
  if (configPath === null) {
    return createConfiguration(null, {}, options.cwd);
  }
  return createConfiguration(configPath, parseConfigFile(configPath), path.dirname(configPath));
}

export function locateConfigFile(options: LoadConfigurationOptions): string | null {
  if (options.configPath !== undefined) {
    const explicit = path.resolve(options.cwd, options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new InvalidConfiguration(`The configuration file "${options.configPath}" does not exist.`);
    }
    return explicit;
  }
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(options.cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export function parseConfigFile(configPath: string): RawConfig {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfiguration(`The configuration file "${configPath}" could not be read: ${reason}`, { cause: err });
  }
  const parsed = rawConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidConfiguration(
      `The configuration file "${configPath}" is invalid: ${parsed.error.issues.map(describeIssue).join('; ')}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export function createConfiguration(configPath: string | null, raw: RawConfig, directory: string): Configuration {
  const basePath = path.resolve(directory, raw['base-path'] ?? '.');
  if (!isDirectory(basePath)) {
    throw new InvalidConfiguration(`The base path "${basePath}" is not a directory.`);
  }

  const outputPath = path.resolve(basePath, raw.output ?? DEFAULT_OUTPUT);
  const mainScriptPath = resolveMainScript(basePath, raw.main);
  const stub = resolveStub(basePath, raw.stub);
  const excluded = [outputPath, mainScriptPath, configPath].filter((value): value is string => value !== null);

  return {
    configPath,
    basePath,
    mainScriptPath,
    outputPath,
    files: collectFiles(basePath, raw, excluded),
    alias: raw.alias ?? path.basename(outputPath),
    banner: raw.banner === false || raw.banner === undefined ? null : raw.banner,
    shebang: raw.shebang === false ? null : raw.shebang ?? DEFAULT_SHEBANG,
    stub,
    metadata: raw.metadata ?? null,
    compression: raw.compression === 'GZ' ? CompressionAlgorithm.GZ : CompressionAlgorithm.NONE,
    signatureAlgorithm: SIGNATURE_ALGORITHMS[raw.algorithm ?? 'SHA1'],
    fileMode: raw.chmod === undefined ? null : parseInt(raw.chmod, 8),
    timestamp: raw.timestamp === undefined ? null : new Date(raw.timestamp)
  };
}

/** Plain JSON view of a configuration, written next to the debug dump. */
export function exportConfiguration(config: Configuration): Record<string, unknown> {
  return {
    ...config,
    files: config.files.map((file) => path.relative(config.basePath, file)),
    timestamp: config.timestamp?.toISOString() ?? null,
    fileMode: config.fileMode === null ? null : `0${config.fileMode.toString(8)}`
  };
}

function resolveMainScript(basePath: string, main: RawConfig['main']): string | null {
  if (main === false) return null;
  if (main === undefined) {
    const fallback = path.join(basePath, DEFAULT_MAIN);
    return fs.existsSync(fallback) ? fallback : null;
  }
  const mainPath = path.resolve(basePath, main);
  if (!fs.existsSync(mainPath)) {
    throw new InvalidConfiguration(`The main script "${main}" does not exist.`);
  }
  return mainPath;
}

function resolveStub(basePath: string, stub: RawConfig['stub']): StubSource {
  if (stub === undefined || stub === true) return { kind: 'generated' };
  if (stub === false) return { kind: 'default' };
  const stubPath = path.resolve(basePath, stub);
  if (!fs.existsSync(stubPath)) {
    throw new InvalidConfiguration(`The stub file "${stub}" does not exist.`);
  }
  return { kind: 'custom', path: stubPath };
}

function collectFiles(basePath: string, raw: RawConfig, excluded: readonly string[]): string[] {
  const files = new Set<string>();
  for (const file of raw.files ?? []) {
    const filePath = path.resolve(basePath, file);
    if (!fs.existsSync(filePath)) {
      throw new InvalidConfiguration(`The file "${file}" does not exist.`);
    }
    files.add(filePath);
  }

  const directories = raw.directories ?? [];
  const patterns =
    directories.length === 0 && files.size === 0 ? ['**/*'] : directories.map((directory) => `${toGlobPath(directory)}/**/*`);
  if (patterns.length > 0) {
    const matches = fg.sync(patterns, {
      cwd: basePath,
      absolute: true,
      onlyFiles: true,
      dot: true,
      ignore: [...(raw.exclude ?? []), `${DUMP_DIR}/**`]
    });
    for (const match of matches) files.add(path.resolve(match));
  }

  for (const skip of excluded) files.delete(skip);
  return Array.from(files).sort();
}

function toGlobPath(directory: string): string {
  return fg.escapePath(directory.replace(/\\/g, '/').replace(/\/+$/, ''));
}

function isDirectory(directory: string): boolean {
  return fs.existsSync(directory) && fs.statSync(directory).isDirectory();
}

function describeIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}
