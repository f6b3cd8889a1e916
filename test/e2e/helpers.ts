import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createHash } from 'node:crypto';
import type { ArchiveDifferOptions } from '../../src/diff/ArchiveDiffer.js';
import type { ComparatorRequest, ComparatorResult, ExternalComparator } from '../../src/diff/comparator.js';
import { PharBuilder } from '../../src/archive/phar/PharBuilder.js';
import { runApplication } from '../../src/console/Application.js';
import { BufferedIO } from '../../src/console/IO.js';
import { formatSize } from '../../src/utils/size.js';

// --- Filesystem helpers ----------------------------------------------------

// Each E2E test works in its own temp directory, used as the working directory of the CLI.
export function createTempDir(prefix = 'pharsmith-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(baseDir: string, files: Record<string, string>): void {
  for (const [name, contents] of Object.entries(files)) {
    const target = path.join(baseDir, ...name.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, contents);
  }
}

// --- Archive helpers -------------------------------------------------------

export function createPhar(pharPath: string, files: Record<string, string>): Buffer {
  const builder = new PharBuilder(new Date('2024-01-01T00:00:00.000Z'));
  for (const [name, contents] of Object.entries(files)) {
    builder.addFile(name, contents);
  }
  const buffer = builder.build();
  fs.writeFileSync(pharPath, buffer);
  return buffer;
}

// Signature hash of a PHAR signed with the default SHA-1 signature.
export function signatureHash(buffer: Buffer): string {
  return createHash('sha1')
    .update(buffer.subarray(0, buffer.length - 28))
    .digest('hex')
    .toUpperCase();
}

export function archiveSize(pharPath: string): string {
  return formatSize(fs.statSync(pharPath).size);
}

// --- CLI helpers -----------------------------------------------------------

export interface CliRun {
  exitCode: number;
  output: string;
}

export async function runCli(args: string[], cwd: string, differ?: ArchiveDifferOptions): Promise<CliRun> {
  const io = new BufferedIO();
  const exitCode = await runApplication(args, io, { cwd, differ });
  return { exitCode, output: io.fetch() };
}

// Stands in for `diff`/`git diff`, answering every request with the same result.
export class StaticComparator implements ExternalComparator {
  readonly requests: ComparatorRequest[] = [];

  constructor(private readonly result: ComparatorResult) {}

  async run(request: ComparatorRequest): Promise<ComparatorResult> {
    this.requests.push(request);
    return this.result;
  }
}
