import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { ArchiveHandle } from '../../../src/archive/types.js';
import { ArchiveRegistry } from '../../../src/archive/ArchiveRegistry.js';
import { PharArchiveReader } from '../../../src/archive/phar/PharArchiveReader.js';
import { ZipArchiveReader } from '../../../src/archive/zip/ZipArchiveReader.js';
import { ArchiveDiffer } from '../../../src/diff/ArchiveDiffer.js';
import { compareArchives } from '../../../src/diff/compareArchives.js';
import { FileNotFound, InvalidArchive } from '../../../src/errors.js';
import { DiffMode, ExitCode } from '../../../src/types/enums.js';
import { cleanupTempDir, createPhar, createTempDir } from '../helpers.js';

class RecordingRegistry extends ArchiveRegistry {
  readonly opened: ArchiveHandle[] = [];

  constructor() {
    super([new PharArchiveReader(), new ZipArchiveReader()]);
  }

  override async open(filePath: string): Promise<ArchiveHandle> {
    const handle = await super.open(filePath);
    this.opened.push(handle);
    return handle;
  }
}

function sha1Signature(buffer: Buffer): string {
  return createHash('sha1')
    .update(buffer.subarray(0, buffer.length - 28))
    .digest('hex')
    .toUpperCase();
}

describe('ArchiveDiffer', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('short-circuits identical archives', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'index.php': '<?php' });
    createPhar(pathB, { 'index.php': '<?php' });

    const report = await new ArchiveDiffer().diff(pathA, pathB, DiffMode.GIT);
    expect(report.identical).toBe(true);
    expect(report.content).toEqual({ kind: 'identical' });
    expect(report.summaryDiff).toEqual([]);
    expect(report.exitCode).toBe(ExitCode.SUCCESS);
    expect(report.archiveA.lines[0]).toBe('Archive: a.phar');
    expect(report.archiveB.lines[0]).toBe('Archive: b.phar');
  });

  it('lists the files present on one side only', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    const bufferA = createPhar(pathA, { 'a.php': 'a', 'common.php': 'common' });
    const bufferB = createPhar(pathB, { 'b.php': 'b', 'common.php': 'common' });

    const report = await new ArchiveDiffer().diff(pathA, pathB);
    expect(report.identical).toBe(false);
    expect(report.content).toEqual({
      kind: 'difference',
      lines: [
        '--- Files present in "a.phar" but not in "b.phar"',
        '+++ Files present in "b.phar" but not in "a.phar"',
        '',
        '- a.php [NONE] - 1.00B',
        '',
        '+ b.php [NONE] - 1.00B'
      ],
      message: '2 file(s) difference',
      exitCode: ExitCode.FAILURE
    });
    expect(report.summaryDiff.slice(0, 3)).toEqual(['--- PHAR A', '+++ PHAR B', '@@ @@']);
    expect(report.summaryDiff).toContain(`-Signature Hash: ${sha1Signature(bufferA)}`);
    expect(report.summaryDiff).toContain(`+Signature Hash: ${sha1Signature(bufferB)}`);
    expect(report.summaryDiff).toContain(' Signature: SHA-1');
    expect(report.exitCode).toBe(ExitCode.FAILURE);
  });

  it('fails without listing when only the contents differ', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'index.php': 'x' });
    createPhar(pathB, { 'index.php': 'y' });

    const report = await new ArchiveDiffer().diff(pathA, pathB, DiffMode.FILE_NAME);
    expect(report.content).toEqual({ kind: 'no-difference' });
    expect(report.exitCode).toBe(ExitCode.FAILURE);
  });

  it('counts differing entries', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'changed.php': 'x', 'gone.php': 'g', 'same.php': 's' });
    createPhar(pathB, { 'changed.php': 'y', 'new.php': 'n', 'same.php': 's' });

    const differ = new ArchiveDiffer();
    expect(await differ.check(pathA, pathB)).toEqual({ identical: false, differences: 3 });
    expect(await differ.check(pathA, pathA)).toEqual({ identical: true, differences: 0 });
  });

  it('checks both paths before opening anything', async () => {
    const pathA = path.join(dir, 'a.phar');
    createPhar(pathA, { 'index.php': '<?php' });
    const registry = new RecordingRegistry();

    await expect(new ArchiveDiffer({ registry }).diff(pathA, path.join(dir, 'missing.phar'))).rejects.toThrow(FileNotFound);
    expect(registry.opened).toHaveLength(0);
  });

  it('closes the archives once done', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'index.php': 'x' });
    createPhar(pathB, { 'index.php': 'y' });
    const registry = new RecordingRegistry();

    await new ArchiveDiffer({ registry }).check(pathA, pathB);
    expect(registry.opened).toHaveLength(2);
    for (const handle of registry.opened) {
      await expect(handle.readEntry('index.php')).rejects.toThrow('Archive handle is closed');
    }
  });

  it('closes the first archive when the second cannot be opened', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'index.php': 'x' });
    fs.writeFileSync(pathB, 'not an archive');
    const registry = new RecordingRegistry();

    await expect(new ArchiveDiffer({ registry }).diff(pathA, pathB)).rejects.toThrow(InvalidArchive);
    expect(registry.opened).toHaveLength(1);
    await expect(registry.opened[0].readEntry('index.php')).rejects.toThrow('Archive handle is closed');
  });

  it('renders the comparison as the diff command prints it', async () => {
    const pathA = path.join(dir, 'a.phar');
    const pathB = path.join(dir, 'b.phar');
    createPhar(pathA, { 'index.php': '<?php' });
    createPhar(pathB, { 'index.php': '<?php' });

    expect(await compareArchives(pathA, pathB)).toEqual({
      output: '\n // Comparing the two archives...\n\n [OK] The two archives are identical.\n\n',
      exitCode: ExitCode.SUCCESS
    });
  });
});
