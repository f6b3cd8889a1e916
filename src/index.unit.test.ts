import { describe, expect, it } from 'vitest';
import * as api from './index.js';

describe('public exports', () => {
  it('exposes core classes', () => {
    expect(api.ArchiveRegistry).toBeDefined();
    expect(api.PharArchiveReader).toBeDefined();
    expect(api.ZipArchiveReader).toBeDefined();
    expect(api.PharBuilder).toBeDefined();
    expect(api.ArchiveDiffer).toBeDefined();
    expect(api.ProcessComparator).toBeDefined();
    expect(api.Compiler).toBeDefined();
    expect(api.BufferedIO).toBeDefined();
  });

  it('exposes the exit codes', () => {
    expect(api.ExitCode.SUCCESS).toBe(0);
    expect(api.ExitCode.FAILURE).toBe(1);
    expect(api.ExitCode.CONTENT_DIFFERENCE).toBe(3);
  });
});
