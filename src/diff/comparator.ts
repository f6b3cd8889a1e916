import { spawn } from 'node:child_process';
import { METADATA_SIDECAR } from '../archive/extract.js';

export interface ComparatorRequest {
  commandLine: string;
  cwd: string;
}

export interface ComparatorResult {
  /** `null` when the process could not be started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Port to the external diff programs. */
export interface ExternalComparator {
  run(request: ComparatorRequest): Promise<ComparatorResult>;
}

/** Runs the command line through the system shell. */
export class ProcessComparator implements ExternalComparator {
  run(request: ComparatorRequest): Promise<ComparatorResult> {
    return new Promise((resolve) => {
      const child = spawn(request.commandLine, { cwd: request.cwd, shell: true, stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8');
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8');
      });
      child.on('error', (err) => {
        resolve({ exitCode: null, stdout, stderr: stderr || err.message });
      });
      child.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}

const METADATA_EXCLUDE = `--exclude=${METADATA_SIDECAR}`;

/** The exclude flag as each platform's shell expects it quoted. */
export function gnuExcludeFlag(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'darwin':
      return METADATA_EXCLUDE;
    case 'win32':
      return `"${METADATA_EXCLUDE}"`;
    default:
      return `'${METADATA_EXCLUDE}'`;
  }
}
