import { HALT_COMPILER_TOKEN } from '../archive/format.js';

export interface StubOptions {
  alias: string;
  /** Entry path of the script to run, relative to the archive root. */
  index: string | null;
  shebang: string | null;
  banner: string | null;
}

export function generateStub(options: StubOptions): string {
  const parts: string[] = [];
  if (options.shebang !== null) {
    parts.push(options.shebang);
  }
  parts.push('<?php', '');
  if (options.banner !== null) {
    parts.push(formatBanner(options.banner), '');
  }

  const alias = escapeSingleQuoted(options.alias);
  parts.push(`Phar::mapPhar('${alias}');`, '');
  if (options.index !== null) {
    parts.push(`require 'phar://${alias}/${escapeSingleQuoted(options.index)}';`, '');
  }
  parts.push(`${HALT_COMPILER_TOKEN} ?>`);
  return `${parts.join('\n')}\n`;
}

function formatBanner(banner: string): string {
  const lines = banner.split('\n').map((line) => (line.trim() === '' ? ' *' : ` * ${line.trimEnd()}`));
  return ['/*', ...lines, ' */'].join('\n');
}

function escapeSingleQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}
