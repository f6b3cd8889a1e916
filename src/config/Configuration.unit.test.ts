import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { exportConfiguration, loadConfiguration } from './Configuration.js';
import { InvalidConfiguration } from '../errors.js';
import { CompressionAlgorithm, SignatureAlgorithm } from '../types/enums.js';

function createProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pharsmith-config-'));
  for (const [name, contents] of Object.entries(files)) {
    const target = path.join(dir, ...name.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, contents);
  }
  return dir;
}

describe('loadConfiguration', () => {
  it('uses the defaults without a configuration file', () => {
    const dir = createProject({ 'index.php': '<?php', 'src/a.php': '<?php', 'README.md': '# readme' });
    try {
      const config = loadConfiguration({ cwd: dir });
      expect(config.configPath).toBeNull();
      expect(config.basePath).toBe(dir);
      expect(config.mainScriptPath).toBe(path.join(dir, 'index.php'));
      expect(config.outputPath).toBe(path.join(dir, 'index.phar'));
      expect(config.files).toEqual([path.join(dir, 'README.md'), path.join(dir, 'src', 'a.php')]);
      expect(config.alias).toBe('index.phar');
      expect(config.shebang).toBe('#!/usr/bin/env php');
      expect(config.banner).toBeNull();
      expect(config.stub).toEqual({ kind: 'generated' });
      expect(config.compression).toBe(CompressionAlgorithm.NONE);
      expect(config.signatureAlgorithm).toBe(SignatureAlgorithm.SHA1);
      expect(config.fileMode).toBeNull();
      expect(config.timestamp).toBeNull();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reads every supported key', () => {
    const dir = createProject({
      'pharsmith.json': JSON.stringify({
        main: 'bin/run.php',
        output: 'build/app.phar',
        directories: ['src'],
        files: ['LICENSE'],
        exclude: ['**/*.test.php'],
        alias: 'app',
        banner: 'Acme',
        shebang: false,
        stub: false,
        metadata: 'build=42',
        compression: 'GZ',
        algorithm: 'SHA256',
        chmod: '0755',
        timestamp: '2024-01-01T00:00:00Z'
      }),
      'bin/run.php': '<?php',
      'src/a.php': '<?php',
      'src/a.test.php': '<?php',
      'other.php': '<?php',
      LICENSE: 'MIT'
    });
    try {
      const config = loadConfiguration({ cwd: dir });
      expect(config.configPath).toBe(path.join(dir, 'pharsmith.json'));
      expect(config.mainScriptPath).toBe(path.join(dir, 'bin', 'run.php'));
      expect(config.outputPath).toBe(path.join(dir, 'build', 'app.phar'));
      expect(config.files).toEqual([path.join(dir, 'LICENSE'), path.join(dir, 'src', 'a.php')]);
      expect(config.alias).toBe('app');
      expect(config.banner).toBe('Acme');
      expect(config.shebang).toBeNull();
      expect(config.stub).toEqual({ kind: 'default' });
      expect(config.metadata).toBe('build=42');
      expect(config.compression).toBe(CompressionAlgorithm.GZ);
      expect(config.signatureAlgorithm).toBe(SignatureAlgorithm.SHA256);
      expect(config.fileMode).toBe(0o755);
      expect(config.timestamp?.toISOString()).toBe('2024-01-01T00:00:00.000Z');

      const exported = exportConfiguration(config);
      expect(exported.files).toEqual(['LICENSE', path.join('src', 'a.php')]);
      expect(exported.fileMode).toBe('0755');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('falls back to the .dist file and honours a disabled main script', () => {
    const dir = createProject({ 'pharsmith.json.dist': '{"main": false}', 'index.php': '<?php' });
    try {
      const config = loadConfiguration({ cwd: dir });
      expect(config.configPath).toBe(path.join(dir, 'pharsmith.json.dist'));
      expect(config.mainScriptPath).toBeNull();
      expect(config.files).toEqual([path.join(dir, 'index.php')]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects unknown keys', () => {
    const dir = createProject({ 'pharsmith.json': '{"foo": 1}' });
    try {
      const configPath = path.join(dir, 'pharsmith.json');
      expect(() => loadConfiguration({ cwd: dir })).toThrow(InvalidConfiguration);
      expect(() => loadConfiguration({ cwd: dir })).toThrow(
        `The configuration file "${configPath}" is invalid: (root): Unrecognized key(s) in object: 'foo'`
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports invalid values with their key', () => {
    const dir = createProject({ 'pharsmith.json': '{"chmod": "rwx"}' });
    try {
      expect(() => loadConfiguration({ cwd: dir })).toThrow('chmod: Expected an octal file mode such as "0755"');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects malformed JSON and missing files', () => {
    const dir = createProject({ 'pharsmith.json': '{"main": ' });
    try {
      expect(() => loadConfiguration({ cwd: dir })).toThrow('could not be read');
      expect(() => loadConfiguration({ cwd: dir, configPath: 'missing.json' })).toThrow(
        'The configuration file "missing.json" does not exist.'
      );
      expect(() => loadConfiguration({ cwd: dir, noConfig: true })).not.toThrow();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
