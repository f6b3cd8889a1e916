import fs from 'node:fs';
import path from 'node:path';
import type { ArchiveBuilder } from '../archive/types.js';
import type { Configuration } from '../config/Configuration.js';
import { DUMP_DIR, exportConfiguration } from '../config/Configuration.js';
import { PharBuilder } from '../archive/phar/PharBuilder.js';
import { normalizeEntryPath } from '../archive/normalize.js';
import { CompilerLogger, LogPrefix } from '../console/CompilerLogger.js';
import { Verbosity } from '../console/IO.js';
import { generateStub } from './StubGenerator.js';
import { CompressionAlgorithm } from '../types/enums.js';
import { formatFileCount, formatSize } from '../utils/size.js';
import { formatDuration } from '../utils/time.js';

export interface CompileOptions {
  /** Skips the compression. */
  dev?: boolean;
  /** Dumps the added files and the configuration into `<workingDir>/.pharsmith_dump`. */
  debug?: boolean;
  workingDir: string;
}

export interface CompileResult {
  outputPath: string;
  count: number;
  size: number;
}

export class Compiler {
  constructor(
    private readonly logger: CompilerLogger,
    private readonly createBuilder: () => ArchiveBuilder = () => new PharBuilder(),
    private readonly clock: () => number = Date.now
  ) {}

  compile(config: Configuration, options: CompileOptions): CompileResult {
    const startTime = this.clock();
    const dumpDir = path.join(options.workingDir, DUMP_DIR);
    this.logger.logStartBuilding(config.outputPath);
    this.removeExistingArtifacts(config, options.debug === true ? dumpDir : null);

    const builder = this.createBuilder();
    const main = this.registerMainScript(config, builder);
    this.addFiles(config, builder);
    this.registerStub(config, builder, main);
    this.configureMetadata(config, builder);
    if (options.debug === true) {
      this.dump(config, dumpDir);
    }
    this.configureCompression(config, builder, options.dev === true);
    this.logger.log(LogPrefix.QUESTION_MARK, `Signing using a ${config.signatureAlgorithm} signature`);
    builder.setSignatureAlgorithm(config.signatureAlgorithm);

    fs.mkdirSync(path.dirname(config.outputPath), { recursive: true });
    fs.writeFileSync(config.outputPath, builder.build());
    this.correctPermissions(config);

    const result = { outputPath: config.outputPath, count: builder.count, size: fs.statSync(config.outputPath).size };
    this.logEndBuilding(result, startTime);
    return result;
  }

  private removeExistingArtifacts(config: Configuration, dumpDir: string | null): void {
    if (dumpDir !== null) {
      fs.rmSync(dumpDir, { recursive: true, force: true });
    }
    if (!fs.existsSync(config.outputPath)) return;
    this.logger.log(LogPrefix.QUESTION_MARK, `Removing the existing PHAR "${config.outputPath}"`);
    fs.rmSync(config.outputPath, { force: true });
  }

  private registerMainScript(config: Configuration, builder: ArchiveBuilder): string | null {
    if (config.mainScriptPath === null) {
      this.logger.log(LogPrefix.QUESTION_MARK, 'No main script path configured');
      return null;
    }
    this.logger.log(LogPrefix.QUESTION_MARK, `Adding main file: ${config.mainScriptPath}`);
    const local = this.entryPath(config, config.mainScriptPath);
    builder.addFile(local, stripShebang(fs.readFileSync(config.mainScriptPath, 'utf8')), this.fileOptions(config, config.mainScriptPath));
    return local;
  }

  private addFiles(config: Configuration, builder: ArchiveBuilder): void {
    this.logger.log(LogPrefix.QUESTION_MARK, 'Adding files');
    for (const file of config.files) {
      const local = this.entryPath(config, file);
      this.logger.log(LogPrefix.PLUS, local, Verbosity.VERY_VERBOSE);
      builder.addFile(local, fs.readFileSync(file), this.fileOptions(config, file));
    }
    this.logger.log(LogPrefix.CHEVRON, config.files.length === 0 ? 'No file found' : `${config.files.length} file(s)`);
  }

  private registerStub(config: Configuration, builder: ArchiveBuilder, main: string | null): void {
    switch (config.stub.kind) {
      case 'generated': {
        this.logger.log(LogPrefix.QUESTION_MARK, 'Generating new stub');
        if (config.shebang === null) {
          this.logger.log(LogPrefix.MINUS, 'No shebang line');
        } else {
          this.logger.log(LogPrefix.MINUS, `Using shebang line: ${config.shebang}`);
        }
        if (config.banner !== null) {
          this.logger.log(LogPrefix.MINUS, 'Using banner:');
          for (const line of config.banner.split('\n')) {
            this.logger.log(LogPrefix.CHEVRON, line);
          }
        }
        builder.setStub(generateStub({ alias: config.alias, index: main, shebang: config.shebang, banner: config.banner }));
        break;
      }
      case 'custom':
        this.logger.log(LogPrefix.QUESTION_MARK, `Using custom stub from "${config.stub.path}"`);
        builder.setStub(fs.readFileSync(config.stub.path, 'utf8'));
        break;
      case 'default':
        this.logger.log(LogPrefix.QUESTION_MARK, 'Using default stub');
        builder.setStub(generateStub({ alias: config.alias, index: main, shebang: null, banner: null }));
        break;
    }
    builder.setAlias(config.alias);
  }

  private configureMetadata(config: Configuration, builder: ArchiveBuilder): void {
    if (config.metadata === null) {
      this.logger.log(LogPrefix.QUESTION_MARK, 'No metadata set');
      return;
    }
    this.logger.log(LogPrefix.QUESTION_MARK, 'Setting metadata');
    this.logger.log(LogPrefix.MINUS, config.metadata);
    builder.setMetadata(config.metadata);
  }

  private configureCompression(config: Configuration, builder: ArchiveBuilder, dev: boolean): void {
    if (config.compression === CompressionAlgorithm.NONE) {
      this.logger.log(LogPrefix.QUESTION_MARK, 'No compression');
      return;
    }
    if (dev) {
      this.logger.log(LogPrefix.QUESTION_MARK, 'Dev mode detected: skipping the compression');
      return;
    }
    this.logger.log(LogPrefix.QUESTION_MARK, `Compressing with the algorithm "${config.compression}"`);
    builder.compressFiles(config.compression);
  }

  private correctPermissions(config: Configuration): void {
    if (config.fileMode === null) return;
    this.logger.log(LogPrefix.QUESTION_MARK, `Setting file permissions to 0${config.fileMode.toString(8)}`);
    fs.chmodSync(config.outputPath, config.fileMode);
  }

  private dump(config: Configuration, dumpDir: string): void {
    this.logger.log(LogPrefix.QUESTION_MARK, `Dumping the added files into "${dumpDir}"`, Verbosity.DEBUG);
    const sources = config.mainScriptPath === null ? config.files : [config.mainScriptPath, ...config.files];
    for (const source of sources) {
      const target = path.join(dumpDir, ...this.entryPath(config, source).split('/'));
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.copyFileSync(source, target);
    }
    fs.mkdirSync(dumpDir, { recursive: true });
    fs.writeFileSync(path.join(dumpDir, '.pharsmith_configuration'), `${JSON.stringify(exportConfiguration(config), null, 2)}\n`);
  }

  private logEndBuilding(result: CompileResult, startTime: number): void {
    this.logger.log(LogPrefix.STAR, 'Done.');
    const io = this.logger.getIO();
    io.comment(
      [
        `PHAR: ${formatFileCount(result.count)} (${formatSize(result.size)})`,
        '',
        'You can inspect the generated PHAR with the "info" command.'
      ].join('\n')
    );
    io.comment(`Time: ${formatDuration(this.clock() - startTime)}`);
  }

  private entryPath(config: Configuration, file: string): string {
    return normalizeEntryPath(path.relative(config.basePath, file));
  }

  private fileOptions(config: Configuration, file: string): { timestamp: Date; permissions: number } {
    const stat = fs.statSync(file);
    return { timestamp: config.timestamp ?? stat.mtime, permissions: stat.mode & 0o777 };
  }
}

/** The stub already carries the shebang line. */
function stripShebang(contents: string): string {
  return contents.startsWith('#!') ? contents.slice(contents.indexOf('\n') + 1) : contents;
}
