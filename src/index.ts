export * from './types/enums.js';
export * from './errors.js';
export * from './archive/types.js';
export { ArchiveRegistry, createArchiveRegistry } from './archive/ArchiveRegistry.js';
export { PharArchiveReader } from './archive/phar/PharArchiveReader.js';
export { PharBuilder, DEFAULT_STUB } from './archive/phar/PharBuilder.js';
export { ZipArchiveReader } from './archive/zip/ZipArchiveReader.js';
export { extractArchive, METADATA_SIDECAR } from './archive/extract.js';
export { ArchiveDiffer, decideExitCode, type ArchiveDifferOptions } from './diff/ArchiveDiffer.js';
export { compareArchives, type ComparisonOutput } from './diff/compareArchives.js';
export { ProcessComparator, type ExternalComparator, type ComparatorRequest, type ComparatorResult } from './diff/comparator.js';
export { renderDiffReport } from './diff/renderer.js';
export { renderArchiveSummary } from './diff/summary.js';
export { diffSummaries } from './diff/summaryDiff.js';
export type { CheckResult, ContentSection, DiffReport } from './diff/report.js';
export { loadConfiguration, type Configuration } from './config/Configuration.js';
export { Compiler, type CompileOptions, type CompileResult } from './compile/Compiler.js';
export { IO, BufferedIO, Verbosity } from './console/IO.js';
export { runApplication } from './console/Application.js';
