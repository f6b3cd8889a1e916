import type { IO } from '../console/IO.js';
import type { DiffReport } from './report.js';
import type { ExitCode } from '../types/enums.js';

export function renderDiffReport(report: DiffReport, io: IO): ExitCode {
  io.comment('Comparing the two archives...');
  if (report.identical) {
    io.success('The two archives are identical.');
    return report.exitCode;
  }

  io.writeln(report.archiveA.lines);
  io.newLine();
  io.writeln(report.archiveB.lines);
  if (report.summaryDiff.length > 0) {
    io.newLine();
    io.writeln(report.summaryDiff);
  }

  io.comment(`Comparing the two archives contents (${report.mode} diff)...`);
  switch (report.content.kind) {
    case 'identical':
    case 'no-difference':
      io.writeln('No difference could be observed with this mode.');
      break;
    case 'difference':
      io.writeln(report.content.lines);
      if (report.content.message !== undefined) {
        io.error(report.content.message);
      }
      break;
  }
  return report.exitCode;
}
