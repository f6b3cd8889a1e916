import { IO, Verbosity } from './IO.js';

export enum LogPrefix {
  QUESTION_MARK = '?',
  STAR = '*',
  PLUS = '+',
  MINUS = '-',
  CHEVRON = '>'
}

export class CompilerLogger {
  constructor(private readonly io: IO) {}

  getIO(): IO {
    return this.io;
  }

  log(prefix: LogPrefix, message: string, verbosity: Verbosity = Verbosity.NORMAL): void {
    this.io.writeln(`${prefix} ${message}`, verbosity);
  }

  logStartBuilding(path: string): void {
    this.io.writeln(`Building the PHAR "${path}"`);
    this.io.newLine();
  }
}
