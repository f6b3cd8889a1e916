export enum Verbosity {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  VERY_VERBOSE = 3,
  DEBUG = 4
}

export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Verbosity-aware text sink used by every command.
 *
 * Styled blocks (comment, success, error...) keep track of the last
 * characters written so that exactly one empty line separates a block from
 * whatever came before it.
 */
export class IO {
  private tail = '';
  private written = false;

  constructor(
    private readonly out: TextSink,
    private readonly err: TextSink = out,
    public verbosity: Verbosity = Verbosity.NORMAL
  ) {}

  isQuiet(): boolean {
    return this.verbosity === Verbosity.QUIET;
  }

  isVerbose(): boolean {
    return this.verbosity >= Verbosity.VERBOSE;
  }

  isDebug(): boolean {
    return this.verbosity >= Verbosity.DEBUG;
  }

  write(text: string, verbosity: Verbosity = Verbosity.NORMAL): void {
    if (this.verbosity < verbosity || text.length === 0) return;
    this.out.write(text);
    this.tail = (this.tail + text).slice(-2);
    this.written = true;
  }

  writeln(lines: string | readonly string[], verbosity: Verbosity = Verbosity.NORMAL): void {
    const list = typeof lines === 'string' ? [lines] : lines;
    for (const line of list) {
      this.write(`${line}\n`, verbosity);
    }
  }

  newLine(count = 1, verbosity: Verbosity = Verbosity.NORMAL): void {
    this.write('\n'.repeat(count), verbosity);
  }

  comment(message: string): void {
    this.block(' // ', message, { repeatPrefix: true });
  }

  success(message: string): void {
    this.block(' [OK] ', message);
  }

  /** Printed even when quiet. */
  error(message: string): void {
    this.block(' [ERROR] ', message, { verbosity: Verbosity.QUIET });
  }

  warning(message: string): void {
    this.block(' [WARNING] ', message);
  }

  note(message: string): void {
    this.block(' ! [NOTE] ', message);
  }

  deprecation(message: string): void {
    this.writeln(`⚠️  ${message}`);
  }

  debug(message: string): void {
    this.writeln(`[debug] ${message}`, Verbosity.DEBUG);
  }

  /** Writes to the error sink, bypassing block spacing. */
  stderr(message: string): void {
    this.err.write(`${message}\n`);
  }

  private block(prefix: string, message: string, options: { repeatPrefix?: boolean; verbosity?: Verbosity } = {}): void {
    const verbosity = options.verbosity ?? Verbosity.NORMAL;
    if (this.verbosity < verbosity) return;
    this.prependBlock(verbosity);
    const indent = ' '.repeat(prefix.length);
    const lines = message
      .split('\n')
      .map((line, index) => `${index === 0 || options.repeatPrefix === true ? prefix : indent}${line}`.trimEnd());
    this.writeln(lines, verbosity);
    this.newLine(1, verbosity);
  }

  private prependBlock(verbosity: Verbosity): void {
    if (!this.written) {
      this.newLine(1, verbosity);
      return;
    }
    const newLines = (this.tail.match(/\n/g) ?? []).length;
    if (newLines < 2) {
      this.newLine(2 - newLines, verbosity);
    }
  }
}

/** IO that keeps everything in memory. */
export class BufferedIO extends IO {
  private readonly chunks: string[];

  constructor(verbosity: Verbosity = Verbosity.NORMAL) {
    const chunks: string[] = [];
    const sink: TextSink = { write: (chunk: string) => chunks.push(chunk) };
    super(sink, sink, verbosity);
    this.chunks = chunks;
  }

  fetch(): string {
    return this.chunks.join('');
  }
}
