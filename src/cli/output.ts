import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Notifier } from '../compare/decrypt.js';

/**
 * Output options, taken from the invocation's configuration
 */
export interface OutputOptions {
  json?: boolean;
  color?: boolean;
  debug?: boolean;
}

/**
 * Destination for one output stream
 */
export interface OutputSink {
  write(text: string): void;
  isTTY: boolean;
}

export function processSink(stream: NodeJS.WriteStream): OutputSink {
  return {
    write: (text) => {
      stream.write(text);
    },
    isTTY: Boolean(stream.isTTY),
  };
}

function colorsFor(sink: OutputSink, enabled: boolean): ChalkInstance {
  return new Chalk({ level: enabled && sink.isTTY ? chalk.level || 1 : 0 });
}

/**
 * Per-invocation output. Results go to stdout; errors, warnings, notes and
 * debug traces go to stderr.
 */
export class Output implements Notifier {
  /** Colors for stdout content (diffs, conflict blocks) */
  readonly colors: ChalkInstance;
  private readonly errColors: ChalkInstance;

  constructor(
    private readonly options: OutputOptions = {},
    private readonly stdout: OutputSink = processSink(process.stdout),
    private readonly stderr: OutputSink = processSink(process.stderr),
  ) {
    const enabled = options.color !== false && !options.json;
    this.colors = colorsFor(stdout, enabled);
    this.errColors = colorsFor(stderr, enabled);
  }

  get jsonMode(): boolean {
    return this.options.json === true;
  }

  /**
   * Raw text to stdout
   */
  print(text: string): void {
    this.stdout.write(text);
  }

  line(text = ''): void {
    this.stdout.write(`${text}\n`);
  }

  json(data: unknown): void {
    this.line(JSON.stringify(data, null, 2));
  }

  /**
   * Output success message
   */
  success(message: string): void {
    if (this.jsonMode) {
      this.line(JSON.stringify({ success: true, message }));
    } else {
      this.line(`${this.colors.green('OK')} ${message}`);
    }
  }

  /**
   * Output error message
   */
  error(message: string, details?: { code?: string }): void {
    if (this.jsonMode) {
      this.stderr.write(`${JSON.stringify({ success: false, error: message, code: details?.code })}\n`);
    } else {
      this.stderr.write(`${this.errColors.red('✗')} ${message}\n`);
    }
  }

  /**
   * Output warning message (suppressed in JSON mode)
   */
  warn(message: string): void {
    if (!this.jsonMode) {
      this.stderr.write(`${this.errColors.yellow(`⚠ ${message}`)}\n`);
    }
  }

  /**
   * Output info message (suppressed in JSON mode)
   */
  info(message: string): void {
    if (!this.jsonMode) {
      this.stderr.write(`${this.errColors.blue('ℹ')} ${message}\n`);
    }
  }

  debug(message: string): void {
    if (this.options.debug) {
      this.stderr.write(`${this.errColors.gray(`[debug] ${message}`)}\n`);
    }
  }
}
