/**
 * Input Buffer
 *
 * Reads one line at a time from an input stream and keeps the last line
 * read. Lines end at `\n`; one `\r` before it is dropped too. A bare `\r`
 * is part of the line. Whitespace is left for the classifier to deal with.
 *
 * The stream is paused while a complete line is waiting to be read.
 */

/**
 * Base class for input failures. These end the session.
 */
export class InputError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "InputError";
  }

  toDisplayMessage(): string {
    return this.message;
  }
}

/**
 * The input stream ended before a line was available.
 */
export class InputClosedError extends InputError {
  constructor() {
    super("INPUT_CLOSED", "Error reading input");
    this.name = "InputClosedError";
  }
}

/**
 * The input stream failed.
 */
export class InputReadError extends InputError {
  constructor(cause: unknown) {
    super(
      "INPUT_READ_FAILED",
      `Error reading input: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "InputReadError";
  }
}

/**
 * Type guard for InputError.
 */
export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

/**
 * Options for InputBuffer.
 */
export interface InputBufferOptions {
  /** Input stream (defaults to process.stdin) */
  input?: NodeJS.ReadableStream;
}

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: InputError) => void;
}

export class InputBuffer {
  /** Last line read, or null before the first read */
  buffer: string | null = null;

  private input: NodeJS.ReadableStream;
  private opened = false;
  /** Text received but not yet returned as a line */
  private text = "";
  private ended = false;
  private pending?: PendingRead;
  private failure?: InputError;

  private readonly onData = (chunk: string | Buffer): void => {
    this.text += String(chunk);
    this.flush();
    if (!this.pending && this.text.includes("\n")) {
      this.input.pause();
    }
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.failure ??= new InputClosedError();
    this.flush();
  };

  private readonly onError = (err: unknown): void => {
    this.failure ??= new InputReadError(err);
    this.flush();
  };

  constructor(options: InputBufferOptions = {}) {
    this.input = options.input ?? process.stdin;
  }

  /**
   * Wait for the next line.
   *
   * Lines already received are returned in order even after the stream
   * has ended; once they run out, the end or failure of the stream is
   * thrown as an InputError.
   */
  async read(): Promise<string> {
    const line = await this.nextLine();
    this.buffer = line;
    return line;
  }

  /**
   * Stop reading from the input stream.
   */
  close(): void {
    if (!this.opened) return;

    this.input.off("data", this.onData);
    this.input.off("end", this.onEnd);
    this.input.off("error", this.onError);
    this.input.pause();
    this.opened = false;
    this.failure ??= new InputClosedError();
  }

  private nextLine(): Promise<string> {
    this.open();

    const line = this.takeLine();
    if (line !== null) {
      return Promise.resolve(line);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      this.input.resume();
    });
  }

  private open(): void {
    if (this.opened || this.failure) return;

    this.input.setEncoding("utf-8");
    this.input.on("data", this.onData);
    this.input.on("end", this.onEnd);
    this.input.on("error", this.onError);
    this.opened = true;
  }

  /**
   * Remove the next complete line from the received text.
   * After the stream ends, a final unterminated line counts as complete.
   */
  private takeLine(): string | null {
    const newline = this.text.indexOf("\n");
    if (newline === -1) {
      if (this.ended && this.text.length > 0) {
        const rest = this.text;
        this.text = "";
        return rest;
      }
      return null;
    }

    const line = this.text.slice(0, newline);
    this.text = this.text.slice(newline + 1);
    return line.endsWith("\r") ? line.slice(0, -1) : line;
  }

  /**
   * Settle a waiting read with the next line, or with the stream's failure.
   */
  private flush(): void {
    const pending = this.pending;
    if (!pending) return;

    const line = this.takeLine();
    if (line !== null) {
      this.pending = undefined;
      pending.resolve(line);
    } else if (this.failure) {
      this.pending = undefined;
      pending.reject(this.failure);
    }
  }
}
