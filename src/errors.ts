/**
 * Error handling for gene screening
 *
 * Every failure raised by the screening pipeline, the summary aggregator and
 * the external tool adapters derives from ScreenError, so callers can report
 * them uniformly while still branching on the concrete class.
 */

/**
 * Base error class for all genescreen errors
 */
export class ScreenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ScreenError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid options or arguments
 */
export class ValidationError extends ScreenError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ScreenError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * An aligner output row whose field count (or numeric content) does not
 * match the tabular layout the pipeline asked for. Fatal for the input file.
 */
export class MalformedAlignmentRowError extends ParseError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly expectedFields: number,
    public readonly actualFields: number,
    lineNumber?: number,
    context?: string
  ) {
    super(`${message} in alignments for '${source}'`, "BLAST", lineNumber, context);
    this.name = "MalformedAlignmentRowError";
  }
}

/**
 * A hit table handed to the summary aggregator whose header cannot key rows
 */
export class InvalidReportHeaderError extends ParseError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly missingColumns: readonly string[]
  ) {
    super(`${message}: ${missingColumns.join(", ")} (in '${filePath}')`, "REPORT", 1);
    this.name = "InvalidReportHeaderError";
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends ScreenError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * A report file named for summarizing cannot be opened. Fatal for the run.
 */
export class UnreadableInputFileError extends FileError {
  constructor(filePath: string, systemError?: unknown) {
    super(
      `Cannot open '${filePath}' for summarizing${systemError !== undefined ? `: ${describeError(systemError)}` : ""}`,
      filePath,
      "open",
      systemError
    );
    this.name = "UnreadableInputFileError";
  }
}

/**
 * Stream processing errors for line-oriented input
 */
export class StreamError extends ScreenError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * An aligner suite tool (search or indexing) could not be started or exited
 * unsuccessfully
 */
export class AlignerError extends ScreenError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    context?: string
  ) {
    super(message, "ALIGNER_ERROR", undefined, context);
    this.name = "AlignerError";
  }
}

/**
 * A reference database is missing, empty or of an unrecognizable type
 */
export class DatabaseError extends ScreenError {
  constructor(
    message: string,
    public readonly database: string,
    context?: string
  ) {
    super(message, "DATABASE_ERROR", undefined, context);
    this.name = "DatabaseError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
