export type JournalErrorCode =
  | "INVALID_ENTRY"
  | "INVALID_DURATION"
  | "FAST_ALREADY_ACTIVE"
  | "NO_ACTIVE_FAST"
  | "DOCUMENT_WRITE_FAILED";

/**
 * Base class for failures the journal knows how to describe to the user.
 */
export class JournalError extends Error {
  constructor(
    message: string,
    public readonly code: JournalErrorCode
  ) {
    super(message);
    this.name = "JournalError";
  }
}

export class InvalidEntryError extends JournalError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "INVALID_ENTRY");
    this.name = "InvalidEntryError";
  }
}

export class FastingError extends JournalError {
  constructor(message: string, code: "INVALID_DURATION" | "FAST_ALREADY_ACTIVE" | "NO_ACTIVE_FAST") {
    super(message, code);
    this.name = "FastingError";
  }
}

export class DocumentWriteError extends JournalError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message, "DOCUMENT_WRITE_FAILED");
    this.name = "DocumentWriteError";
  }
}

export function errMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
