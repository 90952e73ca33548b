export type DateTimeParseErrorCode = "invalid_time_format" | "invalid_date_format" | "empty_input";

/**
 * Raised when an expression cannot be resolved. The message is meant to be
 * shown to the user as-is.
 */
export class DateTimeParseError extends Error {
  readonly code: DateTimeParseErrorCode;
  readonly input: string;

  constructor(code: DateTimeParseErrorCode, message: string, input: string) {
    super(message);
    this.name = "DateTimeParseError";
    this.code = code;
    this.input = input;
  }
}

export class InvalidTimeFormatError extends DateTimeParseError {
  constructor(input: string) {
    super("invalid_time_format", `Invalid time format: "${input}"`, input);
    this.name = "InvalidTimeFormatError";
  }
}

export class InvalidDateFormatError extends DateTimeParseError {
  constructor(input: string) {
    super("invalid_date_format", `Invalid date format: "${input}"`, input);
    this.name = "InvalidDateFormatError";
  }
}

export class EmptyInputError extends DateTimeParseError {
  constructor() {
    super("empty_input", "Empty input: nothing to parse", "");
    this.name = "EmptyInputError";
  }
}
