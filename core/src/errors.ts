/**
 * Error types shared by the toolshed utilities.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text.
 */

export class ToolshedError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolshedError";
    this.code = code;
  }
}

export type ConfigErrorCode = "CONFIG_MISSING" | "CONFIG_INVALID";

/**
 * Missing or malformed configuration (webhook URL, member ID).
 */
export class ConfigError extends ToolshedError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(code, message);
    this.name = "ConfigError";
  }
}

/**
 * A webhook POST that failed in transport or answered with a non-200 status.
 */
export class DeliveryError extends ToolshedError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("DELIVERY_FAILED", message, { cause: options?.cause });
    this.name = "DeliveryError";
    this.status = options?.status;
  }
}

export class UnknownFontError extends ToolshedError {
  public readonly font: string;
  public readonly availableFonts: readonly string[];

  constructor(font: string, availableFonts: readonly string[]) {
    super(
      "UNKNOWN_FONT",
      `Font "${font}" not available. Available fonts: ${availableFonts.join(", ")}`,
    );
    this.name = "UnknownFontError";
    this.font = font;
    this.availableFonts = availableFonts;
  }
}

/**
 * The git executable could not be spawned. Fatal for the scanner.
 */
export class GitNotFoundError extends ToolshedError {
  constructor(options?: { cause?: unknown }) {
    super("GIT_NOT_FOUND", "git not found on PATH", options);
    this.name = "GitNotFoundError";
  }
}

export type StartFileErrorCode = "START_FILE_UNREADABLE" | "START_FILE_INVALID";

export class StartFileError extends ToolshedError {
  declare readonly code: StartFileErrorCode;
  public readonly path: string;

  constructor(code: StartFileErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "StartFileError";
    this.path = path;
  }
}
