// ─── Conversion Errors ──────────────────────────────────────────────────────
//
// One error class per failure kind. Every class carries a literal `kind`
// so callers can switch on the union instead of matching message text.
// All of them are terminal for the conversion that raised them.
// ─────────────────────────────────────────────────────────────────────────────

export type ContainerFormat = "midi" | "wav" | "soundfont" | "config";

/** Malformed MIDI, WAV, soundfont or config file contents. */
export class ContainerParseError extends Error {
  readonly kind = "container-parse" as const;

  constructor(
    readonly format: ContainerFormat,
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ContainerParseError";
  }
}

/** A valid container in an encoding this tool does not handle (SMPTE timing, 8-bit WAV, ...). */
export class UnsupportedFormatError extends Error {
  readonly kind = "unsupported-format" as const;

  constructor(
    readonly format: ContainerFormat,
    readonly detail: string,
  ) {
    super(`Unsupported ${format.toUpperCase()} format: ${detail}`);
    this.name = "UnsupportedFormatError";
  }
}

/** Caller-supplied parameters failed validation before any heavy work ran. */
export class InvalidParametersError extends Error {
  readonly kind = "invalid-parameters" as const;

  constructor(
    readonly parameter: string,
    message: string,
    readonly limit?: number,
  ) {
    super(message);
    this.name = "InvalidParametersError";
  }
}

/** Soundfont count does not reconcile with the song's channel count. */
export class SoundfontMismatchError extends Error {
  readonly kind = "soundfont-mismatch" as const;

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      actual < expected
        ? `Not enough soundfonts provided. Need ${expected} for channels, got ${actual}`
        : `Too many soundfonts provided. Need ${expected} for channels, got ${actual}`,
    );
    this.name = "SoundfontMismatchError";
  }
}

/** Underlying read/write failure. */
export class IoError extends Error {
  readonly kind = "io" as const;

  constructor(
    readonly path: string,
    message: string,
    readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IoError";
  }
}

export type PiecewiseError =
  | ContainerParseError
  | UnsupportedFormatError
  | InvalidParametersError
  | SoundfontMismatchError
  | IoError;

export type PiecewiseErrorKind = PiecewiseError["kind"];

export function isPiecewiseError(value: unknown): value is PiecewiseError {
  return (
    value instanceof ContainerParseError ||
    value instanceof UnsupportedFormatError ||
    value instanceof InvalidParametersError ||
    value instanceof SoundfontMismatchError ||
    value instanceof IoError
  );
}

/**
 * Wrap a Node fs failure for `path` into an IoError.
 * ENOENT gets a "not found" message; everything else keeps the system text.
 */
export function wrapIoError(err: unknown, path: string, what = "File"): IoError {
  const code = errorCode(err);
  if (code === "ENOENT") {
    return new IoError(path, `${what} not found: ${path}`, code, { cause: err });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new IoError(path, `Failed to access ${path}: ${reason}`, code, { cause: err });
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Human-readable diagnostic lines for a failure: the message first,
 * then any hints that help the user fix it without guessing.
 */
export function describeError(err: unknown): string[] {
  if (!isPiecewiseError(err)) {
    return [err instanceof Error ? err.message : String(err)];
  }

  const lines = [err.message];
  switch (err.kind) {
    case "io":
      if (err.code === "ENOENT") {
        lines.push(
          "Please check that:",
          "1. The file path is correct",
          "2. The file exists",
          "3. You have permission to read the file",
        );
      }
      break;
    case "container-parse":
      if (err.format === "soundfont") {
        lines.push("Soundfont files hold comma-separated numbers, e.g. 1,0.5,0.25");
      }
      break;
    case "soundfont-mismatch":
      lines.push('Give one soundfont per channel (use "-" to skip a channel), or a single soundfont for all channels.');
      break;
    case "unsupported-format":
    case "invalid-parameters":
      break;
  }
  return lines;
}
