////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / assert / result stuff
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err = {
  ok: false;
  error: string;
};
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

// Normalizes anything caught in a catch clause to a printable message.
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Parses a loose boolean as found in environment variables.
export function parseBooleanFlag(raw: string): Result<boolean> {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return ok(true);
    case "0":
    case "false":
    case "no":
    case "off":
      return ok(false);
    default:
      return err(`Invalid boolean value: "${raw}" (expected true/false, yes/no, on/off or 1/0)`);
  }
}
