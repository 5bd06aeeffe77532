/**
 * A failure the user should see on the status line. Handlers throw it and
 * the interpreter turns it into a status report at the command boundary.
 */
export class VimCommandError extends Error {
  readonly code: number | undefined;

  constructor(message: string, code?: number) {
    super(code === undefined ? message : `E${code}: ${message}`);
    this.name = "VimCommandError";
    this.code = code;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
