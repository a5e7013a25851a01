// Error types for taskclock domain

export type TkErrorCode =
  | "invalid_args"
  | "invalid_state"
  | "task_not_found"
  | "ambiguous_task_id"
  | "format_error"
  | "io_error";

export class TkError extends Error {
  constructor(
    public readonly code: TkErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TkError";
  }

  toJSON(): { error: string; code: TkErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
