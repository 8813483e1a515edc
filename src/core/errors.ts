import { redactCommand } from "./redact.js";

/** Kinds derived from restic's own output. */
export type FailureKind =
  | "network"
  | "repository"
  | "authentication"
  | "permission"
  | "command";

/** Every kind a {@link ResticError} can carry. */
export type ErrorKind = FailureKind | "validation" | "timeout";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ResticErrorInit {
  kind: ErrorKind;
  message: string;
  command?: readonly string[];
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  cause?: unknown;
}

/**
 * A failure raised by this package. `kind` is the discriminant; `stdout` and
 * `stderr` hold restic's raw output for inspection and must not be logged.
 */
export class ResticError extends Error {
  readonly kind: ErrorKind;
  /** Command vector with secrets redacted. */
  readonly command: readonly string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(init: ResticErrorInit) {
    super(init.message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "ResticError";
    this.kind = init.kind;
    this.command = redactCommand(init.command ?? []);
    this.exitCode = init.exitCode ?? null;
    this.stdout = init.stdout ?? "";
    this.stderr = init.stderr ?? "";
  }

  override toString(): string {
    return this.exitCode === null
      ? this.message
      : `${this.message} (exit code: ${this.exitCode})`;
  }
}

export function isResticError(err: unknown): err is ResticError {
  return err instanceof ResticError;
}

// ─── Classification ─────────────────────────────────────────────────────────

const FAILURE_MARKERS: ReadonlyArray<[FailureKind, readonly string[]]> = [
  ["network", ["network", "connection", "timeout", "dial tcp"]],
  ["repository", ["repository not found", "invalid repository", "corrupted"]],
  ["authentication", ["authentication", "access denied", "wrong password"]],
  ["permission", ["permission", "access is denied", "not permitted"]],
];

const FAILURE_MESSAGES: Record<FailureKind, string> = {
  network: "Network error while accessing the repository",
  repository: "Restic repository error",
  authentication: "Authentication failed",
  permission: "Permission denied",
  command: "Restic command failed",
};

/**
 * Map restic's output to a failure kind. First matching group wins.
 */
export function classifyFailure(stdout: string, stderr: string): FailureKind {
  const combined = `${stdout}\n${stderr}`.toLowerCase();
  for (const [kind, markers] of FAILURE_MARKERS) {
    if (markers.some((m) => combined.includes(m))) return kind;
  }
  return "command";
}

/**
 * Build the typed error for a restic invocation that exited non-zero.
 */
export function commandFailure(
  command: readonly string[],
  result: CommandResult,
): ResticError {
  const kind = classifyFailure(result.stdout, result.stderr);
  return new ResticError({
    kind,
    message:
      kind === "command"
        ? `${FAILURE_MESSAGES.command} with code ${result.exitCode}`
        : FAILURE_MESSAGES[kind],
    command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  });
}

export function validationError(message: string): ResticError {
  return new ResticError({ kind: "validation", message });
}

// ─── Presentation ───────────────────────────────────────────────────────────

/**
 * Human-readable, secret-free description of any thrown value.
 */
export function describeError(err: unknown): string {
  if (!isResticError(err)) {
    return err instanceof Error ? err.message : String(err);
  }

  switch (err.kind) {
    case "network":
      return `${err.toString()}. Check connectivity to the storage provider.`;
    case "repository":
      return `${err.toString()}. Check that the repository exists and is initialized.`;
    case "authentication":
      return `${err.toString()}. Check RESTIC_PASSWORD and provider credentials.`;
    case "permission":
      return `${err.toString()}. Check file and bucket permissions.`;
    case "timeout":
      return `Timed out: ${err.message}`;
    case "validation":
      return `Invalid input: ${err.message}`;
    case "command":
      return err.toString();
  }
}
