export const REDACTED = "***";

interface RedactionRule {
  pattern: RegExp;
  replace: string;
}

// ─── Rules ──────────────────────────────────────────────────────────────────

const RULES: RedactionRule[] = [
  // NAME=value for restic, provider and secret-looking variable names
  {
    pattern:
      /\b((?:RESTIC_PASSWORD|(?:AWS|AZURE|GOOGLE)_[A-Z0-9_]+|[A-Z0-9_]*(?:password|passwd|secret|token|api_key|access_key|account_key)[A-Z0-9_]*)=)\S+/gi,
    replace: `$1${REDACTED}`,
  },
  // Password flags on a command line
  {
    pattern: /(^|\s)(-p|--password-file|--password)([ =])\S+/g,
    replace: `$1$2$3${REDACTED}`,
  },
];

/**
 * Replace secret values in free text with a fixed placeholder.
 * Applied to every command line and every chunk of restic output before it
 * is printed or written to a log file.
 */
export function redactSecrets(text: string): string {
  let result = text;
  for (const rule of RULES) {
    result = result.replace(rule.pattern, rule.replace);
  }
  return result;
}

const PASSWORD_FLAGS = new Set(["-p", "--password", "--password-file"]);

/**
 * Redact each argument of a command vector. The value following a password
 * flag is replaced as a whole.
 */
export function redactCommand(command: readonly string[]): string[] {
  return command.map((arg, i) =>
    i > 0 && PASSWORD_FLAGS.has(command[i - 1]) ? REDACTED : redactSecrets(arg),
  );
}
