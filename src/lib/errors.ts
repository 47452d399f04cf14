export type CopyErrorKind =
  | "SourceUnreadable"
  | "RecursiveInit"
  | "CollisionStrict"
  | "CollisionNoOverwrite"
  | "SymlinkCycle"
  | "IoFailure";

export type GitErrorKind = "GitFailed" | "GitUnavailable" | "GitIdentityMissing" | "CacheUnusable";

export type HookErrorKind = "PreInitFailed" | "PostInitFailed";

export type RegistryErrorKind =
  | "TemplateNotFound"
  | "TemplateExists"
  | "RegistryInvalid"
  | "ConfigInvalid"
  | "TemplatePathMissing"
  | "DangerousPath"
  | "NoChanges";

export type CompletionsErrorKind = "CompletionsOutdated" | "CompletionsUnversioned" | "CompletionsUnreadable";

export type ErrorCode =
  | CopyErrorKind
  | GitErrorKind
  | HookErrorKind
  | RegistryErrorKind
  | CompletionsErrorKind
  | "Cancelled";

export const EXIT_CODES: Readonly<Record<ErrorCode, number>> = {
  SourceUnreadable: 10,
  RecursiveInit: 11,
  CollisionStrict: 12,
  CollisionNoOverwrite: 13,
  SymlinkCycle: 14,
  IoFailure: 15,
  GitFailed: 20,
  GitUnavailable: 21,
  GitIdentityMissing: 22,
  CacheUnusable: 23,
  PreInitFailed: 30,
  PostInitFailed: 31,
  TemplateNotFound: 40,
  TemplateExists: 41,
  RegistryInvalid: 42,
  ConfigInvalid: 43,
  TemplatePathMissing: 44,
  DangerousPath: 45,
  NoChanges: 46,
  CompletionsOutdated: 50,
  CompletionsUnversioned: 51,
  CompletionsUnreadable: 52,
  Cancelled: 130,
};

/**
 * Base class for every failure the CLI reports. The entry point maps `code`
 * to a process exit code through {@link EXIT_CODES}.
 */
export class TemplativeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TemplativeError";
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class CopyError extends TemplativeError {
  readonly kind: CopyErrorKind;
  /** Offending path, relative to the source root where one exists. */
  readonly path?: string;

  constructor(kind: CopyErrorKind, message: string, path?: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "CopyError";
    this.kind = kind;
    this.path = path;
  }
}

export class GitError extends TemplativeError {
  readonly kind: GitErrorKind;
  readonly output: string;

  constructor(kind: GitErrorKind, message: string, output = "", options?: { cause?: unknown }) {
    super(kind, output ? `${message}\n${output}` : message, options);
    this.name = "GitError";
    this.kind = kind;
    this.output = output;
  }
}

export class HookError extends TemplativeError {
  readonly kind: HookErrorKind;
  readonly command: string;
  readonly output: string;

  constructor(kind: HookErrorKind, command: string, exitCode: number | undefined, output: string) {
    const phase = kind === "PreInitFailed" ? "pre-init" : "post-init";
    const status = exitCode === undefined ? "could not be started" : `exited with code ${exitCode}`;
    super(kind, output ? `${phase} hook "${command}" ${status}:\n${output}` : `${phase} hook "${command}" ${status}`);
    this.name = "HookError";
    this.kind = kind;
    this.command = command;
    this.output = output;
  }
}

export class RegistryError extends TemplativeError {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "RegistryError";
    this.kind = kind;
  }
}

export class CompletionsError extends TemplativeError {
  readonly kind: CompletionsErrorKind;

  constructor(kind: CompletionsErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "CompletionsError";
    this.kind = kind;
  }
}

/** The user dismissed a prompt (Ctrl+C). */
export class CancelledError extends TemplativeError {
  constructor(options?: { cause?: unknown }) {
    super("Cancelled", "Cancelled", options);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
