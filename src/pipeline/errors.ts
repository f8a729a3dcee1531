/**
 * Error classes for the dataset tools
 */

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code = 'pipeline_error', details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * Manifest file is unreadable or not a list of `{ video }` records
 */
export class ManifestError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'manifest_invalid', details);
    this.name = 'ManifestError';
  }
}

/**
 * Invalid option or missing setting
 */
export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'config_invalid', details);
    this.name = 'ConfigError';
  }
}

/**
 * An external program (ffmpeg, ffprobe, scenedetect, yt-dlp) failed or produced unusable output
 */
export class ToolError extends PipelineError {
  command: string;
  exitCode?: number;
  stderr?: string;
  /** The executable itself could not be found */
  missing: boolean;

  constructor(message: string, command: string, exitCode?: number, stderr?: string, missing = false) {
    super(message, missing ? 'tool_missing' : 'tool_failed', { command, exitCode });
    this.name = 'ToolError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.missing = missing;
  }
}

function stringField(e: object, key: 'shortMessage' | 'stderr' | 'stdout' | 'message'): string | undefined {
  if (!(key in e)) return undefined;
  const v: unknown = Reflect.get(e, key);
  return typeof v === 'string' && v.trim() ? v : undefined;
}

/**
 * Best human-readable message for anything that was thrown, including execa failures.
 */
export function describeError(e: unknown): string {
  if (e instanceof PipelineError) return e.message;
  if (typeof e === 'object' && e !== null) {
    const msg =
      stringField(e, 'shortMessage') ||
      stringField(e, 'message') ||
      stringField(e, 'stderr');
    if (msg) return msg;
  }
  return String(e);
}

/**
 * Exit code and trailing stderr of a failed execa call, when present.
 */
export function processFailure(e: unknown): { exitCode?: number; stderr?: string; code?: string } {
  if (typeof e !== 'object' || e === null) return {};
  const exitCode: unknown = Reflect.get(e, 'exitCode');
  const code: unknown = Reflect.get(e, 'code');
  const stderr = stringField(e, 'stderr') || stringField(e, 'stdout');
  return {
    exitCode: typeof exitCode === 'number' ? exitCode : undefined,
    stderr: stderr ? stderr.slice(-800) : undefined,
    code: typeof code === 'string' ? code : undefined,
  };
}
