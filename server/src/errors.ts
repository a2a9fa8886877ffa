export type PipelineErrorCode =
  | 'TOO_LARGE'
  | 'UNSUPPORTED_FORMAT'
  | 'TRANSCODE_FAILED'
  | 'EMPTY_TRANSCRIPT';

export class PipelineError extends Error {
  constructor(message: string, readonly code: PipelineErrorCode) {
    super(message);
    this.name = new.target.name;
  }
}

export class TooLargeError extends PipelineError {
  constructor(readonly declaredSize: number, readonly maxSize: number) {
    super(`File is ${formatMegabytes(declaredSize)}, the limit is ${formatMegabytes(maxSize)}`, 'TOO_LARGE');
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(readonly extension: string | undefined, readonly allowed: readonly string[]) {
    super(
      `Unsupported file type${extension ? ` .${extension}` : ''}; expected one of ${allowed.map((e) => `.${e}`).join(', ')}`,
      'UNSUPPORTED_FORMAT'
    );
  }
}

export class TranscodeFailedError extends PipelineError {
  constructor(readonly exitCode: number | null, readonly diagnostics: string) {
    super(
      `ffmpeg failed${exitCode === null ? '' : ` with exit code ${exitCode}`}: ${diagnostics.trim().slice(-500) || 'no output'}`,
      'TRANSCODE_FAILED'
    );
  }
}

export class EmptyTranscriptError extends PipelineError {
  constructor() {
    super('No speech detected', 'EMPTY_TRANSCRIPT');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatMegabytes(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return `${Number.isInteger(mb) ? mb : mb.toFixed(1)} MB`;
}
