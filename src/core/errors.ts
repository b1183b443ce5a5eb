// src/core/errors.ts
import type { ErrorPhase, ScrapeErrorRecord } from './types/index.js';

export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  FETCH_FAILED = 'fetch_failed',
  RENDERING_REQUIRED = 'rendering_required',
  RENDER_TIMEOUT = 'render_timeout',
  RENDER_FAILED = 'render_failed',
  EXTRACT_FAILED = 'extract_failed',
}

// INVALID_URL never reaches the pipeline, so it has no phase.
const PHASES: Record<ErrorCode, ErrorPhase | undefined> = {
  [ErrorCode.INVALID_URL]: undefined,
  [ErrorCode.FETCH_FAILED]: 'fetch',
  [ErrorCode.RENDERING_REQUIRED]: 'detection',
  [ErrorCode.RENDER_TIMEOUT]: 'render',
  [ErrorCode.RENDER_FAILED]: 'render',
  [ErrorCode.EXTRACT_FAILED]: 'scrape',
};

export class ScrapeError extends Error {
  code: ErrorCode;
  suggestion?: string;

  constructor(code: ErrorCode, message: string, suggestion?: string) {
    super(message);
    this.name = 'ScrapeError';
    this.code = code;
    this.suggestion = suggestion;
  }

  get phase(): ErrorPhase | undefined {
    return PHASES[this.code];
  }
}

export function isRenderTimeout(error: unknown): boolean {
  return error instanceof ScrapeError && error.code === ErrorCode.RENDER_TIMEOUT;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}

/**
 * Convert anything thrown inside a pipeline stage into an error record.
 * A ScrapeError keeps its own phase and carries its suggestion in the
 * message; everything else takes the stage's phase.
 */
export function toErrorRecord(error: unknown, fallbackPhase: ErrorPhase): ScrapeErrorRecord {
  if (!(error instanceof ScrapeError)) {
    return { message: describeError(error), phase: fallbackPhase };
  }
  return {
    message: error.suggestion ? `${error.message} (${error.suggestion})` : error.message,
    phase: error.phase ?? fallbackPhase,
  };
}
