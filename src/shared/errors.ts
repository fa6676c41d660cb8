/**
 * Startup errors for reelsort
 * Only preconditions checked before any file is touched are allowed to abort a run
 */

import { EXIT_CODES } from './constants.js';

export type StartupErrorKind = keyof typeof EXIT_CODES;

/** Fatal precondition failure carrying the process exit code */
export class StartupError extends Error {
  readonly kind: StartupErrorKind;
  readonly exitCode: number;
  /** Individual problems, e.g. one line per invalid config field */
  readonly details: string[];

  constructor(kind: StartupErrorKind, message: string, details: string[] = []) {
    super(message);
    this.name = 'StartupError';
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
    this.details = details;
  }
}
