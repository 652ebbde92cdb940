import type { Logger } from "./log";

export type SiteErrorKind =
  | "missing-index"
  | "path-not-relative"
  | "walk-entry"
  | "dangling-link";

/**
 * A recoverable problem found while building the site. Whether it aborts
 * the run is up to the {@link Reporter}.
 */
export class SiteError extends Error {
  readonly kind: SiteErrorKind;

  constructor(kind: SiteErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SiteError";
    this.kind = kind;
  }

  static missingIndex(): SiteError {
    return new SiteError(
      "missing-index",
      "index.{dj|djot|md} not found! consider creating one in the base target directory as the default page."
    );
  }

  static pathNotRelative(path: string): SiteError {
    return new SiteError(
      "path-not-relative",
      `Path ${path} is not relative to target directory`
    );
  }

  static walkEntry(cause: unknown): SiteError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new SiteError("walk-entry", `An entry returned error ${detail}`, {
      cause,
    });
  }

  static danglingLink(path: string): SiteError {
    return new SiteError(
      "dangling-link",
      `Referenced file path ${path} does not exist!`
    );
  }
}

export interface Reporter {
  /** Warn and continue, or throw in strict mode */
  report(error: SiteError): void;
  /** Warnings collected so far (lenient mode only) */
  readonly warnings: readonly SiteError[];
}

export interface ReporterOptions {
  strict: boolean;
  logger: Logger;
}

export function createReporter({ strict, logger }: ReporterOptions): Reporter {
  const warnings: SiteError[] = [];

  return {
    report(error) {
      if (strict) {
        throw error;
      }
      warnings.push(error);
      logger.warn(`Warning: ${error.message}`);
    },
    warnings,
  };
}
