/**
 * Fatal build errors. Anything thrown from the walk or the pipeline aborts
 * the whole build; these classes only name the input that was at fault.
 */

/** Front matter that is not a YAML mapping, or carries an unusable date */
export class FrontMatterError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'FrontMatterError';
    this.file = file;
  }
}

/** Invalid configuration, including a scoped feed for a missing directory */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A title shared by several pages, under the `error` duplicate-title policy */
export class AmbiguousLinkError extends Error {
  readonly token: string;
  readonly candidates: string[];

  constructor(token: string, candidates: string[]) {
    super(`Link "${token}" matches ${candidates.length} pages: ${candidates.join(', ')}`);
    this.name = 'AmbiguousLinkError';
    this.token = token;
    this.candidates = candidates;
  }
}
