/**
 * Template types
 *
 * Each generated file is described by a path and a pure render function.
 */

export interface TemplateContext {
  /** Trimmed user input, shown to humans */
  displayName: string;
  /** Sanitized name, used in cache names and the web-app manifest */
  canonicalName: string;
  generatorVersion: string;
  /** URLs the service worker caches on install, relative to the project root */
  precache: readonly string[];
}

export interface TemplateFile {
  path: string;              // Relative POSIX path within the project
  render: (ctx: TemplateContext) => string | Uint8Array;
  essential?: boolean;       // A failed write fails the whole run
  auxiliary?: boolean;       // Written after the main pass
}
