/**
 * Programmatic API of create-pwa-game
 *
 * @example
 * ```typescript
 * import { generateProject } from 'create-pwa-game';
 *
 * const report = generateProject('Space Shooter', { parentDir: process.cwd() });
 * console.log(report.rootDir, report.result?.created);
 * ```
 */

export { NAME, VERSION } from './version.js';

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export {
  ScaffoldError,
  ConfigError,
  ValidationError,
  UnsafePathError,
  DestinationExistsError,
  RootCreateError,
  DirectoryCreateError,
  type ValidationErrorCode,
  type ScaffoldStage,
} from './core/errors.js';
export {
  GeneratorConfigSchema,
  type GeneratorConfig,
  type GeneratorConfigOverrides,
  type FileManifest,
  type DirectorySet,
  type ScaffoldPlan,
  type FileFailure,
  type MaterializeResult,
  type GenerationReport,
} from './core/types.js';

// Scaffolding
export {
  sanitizeProjectName,
  validateProjectName,
  DEFAULT_MAX_NAME_LENGTH,
  DEFAULT_MIN_NAME_LENGTH,
  RESERVED_NAME_PATTERN,
  type SanitizeOptions,
  type NameValidation,
} from './scaffold/name-sanitizer.js';
export { TreeMaterializer, type MaterializeExtras } from './scaffold/materializer.js';
export { NodeFileSystem, type FileSystem } from './scaffold/file-system.js';
export { assertSafeRelativePath, deriveDirectories } from './scaffold/paths.js';
export { generateProject, type GenerateOptions } from './scaffold/generator.js';

// Templates
export { buildScaffoldPlan, PROJECT_FILES, ASSET_DIRECTORIES } from './templates/registry.js';
export type { TemplateContext, TemplateFile } from './templates/types.js';

// CLI
export { run, createCLI, type CliIO } from './cli/index.js';
