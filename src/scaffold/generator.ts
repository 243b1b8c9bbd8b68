import { resolve } from 'path';
import { getLogger, type Logger } from '../core/logger.js';
import { DestinationExistsError } from '../core/errors.js';
import type { GenerationReport } from '../core/types.js';
import { buildScaffoldPlan } from '../templates/registry.js';
import { NodeFileSystem, type FileSystem } from './file-system.js';
import { TreeMaterializer } from './materializer.js';
import { sanitizeProjectName } from './name-sanitizer.js';

export interface GenerateOptions {
  /** Directory the project folder is created in */
  parentDir: string;
  dryRun?: boolean;
  maxLength?: number;
  minLength?: number;
  fileSystem?: FileSystem;
  logger?: Logger;
}

/**
 * Sanitize the name, plan the tree and write it under `parentDir/<name>`.
 * Validation errors are thrown before any filesystem access.
 */
export function generateProject(rawName: string, options: GenerateOptions): GenerationReport {
  const logger = options.logger ?? getLogger();
  const fs = options.fileSystem ?? new NodeFileSystem();

  const canonicalName = sanitizeProjectName(rawName, {
    maxLength: options.maxLength,
    minLength: options.minLength,
  });
  const displayName = rawName.trim();
  const rootDir = resolve(options.parentDir, canonicalName);
  logger.info({ displayName, canonicalName, rootDir }, 'Generating project');

  const plan = buildScaffoldPlan(displayName, canonicalName);
  const report: GenerationReport = {
    displayName,
    canonicalName,
    rootDir,
    dryRun: options.dryRun ?? false,
    plannedFiles: [...plan.files.keys(), ...plan.auxiliary.keys()],
    plannedDirectories: [...plan.directories],
  };

  if (report.dryRun) {
    if (fs.exists(rootDir)) {
      throw new DestinationExistsError(rootDir);
    }
    return report;
  }

  const materializer = new TreeMaterializer(fs, logger);
  report.result = materializer.materialize(rootDir, plan.files, plan.directories, {
    auxiliary: plan.auxiliary,
    essentials: plan.essentials,
  });

  logger.info(
    { created: report.result.created, failures: report.result.failures.length },
    'Generation finished',
  );
  return report;
}
