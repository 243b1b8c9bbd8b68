import { z } from 'zod';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const GeneratorConfigSchema = z.object({
  naming: z.object({
    maxLength: z.number().int().min(1).max(255).default(50),
    minLength: z.number().int().min(1).default(1),
  }).default({}).refine(n => n.minLength <= n.maxLength, {
    message: 'naming.minLength must not exceed naming.maxLength',
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('warn'),
  }).default({}),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

/** Partial shape accepted as CLI or programmatic overrides */
export interface GeneratorConfigOverrides {
  naming?: Partial<GeneratorConfig['naming']>;
  logging?: Partial<GeneratorConfig['logging']>;
}

// ===== Scaffold plan =====

/** Relative POSIX path → file content, in write order */
export type FileManifest = Map<string, string | Uint8Array>;

/** Relative POSIX directories that must exist before any file is written */
export type DirectorySet = Set<string>;

export interface ScaffoldPlan {
  files: FileManifest;
  /** Written after the main pass: placeholder icon, ignore-file */
  auxiliary: FileManifest;
  directories: DirectorySet;
  /** Paths whose failure fails the whole run */
  essentials: Set<string>;
}

// ===== Materialize result =====

export interface FileFailure {
  path: string;
  reason: string;
}

export interface MaterializeResult {
  rootDir: string;
  requested: number;
  created: number;
  createdPaths: string[];
  failures: FileFailure[];
  success: boolean;
}

export interface GenerationReport {
  displayName: string;
  canonicalName: string;
  rootDir: string;
  dryRun: boolean;
  plannedFiles: string[];
  plannedDirectories: string[];
  /** Absent on a dry run */
  result?: MaterializeResult;
}
