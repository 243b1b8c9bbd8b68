/**
 * Human-readable summary of a generation run.
 */

import { relative } from 'path';
import type { GenerationReport } from '../core/types.js';

const RULE = '─'.repeat(50);

export function formatReport(report: GenerationReport, cwd: string): string[] {
  const lines: string[] = [''];

  if (report.dryRun || !report.result) {
    lines.push('🔍 Dry run: nothing was written');
    lines.push(RULE);
    lines.push(`📂 Project:  ${report.canonicalName}`);
    lines.push(`📍 Location: ${report.rootDir}`);
    lines.push('');
    lines.push(
      `Would create ${report.plannedDirectories.length} directories and ${report.plannedFiles.length} files:`,
    );
    for (const path of report.plannedFiles) {
      lines.push(`   ${path}`);
    }
    lines.push('');
    return lines;
  }

  const result = report.result;
  lines.push(result.success ? '✅ PWA game project generated' : '❌ Project generation failed');
  lines.push(RULE);
  lines.push(`📂 Project:  ${report.canonicalName}`);
  lines.push(`📍 Location: ${report.rootDir}`);
  lines.push(`📄 Files:    ${result.created}/${result.requested} created`);

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(`⚠️  ${result.failures.length} file(s) could not be written:`);
    for (const failure of result.failures) {
      lines.push(`   ${failure.path}: ${failure.reason}`);
    }
  }

  if (!result.success) {
    lines.push('');
    lines.push('An essential file is missing, so the app will not load. Remove the folder and try again.');
    lines.push('');
    return lines;
  }

  lines.push('');
  lines.push('🚀 Next steps:');
  lines.push(`   1. cd ${relative(cwd, report.rootDir) || '.'}`);
  lines.push('   2. npx serve -l 8000 .   (or any static file server)');
  lines.push('   3. Open http://localhost:8000');
  lines.push('');
  lines.push('💡 Game logic lives in js/scenes/GameScene.js; README.md covers the rest.');
  lines.push('');
  return lines;
}
