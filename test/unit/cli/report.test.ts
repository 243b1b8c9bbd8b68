import { describe, it, expect } from 'vitest';
import { formatReport } from '../../../src/cli/report.js';
import type { GenerationReport } from '../../../src/core/types.js';

const RULE = '─'.repeat(50);

function baseReport(overrides: Partial<GenerationReport> = {}): GenerationReport {
  return {
    displayName: 'My Game',
    canonicalName: 'my-game',
    rootDir: '/work/my-game',
    dryRun: false,
    plannedFiles: ['index.html', '.gitignore'],
    plannedDirectories: ['css'],
    ...overrides,
  };
}

describe('formatReport', () => {
  it('lists planned files on a dry run', () => {
    expect(formatReport(baseReport({ dryRun: true }), '/work')).toEqual([
      '',
      '🔍 Dry run: nothing was written',
      RULE,
      '📂 Project:  my-game',
      '📍 Location: /work/my-game',
      '',
      'Would create 1 directories and 2 files:',
      '   index.html',
      '   .gitignore',
      '',
    ]);
  });

  it('prints next steps after a successful run', () => {
    const report = baseReport({
      result: {
        rootDir: '/work/my-game',
        requested: 2,
        created: 2,
        createdPaths: ['index.html', '.gitignore'],
        failures: [],
        success: true,
      },
    });

    expect(formatReport(report, '/work')).toEqual([
      '',
      '✅ PWA game project generated',
      RULE,
      '📂 Project:  my-game',
      '📍 Location: /work/my-game',
      '📄 Files:    2/2 created',
      '',
      '🚀 Next steps:',
      '   1. cd my-game',
      '   2. npx serve -l 8000 .   (or any static file server)',
      '   3. Open http://localhost:8000',
      '',
      '💡 Game logic lives in js/scenes/GameScene.js; README.md covers the rest.',
      '',
    ]);
  });

  it('uses a relative path for the cd step', () => {
    const report = baseReport({
      rootDir: '/work/games/my-game',
      result: {
        rootDir: '/work/games/my-game',
        requested: 1,
        created: 1,
        createdPaths: ['index.html'],
        failures: [],
        success: true,
      },
    });

    expect(formatReport(report, '/work')).toContain('   1. cd games/my-game');
  });

  it('lists tolerated failures and still prints next steps', () => {
    const report = baseReport({
      result: {
        rootDir: '/work/my-game',
        requested: 2,
        created: 1,
        createdPaths: ['index.html'],
        failures: [{ path: '.gitignore', reason: 'EACCES: permission denied' }],
        success: true,
      },
    });

    const lines = formatReport(report, '/work');
    expect(lines.slice(5, 9)).toEqual([
      '📄 Files:    1/2 created',
      '',
      '⚠️  1 file(s) could not be written:',
      '   .gitignore: EACCES: permission denied',
    ]);
    expect(lines).toContain('🚀 Next steps:');
  });

  it('explains an essential failure instead of next steps', () => {
    const report = baseReport({
      result: {
        rootDir: '/work/my-game',
        requested: 2,
        created: 1,
        createdPaths: ['.gitignore'],
        failures: [{ path: 'index.html', reason: 'ENOSPC: no space left on device' }],
        success: false,
      },
    });

    const lines = formatReport(report, '/work');
    expect(lines[1]).toBe('❌ Project generation failed');
    expect(lines.slice(-3)).toEqual([
      '',
      'An essential file is missing, so the app will not load. Remove the folder and try again.',
      '',
    ]);
    expect(lines).not.toContain('🚀 Next steps:');
  });
});
