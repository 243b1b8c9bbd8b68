import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { run, type CliIO } from '../../src/cli/index.js';
import { WORKSPACE_CONFIG_FILE } from '../../src/core/config.js';

interface FakeIO extends CliIO {
  stdout: string[];
  stderr: string[];
  questions: string[];
}

function fakeIO(cwd: string, answers: Array<string | null> = [], isInteractive = false): FakeIO {
  const io: FakeIO = {
    stdout: [],
    stderr: [],
    questions: [],
    out: text => io.stdout.push(text),
    err: text => io.stderr.push(text),
    prompt: async question => {
      io.questions.push(question);
      return answers.shift() ?? null;
    },
    isInteractive,
    cwd,
    env: {
      PWA_GAME_CONFIG_DIR: path.join(cwd, '.no-global-config'),
      PWA_GAME_LOG_LEVEL: 'silent',
    },
  };
  return io;
}

const argv = (...args: string[]) => ['node', 'create-pwa-game', ...args];

describe('create-pwa-game CLI', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pwa-game-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints the version', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--version'), io)).toBe(0);
    expect(io.stdout.join('')).toBe('create-pwa-game v1.0.0\n');
  });

  it('prints usage with --help', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--help'), io)).toBe(0);
    const help = io.stdout.join('');
    expect(help).toContain('Usage: create-pwa-game [options] [name]');
    expect(help).toContain('--dry-run');
    expect(help).toContain('Examples:');
  });

  it('generates a project named on the command line', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('Space Shooter'), io)).toBe(0);

    const root = path.join(tmpDir, 'space-shooter');
    expect(fs.existsSync(path.join(root, 'index.html'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'assets', 'shaders'))).toBe(true);
    const out = io.stdout.join('');
    expect(out).toContain('✅ PWA game project generated');
    expect(out).toContain('📄 Files:    26/26 created');
    expect(out).toContain('   1. cd space-shooter');
    expect(io.stderr).toEqual([]);
  });

  it('creates the project under --dir', async () => {
    fs.mkdirSync(path.join(tmpDir, 'games'));
    const io = fakeIO(tmpDir);

    expect(await run(argv('--dir', 'games', 'arcade'), io)).toBe(0);
    expect(fs.existsSync(path.join(tmpDir, 'games', 'arcade', 'manifest.json'))).toBe(true);
    expect(io.stdout.join('')).toContain('   1. cd games/arcade');
  });

  it('writes nothing on --dry-run', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--dry-run', 'my-game'), io)).toBe(0);
    expect(fs.existsSync(path.join(tmpDir, 'my-game'))).toBe(false);
    const out = io.stdout.join('');
    expect(out).toContain('🔍 Dry run: nothing was written');
    expect(out).toContain('Would create 13 directories and 26 files:');
  });

  it('prints a JSON report with --json', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--json', 'My Game'), io)).toBe(0);
    const report: unknown = JSON.parse(io.stdout.join(''));
    expect(report).toMatchObject({
      displayName: 'My Game',
      canonicalName: 'my-game',
      rootDir: path.join(tmpDir, 'my-game'),
      dryRun: false,
      result: { requested: 26, created: 26, failures: [], success: true },
    });
  });

  it('refuses an existing project folder', async () => {
    const existing = path.join(tmpDir, 'my-game');
    fs.mkdirSync(existing);
    fs.writeFileSync(path.join(existing, 'keep.txt'), 'mine');
    const io = fakeIO(tmpDir);

    expect(await run(argv('my-game'), io)).toBe(1);
    expect(io.stderr.join('')).toBe(
      `\n❌ Destination already exists: ${existing}\n` +
        '   Choose a different name or remove the existing folder.\n',
    );
    expect(fs.readdirSync(existing)).toEqual(['keep.txt']);
  });

  it('rejects a name with nothing usable in it', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('!!!'), io)).toBe(1);
    expect(io.stderr.join('')).toBe('\n❌ Project name "!!!" has no letters or numbers left after sanitizing\n');
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('applies --max-length', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--max-length', '5', 'abcdef'), io)).toBe(1);
    expect(io.stderr.join('')).toBe('\n❌ Project name too long (6 characters, max 5)\n');
  });

  it('rejects a non-numeric --max-length', async () => {
    const io = fakeIO(tmpDir);

    expect(await run(argv('--max-length', 'abc', 'my-game'), io)).toBe(1);
    expect(io.stderr.join('')).toContain('Must be a positive integer.');
  });

  it('reads the naming limits from the workspace config', async () => {
    fs.writeFileSync(path.join(tmpDir, WORKSPACE_CONFIG_FILE), 'naming:\n  maxLength: 4\n');
    const io = fakeIO(tmpDir);

    expect(await run(argv('abcdef'), io)).toBe(1);
    expect(io.stderr.join('')).toBe('\n❌ Project name too long (6 characters, max 4)\n');
  });

  describe('without a name argument', () => {
    it('reads the name from piped stdin', async () => {
      const io = fakeIO(tmpDir, ['Piped Game']);

      expect(await run(argv(), io)).toBe(0);
      expect(io.questions).toEqual(['Enter project name: ']);
      expect(fs.existsSync(path.join(tmpDir, 'piped-game', 'index.html'))).toBe(true);
      expect(io.stderr).toEqual([]);
    });

    it('does not ask again when piped input is invalid', async () => {
      const io = fakeIO(tmpDir, ['!!!', 'never-read']);

      expect(await run(argv(), io)).toBe(1);
      expect(io.questions).toHaveLength(1);
      expect(io.stderr.join('')).toBe('\n❌ Project name "!!!" has no letters or numbers left after sanitizing\n');
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('treats empty piped stdin as cancel', async () => {
      const io = fakeIO(tmpDir, [null]);

      expect(await run(argv(), io)).toBe(0);
      expect(io.stdout.join('')).toBe('\n👋 Cancelled\n');
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('prompts for the name when interactive', async () => {
      const io = fakeIO(tmpDir, ['Prompted Game'], true);

      expect(await run(argv(), io)).toBe(0);
      expect(io.questions).toEqual(['Enter project name: ']);
      expect(fs.existsSync(path.join(tmpDir, 'prompted-game', 'index.html'))).toBe(true);
    });

    it('asks again after an invalid name', async () => {
      const io = fakeIO(tmpDir, ['   ', '???', 'Second Try'], true);

      expect(await run(argv(), io)).toBe(0);
      expect(io.questions).toHaveLength(3);
      expect(io.stderr).toEqual([
        '❌ Project name cannot be empty\n',
        '❌ Project name "???" has no letters or numbers left after sanitizing\n',
      ]);
      expect(fs.existsSync(path.join(tmpDir, 'second-try'))).toBe(true);
    });

    it('exits cleanly when the prompt is cancelled', async () => {
      const io = fakeIO(tmpDir, [null], true);

      expect(await run(argv(), io)).toBe(0);
      expect(io.stdout.join('')).toContain('👋 Cancelled');
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });
  });
});
