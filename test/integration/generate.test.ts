import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { generateProject } from '../../src/scaffold/generator.js';
import { buildScaffoldPlan } from '../../src/templates/registry.js';
import { DestinationExistsError } from '../../src/core/errors.js';

const logger = pino({ level: 'silent' });

function listFiles(root: string, prefix = ''): string[] {
  const entries = fs.readdirSync(path.join(root, prefix), { withFileTypes: true });
  return entries.flatMap(entry => {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    return entry.isDirectory() ? listFiles(root, rel) : [rel];
  });
}

describe('generateProject on disk', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pwa-game-gen-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes exactly the planned files with their rendered content', () => {
    const report = generateProject('Test Game', { parentDir: tmpDir, logger });
    const root = path.join(tmpDir, 'test-game');
    const plan = buildScaffoldPlan('Test Game', 'test-game');

    expect(report.rootDir).toBe(root);
    expect(listFiles(root).sort()).toEqual([...plan.files.keys(), ...plan.auxiliary.keys()].sort());

    for (const [rel, content] of [...plan.files, ...plan.auxiliary]) {
      const onDisk = fs.readFileSync(path.join(root, rel));
      if (typeof content === 'string') {
        expect(onDisk.toString('utf-8')).toBe(content);
      } else {
        expect([...onDisk]).toEqual([...content]);
      }
    }
  });

  it('creates the empty asset directories', () => {
    generateProject('Test Game', { parentDir: tmpDir, logger });

    for (const dir of ['audio', 'textures', 'models', 'shaders']) {
      const full = path.join(tmpDir, 'test-game', 'assets', dir);
      expect(fs.statSync(full).isDirectory()).toBe(true);
      expect(fs.readdirSync(full)).toEqual([]);
    }
  });

  it('leaves an existing project untouched on a second run', () => {
    generateProject('Test Game', { parentDir: tmpDir, logger });
    const readme = path.join(tmpDir, 'test-game', 'README.md');
    fs.writeFileSync(readme, 'edited');

    expect(() => generateProject('TEST GAME', { parentDir: tmpDir, logger })).toThrow(DestinationExistsError);
    expect(fs.readFileSync(readme, 'utf-8')).toBe('edited');
  });

  it('treats an existing file with the project name as a conflict', () => {
    fs.writeFileSync(path.join(tmpDir, 'test-game'), 'not a folder');

    expect(() => generateProject('test-game', { parentDir: tmpDir, logger })).toThrow(DestinationExistsError);
  });
});
