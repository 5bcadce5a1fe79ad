/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  readFile,
  writeFile,
  appendFile,
  copyFile,
  fileExists,
  isDirectory,
  ensureDir,
  listDir,
  globFiles,
  chmod,
  isWithin,
} from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `service-wizard-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents', async () => {
      const filePath = join(tempDir, 'test.txt');
      writeFileSync(filePath, 'Hello, World!');

      expect(await readFile(filePath)).toBe('Hello, World!');
    });

    it('should throw for non-existent file', async () => {
      await expect(readFile(join(tempDir, 'nonexistent.txt'))).rejects.toThrow();
    });
  });

  describe('writeFile', () => {
    it('should create parent directories', async () => {
      const filePath = join(tempDir, 'a', 'b', 'output.txt');

      await writeFile(filePath, 'Written content');

      expect(readFileSync(filePath, 'utf-8')).toBe('Written content');
    });
  });

  describe('appendFile', () => {
    it('should append to an existing file', async () => {
      const filePath = join(tempDir, 'notes.txt');
      writeFileSync(filePath, 'one\n');

      await appendFile(filePath, 'two\n');

      expect(readFileSync(filePath, 'utf-8')).toBe('one\ntwo\n');
    });

    it('should create a missing file', async () => {
      const filePath = join(tempDir, 'nested', 'new.txt');

      await appendFile(filePath, 'first');

      expect(readFileSync(filePath, 'utf-8')).toBe('first');
    });
  });

  describe('copyFile', () => {
    it('should copy bytes unchanged', async () => {
      const source = join(tempDir, 'logo.png');
      writeFileSync(source, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]));

      await copyFile(source, join(tempDir, 'out', 'logo.png'));

      expect([...readFileSync(join(tempDir, 'out', 'logo.png'))]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]);
    });
  });

  describe('fileExists / isDirectory', () => {
    it('should report existing files and directories', async () => {
      writeFileSync(join(tempDir, 'file.txt'), '');

      expect(await fileExists(join(tempDir, 'file.txt'))).toBe(true);
      expect(await fileExists(tempDir)).toBe(true);
      expect(await isDirectory(tempDir)).toBe(true);
      expect(await isDirectory(join(tempDir, 'file.txt'))).toBe(false);
    });

    it('should report missing paths', async () => {
      expect(await fileExists(join(tempDir, 'missing'))).toBe(false);
      expect(await isDirectory(join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should create nested directories and tolerate existing ones', async () => {
      const dir = join(tempDir, 'x', 'y');

      await ensureDir(dir);
      await ensureDir(dir);

      expect(existsSync(dir)).toBe(true);
    });
  });

  describe('listDir', () => {
    it('should return entries sorted by name with their kind', async () => {
      writeFileSync(join(tempDir, 'b.txt'), '');
      writeFileSync(join(tempDir, '.hidden'), '');
      mkdirSync(join(tempDir, 'a'));

      expect(await listDir(tempDir)).toEqual([
        { name: '.hidden', isDirectory: false },
        { name: 'a', isDirectory: true },
        { name: 'b.txt', isDirectory: false },
      ]);
    });
  });

  describe('globFiles', () => {
    it('should match dotfiles and nested files relative to cwd', async () => {
      mkdirSync(join(tempDir, 'scripts'));
      writeFileSync(join(tempDir, 'run.sh'), '');
      writeFileSync(join(tempDir, 'scripts', '.setup.sh'), '');
      writeFileSync(join(tempDir, 'README.md'), '');

      const files = await globFiles('**/*.sh', { cwd: tempDir, absolute: false });

      expect(files.sort()).toEqual(['run.sh', 'scripts/.setup.sh']);
    });
  });

  describe('chmod', () => {
    it.skipIf(process.platform === 'win32')('should set permission bits', async () => {
      const filePath = join(tempDir, 'run.sh');
      writeFileSync(filePath, '#!/bin/bash\n');

      await chmod(filePath, 0o755);

      expect(statSync(filePath).mode & 0o777).toBe(0o755);
    });
  });

  describe('isWithin', () => {
    it('should accept the root and paths below it', () => {
      expect(isWithin('/work/app', '/work/app')).toBe(true);
      expect(isWithin('/work/app', '/work/app/src/index.ts')).toBe(true);
    });

    it('should reject paths outside the root', () => {
      expect(isWithin('/work/app', '/work/other')).toBe(false);
      expect(isWithin('/work/app', '/work/app/../secrets')).toBe(false);
    });
  });
});
