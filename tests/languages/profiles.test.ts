import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  profileForFile,
  shouldFormatOnSave,
  resolveBufferSettings,
} from '../../src/languages/index.js';

describe('profileForFile', () => {
  it('should map C and C++ extensions to the cpp profile', () => {
    for (const file of ['a.c', 'b.cpp', 'c.h', 'd.hpp', 'e.cc', 'f.hh']) {
      expect(profileForFile(file)?.id).toBe('cpp');
    }
  });

  it('should map .go to the go profile', () => {
    expect(profileForFile('cmd/main.go')?.id).toBe('go');
  });

  it('should return null for other files', () => {
    expect(profileForFile('README.md')).toBeNull();
    expect(profileForFile('Makefile')).toBeNull();
  });
});

describe('shouldFormatOnSave', () => {
  it('should match C, C++ and Go sources in any directory', () => {
    expect(shouldFormatOnSave('src/engine/core.cpp')).toBe(true);
    expect(shouldFormatOnSave('include/api.hh')).toBe(true);
    expect(shouldFormatOnSave('main.go')).toBe(true);
  });

  it('should skip other files', () => {
    expect(shouldFormatOnSave('src/engine/core.cxx')).toBe(false);
    expect(shouldFormatOnSave('go.mod')).toBe(false);
  });
});

describe('resolveBufferSettings', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'stdscout-profiles-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should attach the detected standard to C++ buffers', async () => {
    await mkdir(join(testDir, 'src'));
    await writeFile(join(testDir, 'CMakeLists.txt'), 'set(CMAKE_CXX_STANDARD 17)\n');

    expect(resolveBufferSettings(join(testDir, 'src', 'main.cpp'), { stopAt: testDir })).toEqual({
      shiftwidth: 2,
      tabstop: 2,
      softtabstop: 2,
      expandtab: true,
      colorcolumn: '120',
      commentstring: '// %s',
      language: 'cpp',
      formatOnSave: true,
      cppStd: 'c++17',
    });
  });

  it('should use tabs for Go buffers', () => {
    expect(resolveBufferSettings(join(testDir, 'main.go'), { stopAt: testDir })).toEqual({
      shiftwidth: 8,
      tabstop: 8,
      softtabstop: 2,
      expandtab: false,
      colorcolumn: '120',
      language: 'go',
      formatOnSave: true,
    });
  });

  it('should fall back to the defaults for other files', () => {
    expect(resolveBufferSettings(join(testDir, 'notes.txt'))).toEqual({
      shiftwidth: 2,
      tabstop: 2,
      softtabstop: 2,
      expandtab: true,
      language: null,
      formatOnSave: false,
    });
  });
});
