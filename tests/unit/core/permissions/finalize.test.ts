/**
 * Tests for script permission finalization.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { finalizePermissions } from '../../../../src/core/permissions/finalize.js';
import { chmod } from '../../../../src/utils/file-system.js';
import { logger } from '../../../../src/utils/logger.js';
import { makeTempDir, writeTree } from '../../../helpers/temp-dir.js';

vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/file-system.js')>();
  return { ...actual, chmod: vi.fn(actual.chmod) };
});

const settings = { executable_patterns: ['**/*.sh'], mode: 0o755 };

describe('finalizePermissions', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('permissions');
    await writeTree(tempDir, {
      'docker-entrypoint.sh': '#!/bin/sh\n',
      'scripts/run-tests.sh': '#!/bin/sh\n',
      'scripts/.hidden.sh': '#!/bin/sh\n',
      'manage.py': 'print()\n',
    });
    logger.setLevel('silent');
  });

  afterEach(async () => {
    logger.setLevel('info');
    vi.mocked(chmod).mockClear();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should mark matching scripts executable', async () => {
    const result = await finalizePermissions(tempDir, settings);

    expect(result).toEqual({
      executables: ['docker-entrypoint.sh', 'scripts/.hidden.sh', 'scripts/run-tests.sh'],
      warnings: [],
    });
    const mode = (await fs.stat(path.join(tempDir, 'scripts/run-tests.sh'))).mode & 0o777;
    expect(mode).toBe(0o755);
  });

  it('should leave other files alone', async () => {
    await fs.chmod(path.join(tempDir, 'manage.py'), 0o644);

    await finalizePermissions(tempDir, settings);

    const mode = (await fs.stat(path.join(tempDir, 'manage.py'))).mode & 0o777;
    expect(mode).toBe(0o644);
  });

  it('should report a failed chmod as a warning and continue', async () => {
    vi.mocked(chmod).mockRejectedValueOnce(new Error('EPERM: operation not permitted'));

    const result = await finalizePermissions(tempDir, settings);

    expect(result.warnings).toEqual([
      { path: 'docker-entrypoint.sh', message: 'EPERM: operation not permitted' },
    ]);
    expect(result.executables).toEqual(['scripts/.hidden.sh', 'scripts/run-tests.sh']);
  });

  it('should do nothing without matches', async () => {
    const result = await finalizePermissions(tempDir, { executable_patterns: ['**/*.bash'], mode: 0o755 });

    expect(result).toEqual({ executables: [], warnings: [] });
    expect(chmod).not.toHaveBeenCalled();
  });
});
