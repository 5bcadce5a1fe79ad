/**
 * Tests for the features command.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { runFeatures } from '../../../../src/cli/commands/features.js';

describe('runFeatures', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the bundled features as JSON in application order', async () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runFeatures({ json: true });

    expect(consoleLog).toHaveBeenCalledTimes(1);
    const listed: unknown = JSON.parse(String(consoleLog.mock.calls[0]?.[0]));
    expect(listed).toMatchObject([
      { name: 'docker', subtree: 'docker' },
      { name: 'ci', subtree: 'ci' },
      { name: 'docker_registry', requires: ['docker', 'ci'] },
      { name: 'swagger', description: 'OpenAPI schema and Swagger UI served under /docs/' },
    ]);
  });

  it('should print one line per feature', async () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runFeatures({});

    const lines = consoleLog.mock.calls.map((call) => String(call[0]));
    expect(lines.filter((line) => line.includes('requires: docker, ci'))).toHaveLength(1);
    expect(lines.filter((line) => line.includes('appends:'))).toHaveLength(7);
  });
});
