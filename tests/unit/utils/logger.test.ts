/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  describe('levels', () => {
    it('should hide debug output at the default level', () => {
      const log = new Logger();

      log.debug('walking templates');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should print debug output and its data at debug level', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('applied docker', { files: ['Dockerfile'] });

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, expect.stringContaining('[DEBUG] applied docker'));
    });

    it('should hide success messages at warn level but keep warnings', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.success('created');
      log.warn('script not executable');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] script not executable'));
    });

    it('should print nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.success('created');
      log.warn('careful');
      log.error('broken');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    it('should write to stderr', () => {
      new Logger().error('Template not found: /tmp/base');

      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] Template not found: /tmp/base'));
    });
  });

  describe('success', () => {
    it('should mark the message with a checkmark', () => {
      new Logger().success('done');

      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('✓ done'));
    });
  });

  describe('child', () => {
    it('should join nested prefixes', () => {
      const child = new Logger().child('render').child('walk');

      child.warn('skipped');

      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[render:walk] skipped'));
    });

    it('should follow parent level changes made after creation', () => {
      const log = new Logger();
      const child = log.child('features');

      log.setLevel('error');
      child.warn('hidden');
      expect(consoleSpy.warn).not.toHaveBeenCalled();

      log.setLevel('debug');
      child.debug('shown');
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] [features] shown'));
    });

    it('should keep its own level once set', () => {
      const log = new Logger();
      const child = log.child('features');
      child.setLevel('error');

      log.setLevel('debug');

      expect(child.getLevel()).toBe('error');
    });
  });

  describe('getLevel', () => {
    it('should default to info', () => {
      expect(new Logger().getLevel()).toBe('info');
    });
  });

  describe('singleton', () => {
    it('should export singleton logger instance', () => {
      expect(logger).toBeInstanceOf(Logger);
    });
  });
});
