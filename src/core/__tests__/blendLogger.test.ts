/**
 * World Distance Blend - Console Logger Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BlendConsoleLogger, blendLogger } from '../blendLogger';

describe('BlendConsoleLogger', () => {
  let logger: BlendConsoleLogger;

  beforeEach(() => {
    logger = new BlendConsoleLogger();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'table').mockImplementation(() => {});
  });

  it('is disabled by default', () => {
    logger.error('boom');
    logger.warn('careful');

    expect(console.error).not.toHaveBeenCalled();
    expect(console.warn).not.toHaveBeenCalled();
    expect(logger.isEnabled()).toBe(false);
  });

  it('the shared instance is disabled by default', () => {
    expect(blendLogger.isEnabled()).toBe(false);
  });

  describe('normal level', () => {
    beforeEach(() => {
      logger.setEnabled(true);
    });

    it('prefixes messages and passes extra arguments', () => {
      logger.info('weights', 2);

      expect(console.info).toHaveBeenCalledWith('[DistanceBlend] weights', 2);
    });

    it('suppresses verbose output and tables', () => {
      logger.verbose('detail');
      logger.table([{ a: 1 }]);

      expect(console.log).not.toHaveBeenCalled();
      expect(console.table).not.toHaveBeenCalled();
      expect(logger.isVerbose()).toBe(false);
    });
  });

  describe('verbose level', () => {
    beforeEach(() => {
      logger.setEnabled(true);
      logger.setLogLevel('verbose');
    });

    it('writes verbose output and tables', () => {
      logger.verbose('detail');
      logger.table([{ a: 1 }]);

      expect(console.log).toHaveBeenCalledWith('[DistanceBlend] detail');
      expect(console.table).toHaveBeenCalledWith([{ a: 1 }]);
      expect(logger.isVerbose()).toBe(true);
    });
  });

  describe('errors level', () => {
    beforeEach(() => {
      logger.setEnabled(true);
      logger.setLogLevel('errors');
    });

    it('suppresses info but keeps warnings and errors', () => {
      logger.info('hidden');
      logger.warn('careful');
      logger.error('boom');

      expect(console.info).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledWith('[DistanceBlend] careful');
      expect(console.error).toHaveBeenCalledWith('[DistanceBlend] boom');
      expect(logger.getLogLevel()).toBe('errors');
    });
  });

  it('uses a custom prefix', () => {
    const custom = new BlendConsoleLogger('[Fog]');
    custom.setEnabled(true);

    custom.warn('thick');

    expect(console.warn).toHaveBeenCalledWith('[Fog] thick');
  });
});
