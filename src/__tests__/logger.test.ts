import { afterEach, describe, expect, it } from 'vitest';
import { createLogger, logger, setLogLevel } from '../logger.js';

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('reaches child loggers created before the change', () => {
    const child = createLogger({ component: 'pacer' });

    setLogLevel('warn');

    expect(logger.level).toBe('warn');
    expect(child.level).toBe('warn');
    expect(child.isLevelEnabled('info')).toBe(false);
    expect(child.isLevelEnabled('error')).toBe(true);
  });
});
