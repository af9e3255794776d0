import { describe, it, expect } from 'vitest';
import { PinoLoggerFactory, createRootLogger } from '../../../src/core/logging/index.js';
import { loadConfig } from '../../../src/config/app-config.js';

describe('PinoLoggerFactory', () => {
  it('uses the configured level', () => {
    const factory = new PinoLoggerFactory(loadConfig({ env: { BTCADDR_LOG_LEVEL: 'warn' } })._unsafeUnwrap());
    expect(factory.root.level).toBe('warn');
    expect(factory.create('classifier').level).toBe('warn');
  });

  it('binds the component name on child loggers', () => {
    const factory = new PinoLoggerFactory(loadConfig({ env: {} })._unsafeUnwrap());
    expect(factory.create('check-file').bindings()).toMatchObject({ app: 'btc-address', component: 'check-file' });
  });
});

describe('createRootLogger', () => {
  it('logs nothing at level silent', () => {
    expect(createRootLogger('silent').isLevelEnabled('fatal')).toBe(false);
  });
});
