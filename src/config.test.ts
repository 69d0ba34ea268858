import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  CallbackRegistry,
  MiddlewareRegistry,
  configure,
  getConfiguration,
  loadConfiguration,
  resetConfiguration,
} from './config.js';
import { RuntimeMiddleware } from './middleware/index.js';

describe('Configuration', () => {
  describe('loadConfiguration', () => {
    it('should apply defaults', () => {
      const config = loadConfiguration({ JWT_SECRET: 'test-secret' });

      expect(config).toMatchObject({
        port: 3000,
        databasePath: './data/storefront.db',
        jwtSecret: 'test-secret',
        lockTimeoutMs: 5000,
        checkoutTimeoutMs: 15000,
        deliveryTimeoutMs: 2000,
        keepAliveMs: 30000,
        logLevel: 'info',
        logFormat: 'json',
        seedDemoData: false,
      });
    });

    it('should coerce environment strings', () => {
      const config = loadConfiguration({
        JWT_SECRET: 'test-secret',
        PORT: '8080',
        LOCK_TIMEOUT_MS: '250',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'line',
        SEED_DEMO_DATA: 'yes',
      });

      expect(config.port).toBe(8080);
      expect(config.lockTimeoutMs).toBe(250);
      expect(config.logLevel).toBe('debug');
      expect(config.logFormat).toBe('line');
      expect(config.seedDemoData).toBe(true);
    });

    it('should require a token secret outside tests', () => {
      expect(() => loadConfiguration({})).toThrow(ZodError);
    });

    it('should fall back to the placeholder secret under NODE_ENV=test', () => {
      expect(loadConfiguration({ NODE_ENV: 'test' }).jwtSecret).toBe('test-secret');
    });

    it('should reject malformed values', () => {
      expect(() => loadConfiguration({ JWT_SECRET: 'test-secret', LOCK_TIMEOUT_MS: '-5' })).toThrow(ZodError);
      expect(() => loadConfiguration({ JWT_SECRET: 'test-secret', LOG_LEVEL: 'verbose' })).toThrow(ZodError);
    });
  });

  it('should mutate and reset the global configuration', () => {
    configure((config) => {
      config.lockTimeoutMs = 10;
    });
    expect(getConfiguration().lockTimeoutMs).toBe(10);

    resetConfiguration();
    expect(getConfiguration().lockTimeoutMs).toBe(5000);
  });

  describe('MiddlewareRegistry', () => {
    it('should register and deregister', () => {
      const registry = new MiddlewareRegistry();
      registry.register(RuntimeMiddleware);

      expect(registry.registry).toEqual([RuntimeMiddleware]);
      expect(registry.deregister(RuntimeMiddleware)).toBe(true);
      expect(registry.deregister(RuntimeMiddleware)).toBe(false);
      expect(registry.registry).toEqual([]);
    });
  });

  describe('CallbackRegistry', () => {
    it('should keep callbacks per type', () => {
      const registry = new CallbackRegistry();
      const callback = (): void => {};
      registry.register('onFailed', callback);

      expect(registry.get('onFailed')).toEqual([callback]);
      expect(registry.get('onSuccess')).toEqual([]);
      expect(registry.deregister('onFailed', callback)).toBe(true);
      expect(registry.deregister('onSuccess', callback)).toBe(false);
    });
  });
});
