import os from 'os';
import { loadConfig, parseDependencies, parseTrustProxy, DEFAULT_DEPENDENCIES } from './index';
import { ConfigError } from '../utils/errors';

describe('parseDependencies', () => {
  it('should use the default dependency set when unset or blank', () => {
    expect(parseDependencies(undefined)).toEqual(['httpd', 'rabbitmq', 'postgresql']);
    expect(parseDependencies('   ')).toEqual([...DEFAULT_DEPENDENCIES]);
  });

  it('should split, trim and keep order', () => {
    expect(parseDependencies(' nginx , redis,mysql ')).toEqual(['nginx', 'redis', 'mysql']);
  });

  it('should reject a list with no names', () => {
    expect(() => parseDependencies(',, ,')).toThrow('DEPENDENCIES: must name at least one service');
  });

  it('should reject duplicate names', () => {
    expect(() => parseDependencies('redis,nginx,redis')).toThrow('DEPENDENCIES: duplicate service "redis"');
  });
});

describe('parseTrustProxy', () => {
  it('should disable trust for unset, empty and "false"', () => {
    expect(parseTrustProxy(undefined)).toBe(false);
    expect(parseTrustProxy('')).toBe(false);
    expect(parseTrustProxy('false')).toBe(false);
  });

  it('should trust every hop for "true"', () => {
    expect(parseTrustProxy('true')).toBe(true);
  });

  it('should read a hop count', () => {
    expect(parseTrustProxy('0')).toBe(0);
    expect(parseTrustProxy('2')).toBe(2);
  });

  it('should pass addresses through', () => {
    expect(parseTrustProxy('loopback')).toBe('loopback');
    expect(parseTrustProxy('10.0.0.0/8, 192.168.1.1')).toBe('10.0.0.0/8, 192.168.1.1');
  });
});

describe('loadConfig', () => {
  it('should fill defaults from an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.host).toBe('0.0.0.0');
    expect(config.databasePath).toBe('data/statuswatch.sqlite');
    expect(config.applicationName).toBe('rbcapp1');
    expect(config.dependencies).toEqual(['httpd', 'rabbitmq', 'postgresql']);
    expect(config.monitorHost).toBe(os.hostname());
    expect(config.checkIntervalMs).toBe(60000);
    expect(config.probeTimeoutMs).toBe(10000);
    expect(config.cycleTimeoutMs).toBe(30000);
    expect(config.statusFileDir).toBe('data/status');
    expect(config.corsOrigin).toBeUndefined();
    expect(config.trustProxy).toBe(false);
    expect(config.rateLimit).toEqual({ windowMs: 900000, max: 300 });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      APP_NAME: 'shop',
      DEPENDENCIES: 'nginx,redis',
      MONITOR_HOST: 'web-01',
      PROBE_TIMEOUT_MS: '250',
      CORS_ORIGIN: 'http://localhost:5173',
    });

    expect(config.port).toBe(8080);
    expect(config.applicationName).toBe('shop');
    expect(config.dependencies).toEqual(['nginx', 'redis']);
    expect(config.monitorHost).toBe('web-01');
    expect(config.probeTimeoutMs).toBe(250);
    expect(config.corsOrigin).toBe('http://localhost:5173');
  });

  it('should return a frozen value', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.dependencies)).toBe(true);
    expect(Object.isFrozen(config.rateLimit)).toBe(true);
  });

  it('should reject non-integer numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ CHECK_INTERVAL_MS: '10' })).toThrow(
      'CHECK_INTERVAL_MS: must be an integer >= 1000, got "10"'
    );
  });

  it('should reject the application name in its own dependency set', () => {
    expect(() => loadConfig({ APP_NAME: 'shop', DEPENDENCIES: 'nginx,shop' })).toThrow(
      'DEPENDENCIES: must not include the application name "shop"'
    );
  });
});
