import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { loadConfig, parseConfig, parseConfigYaml } from '../config/loader.ts';
import { ConfigError } from '../util/errors.ts';

describe('Config Loader', () => {
  describe('parseConfig', () => {
    it('fills every default for an empty document', () => {
      expect(parseConfig(null)).toEqual({
        server: { host: '0.0.0.0', port: 4318, path: '/v1/metrics' },
        log: { level: 'info' },
        semconv: {},
        resource: { groups: [], ignore: [] },
        metrics: [],
        reportUnmatched: false,
        oneShot: false,
      });
    });

    it('keeps configured rules in order with defaulted lists', () => {
      const config = parseConfig({
        resource: { groups: ['service'] },
        metrics: [
          { match: '^http\\.', groups: ['http'], ignore: ['error.type'] },
          { match: '^db\\.' },
        ],
        reportUnmatched: true,
        oneShot: true,
      });
      expect(config.resource).toEqual({ groups: ['service'], ignore: [] });
      expect(config.metrics).toEqual([
        { match: '^http\\.', groups: ['http'], ignore: ['error.type'] },
        { match: '^db\\.', groups: [], ignore: [] },
      ]);
      expect(config.reportUnmatched).toBe(true);
      expect(config.oneShot).toBe(true);
    });

    it('lists every invalid field in one ConfigError', () => {
      try {
        parseConfig({ server: { port: 70000 }, metrics: [{ groups: ['x'] }], oneShot: 'yes' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (!(err instanceof ConfigError)) return;
        expect(err.code).toBe('INVALID_CONFIG');
        expect(err.message).toContain('server.port: must be <= 65535');
        expect(err.message).toContain('metrics.0.match');
        expect(err.message).toContain('oneShot');
      }
    });
  });

  describe('parseConfigYaml', () => {
    it('parses YAML', () => {
      const config = parseConfigYaml(
        yaml.dump({ metrics: [{ match: 'x', groups: ['g'] }], log: { level: 'debug' } })
      );
      expect(config.metrics).toEqual([{ match: 'x', groups: ['g'], ignore: [] }]);
      expect(config.log.level).toBe('debug');
    });

    it('rejects malformed YAML', () => {
      expect(() => parseConfigYaml('metrics: [unclosed')).toThrow(ConfigError);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'semconv-gate-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('resolves a relative registry against the config directory', () => {
      const path = join(dir, 'gate.yaml');
      writeFileSync(path, yaml.dump({ semconv: { registry: 'registry.yaml', schemaUrl: 'test-url' } }));
      const config = loadConfig(path);
      expect(config.semconv).toEqual({ registry: join(dir, 'registry.yaml'), schemaUrl: 'test-url' });
    });

    it('keeps an absolute registry path', () => {
      const path = join(dir, 'gate.yaml');
      writeFileSync(path, yaml.dump({ semconv: { registry: '/etc/semconv/registry.yaml' } }));
      expect(loadConfig(path).semconv.registry).toBe('/etc/semconv/registry.yaml');
    });

    it('throws ConfigError for a missing file', () => {
      expect(() => loadConfig(join(dir, 'missing.yaml'))).toThrow(ConfigError);
    });
  });
});
