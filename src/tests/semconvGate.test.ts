import { describe, it, expect } from 'vitest';
import { SemconvGate } from '../core/SemconvGate.ts';
import { ConfigError } from '../util/errors.ts';
import type { Verdict } from '../types/schema.ts';
import { gauge, payload, testCatalog, captureLogger, linesWithMsg } from './helpers.ts';

describe('SemconvGate builder', () => {
  it('build() throws if catalog() was not called', () => {
    expect(() => new SemconvGate().build()).toThrow(ConfigError);
  });

  it('refuses to build with an invalid pattern', () => {
    const builder = new SemconvGate().catalog(testCatalog()).metrics([{ match: '(' }]);
    expect(() => builder.build()).toThrow(/Invalid metric match pattern/);
  });

  it('refuses to build with an unknown resource group', () => {
    const builder = new SemconvGate().catalog(testCatalog()).resource({ groups: ['nope'] });
    expect(() => builder.build()).toThrow('Unknown semconv group: nope');
  });

  it('accumulates metric rules across calls', () => {
    const gate = new SemconvGate()
      .catalog(testCatalog())
      .metrics([{ match: '^a' }])
      .metrics([{ match: '^b', groups: ['http'] }])
      .build();
    expect(gate.table.map((r) => r.pattern)).toEqual(['^a', '^b']);
  });

  it('does not share state with the builder after build()', () => {
    const builder = new SemconvGate().catalog(testCatalog()).metrics([{ match: '^a' }]);
    const gate = builder.build();
    builder.metrics([{ match: '^b' }]);
    expect(gate.table).toHaveLength(1);
  });
});

describe('BuiltSemconvGate', () => {
  function build(reportUnmatched = false) {
    const { logger, lines } = captureLogger();
    const gate = new SemconvGate()
      .catalog(testCatalog())
      .resource({ groups: ['service'] })
      .metrics([{ match: '^http\\.', groups: ['http'] }])
      .reportUnmatched(reportUnmatched)
      .logger(logger)
      .build();
    return { gate, lines };
  }

  it('ingest(payload).push() checks an export call', async () => {
    const { gate } = build();
    const result = await gate.ingest(payload([gauge('http.x', ['http.method'])])).push();
    expect(result.status).toBe(400);
    expect(result.verdict).toEqual({ violationCount: 1, implicatedScopes: ['test-scope'] });
  });

  it('passes reportUnmatched and the logger through', async () => {
    const { gate, lines } = build(true);
    await gate.ingest(payload([gauge('db.x', [])])).push();
    expect(linesWithMsg(lines, 'unmatched metric')).toHaveLength(1);
  });

  it('onVerdict observes each call until unsubscribed', async () => {
    const { gate } = build();
    const seen: Verdict[] = [];
    const off = gate.onVerdict((v) => seen.push(v));
    await gate.ingest(payload([])).push();
    off();
    await gate.ingest(payload([gauge('http.x', [])])).push();
    expect(seen).toEqual([{ violationCount: 0, implicatedScopes: [] }]);
  });

  it('handler() serves the configured path', async () => {
    const { gate } = build();
    const handler = gate.handler('/custom');
    const res = await handler(
      new Request('http://localhost/custom', {
        method: 'POST',
        body: JSON.stringify(payload([])),
        headers: { 'Content-Type': 'application/json' },
      })
    );
    expect(res.status).toBe(200);
    expect((await handler(new Request('http://localhost/v1/metrics', { method: 'POST' }))).status).toBe(404);
  });

  it('exposes the expected schema version', () => {
    const { gate } = build();
    expect(gate.resourceSchema.expectedVersion).toBe('https://example.com/schemas/1.0.0');
  });
});
