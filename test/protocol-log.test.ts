import { describe, expect, it } from 'vitest';
import { ProtocolLogger, toLogData } from '../src/protocol-log.js';
import { formatLogSummary } from '../src/output.js';

describe('ProtocolLogger', () => {
  it('records requests and responses in order with durations', () => {
    const log = new ProtocolLogger();
    const request = log.logRequest('tools/list');
    log.logResponse('tools/list', { tools: [] }, request);

    const [req, res] = log.getEntries();
    expect(req).toMatchObject({ direction: 'request', method: 'tools/list', data: {} });
    expect(req?.durationMs).toBeUndefined();
    expect(res).toMatchObject({ direction: 'response', method: 'tools/list', data: { tools: [] } });
    expect(res?.durationMs).toBeGreaterThanOrEqual(0);
    expect(Object.isFrozen(res)).toBe(true);
  });

  it('stores its own frozen copy of the data', () => {
    const log = new ProtocolLogger();
    const params = { name: 'add', arguments: { a: 5, b: 3 } };
    const result = { content: [{ type: 'text', text: '8' }] };
    log.logResponse('tools/call', result, log.logRequest('tools/call', params));
    params.arguments.a = 99;
    result.content.push({ type: 'text', text: 'late' });

    const [request, response] = log.getEntries();
    expect(request?.data).toEqual({ name: 'add', arguments: { a: 5, b: 3 } });
    expect(response?.data).toEqual({ content: [{ type: 'text', text: '8' }] });
    expect(Object.isFrozen(request?.data)).toBe(true);
    expect(Object.isFrozen(response?.data.content)).toBe(true);
  });

  it('leaves the duration unset for responses without a request', () => {
    const log = new ProtocolLogger();
    expect(log.logResponse('initialize', { protocolVersion: '2025-06-18' }).durationMs).toBeUndefined();
  });

  it('filters by direction and method and keeps the newest entries under a limit', () => {
    const log = new ProtocolLogger();
    for (const method of ['a', 'b', 'c']) log.logResponse(method, {}, log.logRequest(method));
    log.logNotification('notifications/message', { level: 'info' });

    expect(log.getEntries({ direction: 'request' }).map((e) => e.method)).toEqual(['a', 'b', 'c']);
    expect(log.getEntries({ method: 'b' }).map((e) => e.direction)).toEqual(['request', 'response']);
    expect(log.getEntries({ limit: 2 }).map((e) => `${e.direction}:${e.method}`)).toEqual(['response:c', 'notification:notifications/message']);
    expect(log.getEntries({ limit: 7 })).toEqual(log.getEntries());
    expect(log.getEntries({ limit: 50 })).toHaveLength(7);
    expect(log.getEntries({ limit: 0 })).toEqual([]);
    expect(log.getEntries({ limit: -1 })).toEqual([]);
  });

  it('exports JSON with nulls for absent fields', () => {
    const log = new ProtocolLogger();
    const request = log.logRequest('tools/call', { name: 'add' });
    log.logResponse('tools/call', {}, request, 'boom');

    const exported: unknown = JSON.parse(log.exportJson());
    expect(exported).toMatchObject([
      { direction: 'request', method: 'tools/call', data: { name: 'add' }, durationMs: null, error: null },
      { direction: 'response', method: 'tools/call', data: {}, error: 'boom' }
    ]);
    expect(JSON.parse(new ProtocolLogger().exportJson())).toEqual([]);
  });

  it('exports every entry in order', () => {
    const log = new ProtocolLogger();
    log.logResponse('initialize', { protocolVersion: '2025-06-18' });
    log.logResponse('tools/list', { tools: [] }, log.logRequest('tools/list'));
    log.logNotification('notifications/tools/list_changed');
    log.logResponse('ping', { success: false }, log.logRequest('ping'), 'timed out');

    const exported: unknown = JSON.parse(log.exportJson());
    const expected = log.getEntries().map((entry) => ({ method: entry.method, direction: entry.direction }));
    expect(Array.isArray(exported) ? exported.map((entry: { method: string; direction: string }) => ({ method: entry.method, direction: entry.direction })) : []).toEqual(expected);
    expect(expected).toHaveLength(6);
  });

  it('summarizes entries as rows', () => {
    const log = new ProtocolLogger();
    log.logRequest('ping');
    log.logResponse('ping', {}, undefined, 'timed out');
    const rows = log.summarize();
    expect(rows).toMatchObject([
      { direction: 'request', method: 'ping', durationMs: '-', status: 'OK' },
      { direction: 'response', method: 'ping', durationMs: '-', status: 'ERROR' }
    ]);
    expect(rows[0]?.time).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3}$/);
    expect(formatLogSummary(rows).split('\n')[0]).toBe('time\tdirection\tmethod\tdurationMs\tstatus');
  });

  it('clears entries', () => {
    const log = new ProtocolLogger();
    log.logRequest('ping');
    log.clear();
    expect(log.size).toBe(0);
    expect(log.getEntries()).toEqual([]);
  });
});

describe('toLogData', () => {
  it('keeps plain objects', () => {
    expect(toLogData({ a: 1 })).toEqual({ a: 1 });
  });

  it('dumps serializable values', () => {
    expect(toLogData({ toJSON: () => ({ dumped: true }) })).toEqual({ dumped: true });
  });

  it('wraps anything else', () => {
    expect(toLogData('text')).toEqual({ result: 'text' });
    expect(toLogData(42)).toEqual({ result: '42' });
    expect(toLogData(null)).toEqual({ result: 'null' });
    expect(toLogData(undefined)).toEqual({ result: 'undefined' });
  });
});
