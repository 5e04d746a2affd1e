import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it } from 'vitest';
import { HandshakeTap, connectTransport } from '../src/connection.js';
import { createSampleServer } from './fixtures/sample-server.js';

describe('HandshakeTap', () => {
  async function linkedTap() {
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    const notifications: Array<[string, Record<string, unknown>]> = [];
    const received: JSONRPCMessage[] = [];
    const tap = new HandshakeTap(clientSide, (method, params) => notifications.push([method, params]));
    tap.onmessage = (message) => received.push(message);
    serverSide.onmessage = () => undefined;
    await tap.start();
    await serverSide.start();
    return { tap, serverSide, notifications, received };
  }

  it('captures the initialize result', async () => {
    const { tap, serverSide, received } = await linkedTap();
    await tap.send({ jsonrpc: '2.0', id: 7, method: 'initialize', params: {} });
    await serverSide.send({ jsonrpc: '2.0', id: 3, result: { other: true } });
    await serverSide.send({ jsonrpc: '2.0', id: 7, result: { protocolVersion: '2025-06-18' } });
    expect(tap.initializeResult).toEqual({ protocolVersion: '2025-06-18' });
    expect(received).toHaveLength(2);
  });

  it('forwards notifications', async () => {
    const { serverSide, notifications, received } = await linkedTap();
    await serverSide.send({ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info', data: 'hi' } });
    expect(notifications).toEqual([['notifications/message', { level: 'info', data: 'hi' }]]);
    expect(received).toHaveLength(1);
  });
});

describe('connectTransport', () => {
  it('records the negotiated handshake', async () => {
    const server = createSampleServer();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const connection = await connectTransport(clientTransport, { clientName: 'test-client', clientVersion: '0.0.0', roots: [] });

    expect(connection.initializeResult.serverInfo).toEqual({ name: 'sample-server', version: '1.0.0' });
    expect(connection.initializeResult.instructions).toBe('Arithmetic and greetings.');
    expect(connection.initializeResult.raw).toMatchObject({ serverInfo: { name: 'sample-server' } });
    expect(connection.supports.has('roots')).toBe(false);
    expect((await connection.listTools()).map((tool) => tool.name)).toEqual(['add', 'greet']);
    await connection.close();
  });
});
