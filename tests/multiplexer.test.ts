import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CancelledError,
  ProtocolError,
  RemoteError,
  SessionClosedError,
  TimeoutError,
  WriteError,
} from '../src/rpc/errors.js';
import { RequestMultiplexer } from '../src/rpc/multiplexer.js';
import type { JsonRpcNotification } from '../src/rpc/types.js';
import { silentLogger } from '../src/utils/logger.js';
import { FakeTransport } from './helpers/fake-transport.js';

/**
 * Observe settlement without leaving a rejection unhandled
 */
function track(promise: Promise<unknown>) {
  const state = { settled: false };
  const outcome = promise.then(
    (value) => {
      state.settled = true;
      return { value, error: undefined };
    },
    (error: unknown) => {
      state.settled = true;
      return { value: undefined, error };
    },
  );
  return { state, outcome };
}

describe('RequestMultiplexer', () => {
  let transport: FakeTransport;
  let mux: RequestMultiplexer;

  beforeEach(() => {
    transport = new FakeTransport();
    mux = new RequestMultiplexer(transport, { logger: silentLogger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('request', () => {
    it('should send a JSON-RPC request and resolve with the result unmodified', async () => {
      const call = mux.request('tools/call', { name: 'echo', arguments: { text: 'hi' } });

      expect(transport.sent).toEqual([
        {
          jsonrpc: '2.0',
          id: 1,
          method: 'tools/call',
          params: { name: 'echo', arguments: { text: 'hi' } },
        },
      ]);

      const result = {
        content: [{ type: 'text', text: 'hi' }],
        isError: false,
        extra: { nested: [1, 2, 3] },
      };
      transport.deliver({ jsonrpc: '2.0', id: 1, result });

      await expect(call).resolves.toEqual(result);
      expect(mux.pendingCount).toBe(0);
    });

    it('should allocate increasing identifiers starting at 1', () => {
      void mux.request('a').catch(() => undefined);
      void mux.request('b').catch(() => undefined);
      void mux.request('c').catch(() => undefined);

      expect(transport.requests().map((request) => request.id)).toEqual([1, 2, 3]);
      mux.close();
    });

    it('should omit params when none are given', () => {
      void mux.request('tools/list').catch(() => undefined);

      expect(transport.sent[0]).toEqual({ jsonrpc: '2.0', id: 1, method: 'tools/list' });
      expect('params' in transport.sent[0]).toBe(false);
      mux.close();
    });

    it.each([3, 10, 100])('should route %i responses delivered in reverse order', async (count) => {
      const calls = Array.from({ length: count }, (_, i) => mux.request('tools/call', { n: i }));
      const requests = transport.requests();
      expect(requests).toHaveLength(count);

      for (const request of [...requests].reverse()) {
        transport.deliver({ jsonrpc: '2.0', id: request.id, result: { echoed: request.params } });
      }

      const results = await Promise.all(calls);
      results.forEach((result, i) => {
        expect(result).toEqual({ echoed: { n: i } });
      });
      expect(mux.pendingCount).toBe(0);
    });

    it('should refuse to send when the transport is not running', async () => {
      transport.state = 'not_started';

      await expect(mux.request('initialize')).rejects.toBeInstanceOf(SessionClosedError);
      expect(transport.sent).toHaveLength(0);
    });

    it('should reject with the write error and clear the entry when sending fails', async () => {
      transport.failWrites = new WriteError('Child process stdin is closed');

      await expect(mux.request('tools/call')).rejects.toThrow('Child process stdin is closed');
      expect(mux.pendingCount).toBe(0);
    });
  });

  describe('error responses', () => {
    it('should reject with RemoteError carrying code, message and data', async () => {
      const call = mux.request('tools/call', { name: 'missing' });
      transport.deliver({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32601, message: 'Method not found', data: { hint: 'none' } },
      });

      const error = await call.catch((err: unknown) => err);
      expect(error).toBeInstanceOf(RemoteError);
      if (error instanceof RemoteError) {
        expect(error.rpcCode).toBe(-32601);
        expect(error.message).toBe('Method not found');
        expect(error.method).toBe('tools/call');
        expect(error.data).toEqual({ hint: 'none' });
      }
    });

    it('should report an error without an id as a protocol error', () => {
      const protocolErrors: ProtocolError[] = [];
      mux.on('protocolError', (err: ProtocolError) => protocolErrors.push(err));

      transport.deliver({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });

      expect(protocolErrors).toHaveLength(1);
      expect(protocolErrors[0].message).toBe(
        'Peer reported an error without a request ID: Parse error (code: -32700)',
      );
    });

    it('should reject at once with ProtocolError when the answer is malformed', async () => {
      const call = mux.request('tools/call', { name: 'echo' });
      const other = track(mux.request('tools/list'));
      const payload = { jsonrpc: '2.0', id: 1, error: { code: -32000 } };

      transport.deliverInvalid(payload);

      const error = await call.catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('message', 'Malformed response to request 1 (method: tools/call)');
      expect(error).toHaveProperty('payload', payload);
      expect(mux.pendingCount).toBe(1);
      expect(other.state.settled).toBe(false);
      mux.close();
    });

    it('should reject an answer carrying neither result nor error', async () => {
      const call = mux.request('tools/list');

      transport.deliverInvalid({ jsonrpc: '2.0', id: 1 });

      await expect(call).rejects.toThrow('Malformed response to request 1 (method: tools/list)');
    });

    it('should leave pending requests alone for malformed lines aimed elsewhere', () => {
      const call = track(mux.request('tools/call'));

      transport.deliverInvalid({ jsonrpc: '2.0', id: 99, error: { code: -32000 } });
      transport.deliverInvalid({ jsonrpc: '2.0', id: 1, method: 42 });

      expect(call.state.settled).toBe(false);
      expect(mux.pendingCount).toBe(1);
      mux.close();
    });
  });

  describe('timeouts', () => {
    it('should not time out before the deadline and reject exactly at it', async () => {
      vi.useFakeTimers();
      const { state, outcome } = track(mux.request('tools/call', {}, { timeoutMs: 1000 }));

      await vi.advanceTimersByTimeAsync(999);
      expect(state.settled).toBe(false);
      expect(mux.pendingCount).toBe(1);

      await vi.advanceTimersByTimeAsync(1);
      const { error } = await outcome;
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toHaveProperty('message', 'Request 1 timed out after 1000ms (method: tools/call)');
      expect(mux.pendingCount).toBe(0);
    });

    it('should treat a response after the timeout as an orphan', async () => {
      vi.useFakeTimers();
      const protocolErrors: ProtocolError[] = [];
      mux.on('protocolError', (err: ProtocolError) => protocolErrors.push(err));
      const { outcome } = track(mux.request('slow', {}, { timeoutMs: 50 }));

      await vi.advanceTimersByTimeAsync(50);
      await outcome;
      transport.deliver({ jsonrpc: '2.0', id: 1, result: 'late' });

      expect(protocolErrors.map((err) => err.message)).toEqual([
        'Received response for unknown request ID: 1',
      ]);
    });

    it('should apply per-method timeouts over the default', async () => {
      vi.useFakeTimers();
      mux = new RequestMultiplexer(transport, {
        timeout: 5000,
        methodTimeouts: { 'tools/list': 100 },
        logger: silentLogger,
      });

      const list = track(mux.request('tools/list'));
      const call = track(mux.request('tools/call'));

      await vi.advanceTimersByTimeAsync(100);
      expect((await list.outcome).error).toBeInstanceOf(TimeoutError);
      expect(call.state.settled).toBe(false);

      await vi.advanceTimersByTimeAsync(4900);
      expect((await call.outcome).error).toBeInstanceOf(TimeoutError);
    });

    it('should not disturb other pending requests when one times out', async () => {
      vi.useFakeTimers();
      const short = track(mux.request('a', {}, { timeoutMs: 10 }));
      const long = mux.request('b', {}, { timeoutMs: 10000 });

      await vi.advanceTimersByTimeAsync(10);
      expect((await short.outcome).error).toBeInstanceOf(TimeoutError);

      transport.deliver({ jsonrpc: '2.0', id: 2, result: 'b-result' });
      await expect(long).resolves.toBe('b-result');
    });
  });

  describe('cancellation', () => {
    it('should reject with CancelledError when the signal aborts', async () => {
      const controller = new AbortController();
      const call = mux.request('tools/call', {}, { signal: controller.signal });

      controller.abort();

      await expect(call).rejects.toBeInstanceOf(CancelledError);
      expect(mux.pendingCount).toBe(0);
    });

    it('should not send a request whose signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        mux.request('tools/call', {}, { signal: controller.signal }),
      ).rejects.toThrow('Request cancelled before it was sent (method: tools/call)');
      expect(transport.sent).toHaveLength(0);
    });
  });

  describe('session end', () => {
    it('should reject every pending request with SessionClosedError', async () => {
      const calls = Array.from({ length: 5 }, (_, i) => mux.request('tools/call', { i }));
      const closed = new Promise((resolve) => mux.once('close', resolve));

      transport.end({ code: 1 });

      const outcomes = await Promise.allSettled(calls);
      for (const outcome of outcomes) {
        expect(outcome.status).toBe('rejected');
        if (outcome.status === 'rejected') {
          expect(outcome.reason).toBeInstanceOf(SessionClosedError);
        }
      }
      await expect(closed).resolves.toEqual({ code: 1, signal: null, expected: false });
      expect(mux.isClosed()).toBe(true);
    });

    it('should refuse new requests after the session ends', async () => {
      transport.end();

      await expect(mux.request('tools/list')).rejects.toThrow(
        'Cannot send tools/list: session is not running',
      );
    });

    it('should reject pending requests on close() and be idempotent', async () => {
      const call = mux.request('tools/call');

      mux.close();
      mux.close();

      await expect(call).rejects.toThrow('Session closed while awaiting response (method: tools/call)');
      expect(mux.isClosed()).toBe(true);
    });
  });

  describe('inbound traffic', () => {
    it('should report orphan responses without affecting pending requests', async () => {
      const protocolErrors: ProtocolError[] = [];
      mux.on('protocolError', (err: ProtocolError) => protocolErrors.push(err));
      const call = mux.request('tools/call');

      transport.deliver({ jsonrpc: '2.0', id: 99, result: {} });
      transport.deliver({ jsonrpc: '2.0', id: 98, error: { code: -32000, message: 'nope' } });
      transport.deliver({ jsonrpc: '2.0', id: 1, result: 'ok' });

      await expect(call).resolves.toBe('ok');
      expect(protocolErrors.map((err) => err.message)).toEqual([
        'Received response for unknown request ID: 99',
        'Received error for unknown request ID: 98',
      ]);
    });

    it('should pass notifications to the callback and the notification event', () => {
      const received: JsonRpcNotification[] = [];
      const emitted: JsonRpcNotification[] = [];
      mux = new RequestMultiplexer(transport, {
        logger: silentLogger,
        onNotification: (notification) => received.push(notification),
      });
      mux.on('notification', (notification: JsonRpcNotification) => emitted.push(notification));

      const notification: JsonRpcNotification = {
        jsonrpc: '2.0',
        method: 'notifications/message',
        params: { level: 'info', data: 'hello' },
      };
      transport.deliver(notification);

      expect(received).toEqual([notification]);
      expect(emitted).toEqual([notification]);
    });

    it('should answer ping requests from the peer', async () => {
      transport.deliver({ jsonrpc: '2.0', id: 'srv-1', method: 'ping' });
      await Promise.resolve();

      expect(transport.sent).toEqual([{ jsonrpc: '2.0', id: 'srv-1', result: {} }]);
    });

    it('should answer other peer requests with Method not found', async () => {
      transport.deliver({ jsonrpc: '2.0', id: 7, method: 'sampling/createMessage', params: {} });
      await Promise.resolve();

      expect(transport.sent).toEqual([
        { jsonrpc: '2.0', id: 7, error: { code: -32601, message: 'Method not found' } },
      ]);
    });

    it('should keep delivering after a malformed line', async () => {
      const parseErrors: string[] = [];
      mux.on('parseError', (err: { line: string }) => parseErrors.push(err.line));
      const call = mux.request('tools/call');

      transport.deliverGarbage('{"jsonrpc": "2.0", "id": ');
      transport.deliver({ jsonrpc: '2.0', id: 1, result: 'still fine' });

      await expect(call).resolves.toBe('still fine');
      expect(parseErrors).toEqual(['{"jsonrpc": "2.0", "id": ']);
    });
  });

  describe('isolation', () => {
    it('should keep identifiers and pending tables separate per session', async () => {
      const otherTransport = new FakeTransport();
      const other = new RequestMultiplexer(otherTransport, { logger: silentLogger });

      const first = mux.request('a');
      const second = other.request('b');

      expect(transport.requests()[0].id).toBe(1);
      expect(otherTransport.requests()[0].id).toBe(1);

      otherTransport.deliver({ jsonrpc: '2.0', id: 1, result: 'from other' });
      await expect(second).resolves.toBe('from other');
      expect(mux.pendingCount).toBe(1);

      transport.deliver({ jsonrpc: '2.0', id: 1, result: 'from first' });
      await expect(first).resolves.toBe('from first');
    });
  });
});
