import { describe, it, expect } from 'vitest';
import { encodeLine, LineFramer } from '../src/transport/framing.js';

describe('LineFramer', () => {
  it('should return complete lines and buffer the remainder', () => {
    const framer = new LineFramer();

    expect(framer.push('{"a":1}\n{"b":')).toEqual(['{"a":1}']);
    expect(framer.pending).toBe(5);
    expect(framer.push('2}\n')).toEqual(['{"b":2}']);
    expect(framer.pending).toBe(0);
  });

  it('should split several lines from one chunk', () => {
    const framer = new LineFramer();

    expect(framer.push(Buffer.from('one\ntwo\n\nthree\n'))).toEqual(['one', 'two', '', 'three']);
  });

  it('should hold a multi-byte character split across chunks', () => {
    const framer = new LineFramer();
    const bytes = Buffer.from('{"text":"héllo"}\n', 'utf8');
    const split = bytes.indexOf(0xa9);

    expect(framer.push(bytes.subarray(0, split))).toEqual([]);
    expect(framer.push(bytes.subarray(split))).toEqual(['{"text":"héllo"}']);
  });

  it('should flush an unterminated final line at end of stream', () => {
    const framer = new LineFramer();
    framer.push('complete\npartial');

    expect(framer.end()).toBe('partial');
    expect(framer.end()).toBeNull();
  });
});

describe('encodeLine', () => {
  it('should serialize one message per line', () => {
    expect(encodeLine({ jsonrpc: '2.0', id: 1, method: 'tools/list' })).toBe(
      '{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n',
    );
  });

  it('should escape embedded newlines so the frame stays on one line', () => {
    const line = encodeLine({ text: 'a\nb' });

    expect(line.indexOf('\n')).toBe(line.length - 1);
  });
});
