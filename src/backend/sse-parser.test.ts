import { describe, it, expect } from 'vitest';
import { createSseParser } from './sse-parser.js';

describe('createSseParser', () => {
  it('emits one payload per blank-line-terminated event', () => {
    const parser = createSseParser();
    expect(parser.push('data: {"a":1}\n\ndata: {"b":2}\n\n')).toEqual(['{"a":1}', '{"b":2}']);
  });

  it('reassembles events split across chunks', () => {
    const parser = createSseParser();
    expect(parser.push('data: {"te')).toEqual([]);
    expect(parser.push('xt":"hi"}\n')).toEqual([]);
    expect(parser.push('\n')).toEqual(['{"text":"hi"}']);
  });

  it('accepts CRLF line endings, including a CRLF split between chunks', () => {
    const parser = createSseParser();
    expect(parser.push('data: one\r')).toEqual([]);
    expect(parser.push('\n\r\n')).toEqual(['one']);
  });

  it('joins multi-line data fields with newlines', () => {
    const parser = createSseParser();
    expect(parser.push('data: first\ndata: second\n\n')).toEqual(['first\nsecond']);
  });

  it('ignores comments and non-data fields', () => {
    const parser = createSseParser();
    expect(parser.push(': keep-alive\n\nevent: message\nid: 7\ndata: [DONE]\n\n')).toEqual(['[DONE]']);
  });

  it('keeps data without a space after the colon intact', () => {
    const parser = createSseParser();
    expect(parser.push('data:x\n\n')).toEqual(['x']);
  });

  it('flushes an unterminated event on end', () => {
    const parser = createSseParser();
    expect(parser.push('data: tail')).toEqual([]);
    expect(parser.end()).toEqual(['tail']);
  });

  it('returns nothing on end when the stream ended cleanly', () => {
    const parser = createSseParser();
    parser.push('data: x\n\n');
    expect(parser.end()).toEqual([]);
  });
});
