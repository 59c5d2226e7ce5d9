import { describe, expect, test } from 'vitest';
import { LineSplitter, parseJsonObject } from '../src/core/runner/lines.js';

describe('LineSplitter', () => {
  test('holds partial lines across chunks', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
    expect(splitter.push(':2}\r\n\n{"c"')).toEqual(['{"b":2}', '']);
    expect(splitter.flush()).toBe('{"c"');
    expect(splitter.flush()).toBeUndefined();
  });
});

describe('parseJsonObject', () => {
  test('accepts objects only', () => {
    expect(parseJsonObject('{"type":"result"}')).toEqual({ type: 'result' });
    expect(parseJsonObject('[1,2]')).toBeUndefined();
    expect(parseJsonObject('null')).toBeUndefined();
    expect(parseJsonObject('{"type":')).toBeUndefined();
  });
});
