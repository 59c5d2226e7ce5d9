import { describe, expect, test } from 'vitest';
import {
  findCut,
  keepTail,
  packSegments,
  splitText,
  TRUNCATION_INDICATOR,
  trimToLimit,
  trimWithClosing,
} from '../src/core/presenter/overflow.js';

describe('trimToLimit', () => {
  test('keeps the head and marks the cut', () => {
    const trimmed = trimToLimit('a'.repeat(5000), 4096);

    expect(trimmed).toHaveLength(4096);
    expect(trimmed.endsWith('\n…(truncated)')).toBe(true);
    expect(trimmed.startsWith('a'.repeat(4096 - TRUNCATION_INDICATOR.length))).toBe(true);
  });

  test('returns short text unchanged', () => {
    expect(trimToLimit('short', 10)).toBe('short');
  });
});

describe('keepTail', () => {
  test('drops whole leading lines behind a marker', () => {
    expect(keepTail('one\ntwo\nthree\n', 10)).toBe('…\nthree\n');
    expect(keepTail('short\n', 10)).toBe('short\n');
  });

  test('cuts a single long line from its front', () => {
    expect(keepTail('x'.repeat(20), 10)).toBe(`…\n${'x'.repeat(8)}`);
  });
});

describe('trimWithClosing', () => {
  test('keeps the closing section and the newest progress that fits', () => {
    expect(trimWithClosing('one\ntwo\nthree\n', '\ndone', 16)).toBe('…\nthree\n\ndone');
    expect(trimWithClosing('ls\n', '\ndone', 16)).toBe('ls\n\ndone');
  });

  test('a closing section longer than the limit is cut at its end and progress is dropped', () => {
    expect(trimWithClosing('ls\n', `\n${'r'.repeat(50)}`, 20)).toBe('rrrrrr\n…(truncated)');
  });
});

describe('findCut', () => {
  test('prefers a paragraph break', () => {
    const text = `${'a'.repeat(60)}\n\n${'b'.repeat(60)}`;
    expect(findCut(text, 100)).toBe(62);
  });

  test('keeps a fence opener with its block', () => {
    const text = `${'a'.repeat(70)}\n\`\`\`ts\n${'c'.repeat(50)}`;
    expect(findCut(text, 100)).toBe(71);
  });

  test('cuts hard when the only boundary is too early', () => {
    const text = `ab ${'x'.repeat(200)}`;
    expect(findCut(text, 100)).toBe(100);
  });
});

describe('splitText', () => {
  test('is lossless and respects the limit', () => {
    const text = Array.from({ length: 40 }, (_, i) => `line ${i} ${'z'.repeat(i % 7)}`).join('\n');
    const pieces = splitText(text, 64);

    expect(pieces.join('')).toBe(text);
    for (const piece of pieces) {
      expect(piece.length).toBeLessThanOrEqual(64);
    }
  });

  test('falls back to hard cuts', () => {
    expect(splitText('x'.repeat(250), 100).map((piece) => piece.length)).toEqual([100, 100, 50]);
  });
});

describe('packSegments', () => {
  test('starts a new chunk when the next segment would not fit', () => {
    expect(packSegments(['aaa', 'bb', 'cccc'], 5)).toEqual(['aaabb', 'cccc']);
    expect(packSegments([], 5)).toEqual([]);
  });
});
