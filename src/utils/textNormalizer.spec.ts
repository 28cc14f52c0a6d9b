import { normalizeText, splitIntoChunks } from './textNormalizer';

describe('normalizeText', () => {
  it('collapses whitespace and blank lines', () => {
    expect(normalizeText('  Refund\tpolicy \r\n\r\n\r\n\r\n30  days only  ')).toBe('Refund policy\n\n30 days only');
  });
});

describe('splitIntoChunks', () => {
  it('returns a single window for short text', () => {
    expect(splitIntoChunks('short text', { chunkSize: 50, overlap: 5 })).toEqual([
      { text: 'short text', chunk_index: 0, startChar: 0, endChar: 10 },
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(splitIntoChunks('   \n ')).toEqual([]);
  });

  it('cuts fixed windows that overlap when there is nowhere better to break', () => {
    const windows = splitIntoChunks('abcdefghijklmnopqrstuvwxyz', { chunkSize: 10, overlap: 3 });

    expect(windows.map(w => w.text)).toEqual(['abcdefghij', 'hijklmnopq', 'opqrstuvwx', 'vwxyz']);
    expect(windows.map(w => [w.startChar, w.endChar])).toEqual([[0, 10], [7, 17], [14, 24], [21, 26]]);
  });

  it('prefers breaking on whitespace in the second half of a window', () => {
    const windows = splitIntoChunks('One two. Three four five six.', { chunkSize: 20, overlap: 5 });

    expect(windows).toEqual([
      { text: 'One two. Three four', chunk_index: 0, startChar: 0, endChar: 19 },
      { text: 'four five six.', chunk_index: 1, startChar: 14, endChar: 29 },
    ]);
  });

  it('rejects an overlap that is not smaller than the window', () => {
    expect(() => splitIntoChunks('anything', { chunkSize: 10, overlap: 10 })).toThrow(RangeError);
  });
});
