import path from 'path';
import {
  comparePaths,
  isSameOrInside,
  matchSuffix,
  sanitizeName,
  splitStemAndExtension,
  withCounter,
} from '../common/path';
import { PathAllocator } from '../common/pathAllocator';

describe('file name helpers', () => {
  it('splits the extension at the last dot but never at a leading one', () => {
    expect(splitStemAndExtension('report.v1.pdf')).toEqual({ stem: 'report.v1', extension: '.pdf' });
    expect(splitStemAndExtension('.bashrc')).toEqual({ stem: '.bashrc', extension: '' });
    expect(splitStemAndExtension('Makefile')).toEqual({ stem: 'Makefile', extension: '' });
  });

  it('replaces every troublesome character with the substitute', () => {
    expect(sanitizeName('report:v2?.txt', [':', '?'], '_')).toBe('report_v2_.txt');
    expect(sanitizeName('a::b', [':'], '-')).toBe('a--b');
  });

  it('keeps the extension dot and the hidden-file dot when dots are troublesome', () => {
    expect(sanitizeName('report.v1.pdf', ['.'], '_')).toBe('report_v1.pdf');
    expect(sanitizeName('.hidden.v1.txt', ['.'], '_')).toBe('.hidden_v1.txt');
    expect(sanitizeName('.bashrc', ['.'], '_')).toBe('.bashrc');
  });

  it('leaves clean names untouched', () => {
    expect(sanitizeName('a.txt', [':', '?', '.'], '_')).toBe('a.txt');
  });

  it('inserts the counter before the extension', () => {
    expect(withCounter('report_v2_.txt', 1, '_')).toBe('report_v2__1.txt');
    expect(withCounter('README', 3, '-')).toBe('README-3');
    expect(withCounter('.env', 2, '_')).toBe('.env_2');
  });

  it('matches temp suffixes case-sensitively', () => {
    expect(matchSuffix('draft.tmp', ['.bak', '.tmp'])).toBe('.tmp');
    expect(matchSuffix('draft.TMP', ['.tmp'])).toBeUndefined();
    expect(matchSuffix('notes.txt~', ['.tmp', '~'])).toBe('~');
    expect(matchSuffix('anything', [''])).toBeUndefined();
  });

  it('detects nested paths', () => {
    expect(isSameOrInside('/data/x', '/data/x')).toBe(true);
    expect(isSameOrInside('/data/x', '/data/x/y/z')).toBe(true);
    expect(isSameOrInside('/data/x', '/data/xy')).toBe(false);
    expect(isSameOrInside('/data/x', '/data')).toBe(false);
  });

  it('orders paths by code unit', () => {
    expect(['/b', '/B', '/a'].sort(comparePaths)).toEqual(['/B', '/a', '/b']);
  });
});

describe('PathAllocator', () => {
  it('hands out the requested path when it is free', () => {
    const allocator = new PathAllocator([], '_');
    expect(allocator.claim('/x', 'a.txt')).toBe(path.resolve('/x/a.txt'));
    expect(allocator.isOccupied('/x/a.txt')).toBe(true);
  });

  it('disambiguates against existing files and earlier claims', () => {
    const allocator = new PathAllocator(['/x/a.txt'], '_');
    expect(allocator.claim('/x', 'a.txt')).toBe(path.resolve('/x/a_1.txt'));
    expect(allocator.claim('/x', 'a.txt')).toBe(path.resolve('/x/a_2.txt'));
    expect(allocator.claimPath('/y/a.txt')).toBe(path.resolve('/y/a.txt'));
  });
});
