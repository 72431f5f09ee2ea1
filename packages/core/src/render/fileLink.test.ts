import { describe, it, expect } from 'vitest';
import { encodePathForLink, toDisplayPath } from './fileLink';

describe('encodePathForLink', () => {
  it('keeps slashes and unreserved characters', () => {
    expect(encodePathForLink('/home/tester/a-b_c.d~e')).toBe('/home/tester/a-b_c.d~e');
  });

  it('encodes spaces, reserved and sub-delimiter characters', () => {
    expect(encodePathForLink('/a b/c#d.txt')).toBe('/a%20b/c%23d.txt');
    expect(encodePathForLink("/(x)!'*")).toBe('/%28x%29%21%27%2A');
  });

  it('encodes non-ASCII characters as UTF-8', () => {
    expect(encodePathForLink('/ä')).toBe('/%C3%A4');
  });
});

describe('toDisplayPath', () => {
  it('never links in the default mode', () => {
    expect(toDisplayPath('/a b', 'never')).toEqual({ text: '/a b', schemeLength: 0, linked: false });
  });

  it('links on demand only when encoding changes the path', () => {
    expect(toDisplayPath('/a/b', 'on-demand').linked).toBe(false);
    expect(toDisplayPath('/a b', 'on-demand')).toEqual({
      text: 'file:///a%20b',
      schemeLength: 7,
      linked: true,
    });
  });

  it('always links when asked to', () => {
    expect(toDisplayPath('/a/b', 'always').text).toBe('file:///a/b');
  });
});
