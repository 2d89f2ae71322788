import { describe, expect, it } from 'vitest';
import { normalizeSkillText, normalizeWhitespace, stripMarkup } from '../src/text.js';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces, newlines and tabs', () => {
    expect(normalizeWhitespace('  hello \n\n\tworld  ')).toBe('hello world');
  });
});

describe('stripMarkup', () => {
  it('removes tags and collapses whitespace', () => {
    expect(stripMarkup('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('keeps words on either side of a tag apart', () => {
    expect(stripMarkup('line one<br/>line two')).toBe('line one line two');
  });

  it('returns empty string for empty or absent input', () => {
    expect(stripMarkup('')).toBe('');
    expect(stripMarkup(undefined)).toBe('');
    expect(stripMarkup(null)).toBe('');
  });
});

describe('normalizeSkillText', () => {
  it('keeps +, . and # so language names survive', () => {
    expect(normalizeSkillText('C++')).toBe('c++');
    expect(normalizeSkillText('C#')).toBe('c#');
    expect(normalizeSkillText('Node.js')).toBe('node.js');
  });

  it('blanks out other punctuation and trims', () => {
    expect(normalizeSkillText('MS-Excel!')).toBe('ms excel');
  });

  it('returns empty string for punctuation-only input', () => {
    expect(normalizeSkillText('***')).toBe('');
  });
});
