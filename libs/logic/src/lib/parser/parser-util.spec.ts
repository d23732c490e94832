import { Frequency, Name, Priority, ProductPreference, Tag } from '@client-registry/model';
import { ParseError } from './parse-error';
import {
  MESSAGE_INVALID_INDEX,
  parseDescription,
  parseFrequency,
  parseIndex,
  parseName,
  parsePriority,
  parseProductPreference,
  parseTags,
} from './parser-util';

describe('parser utilities', () => {
  describe('parseIndex', () => {
    it('should parse trimmed integers, leaving range checks to the command', () => {
      expect(parseIndex(' 3 ')).toBe(3);
      expect(parseIndex('0')).toBe(0);
      expect(parseIndex('-2')).toBe(-2);
    });

    it.each(['', 'a', '1 2', '1.5', '99999999999999999999'])('should reject "%s"', (text) => {
      expect(() => parseIndex(text)).toThrow(new ParseError(MESSAGE_INVALID_INDEX));
    });
  });

  it('should parse a name into title case', () => {
    expect(parseName('  amy bee ').fullName).toBe('Amy Bee');
    expect(() => parseName('Amy*')).toThrow(new ParseError(Name.MESSAGE_CONSTRAINTS));
  });

  it('should reject an invalid tag among several', () => {
    expect(parseTags(['vip', ' friends ']).map((tag) => tag.tagName)).toEqual(['vip', 'friends']);
    expect(() => parseTags(['vip', 'best friend'])).toThrow(new ParseError(Tag.MESSAGE_CONSTRAINTS));
  });

  describe('parseFrequency', () => {
    it('should parse a non-negative integer', () => {
      expect(parseFrequency(' 7 ').value).toBe(7);
      expect(parseFrequency('0').value).toBe(0);
    });

    it.each(['-1', '1.5', 'often', '', '1000001'])('should reject "%s"', (text) => {
      expect(() => parseFrequency(text)).toThrow(new ParseError(Frequency.MESSAGE_CONSTRAINTS));
    });
  });

  describe('parseProductPreference', () => {
    it('should default the frequency to 1', () => {
      const preference = parseProductPreference(' Tea ');
      expect(preference.label).toBe('Tea');
      expect(preference.frequency.value).toBe(1);
    });

    it('should keep a given frequency', () => {
      expect(parseProductPreference('Tea', Frequency.of(4)).frequency.value).toBe(4);
    });

    it('should reject a blank label', () => {
      expect(() => parseProductPreference('  ')).toThrow(new ParseError(ProductPreference.MESSAGE_CONSTRAINTS));
    });
  });

  describe('parsePriority', () => {
    it('should treat blank text as no priority', () => {
      expect(parsePriority('   ')).toBeUndefined();
    });

    it('should parse a level', () => {
      expect(parsePriority(' 2 ')?.level).toBe(2);
    });

    it.each(['0', '4', 'high', '-1'])('should reject "%s"', (text) => {
      expect(() => parsePriority(text)).toThrow(new ParseError(Priority.MESSAGE_CONSTRAINTS));
    });
  });

  it('should treat a blank description as none', () => {
    expect(parseDescription('  ')).toBeUndefined();
    expect(parseDescription(' Calls on Fridays ')?.text).toBe('Calls on Fridays');
  });
});
