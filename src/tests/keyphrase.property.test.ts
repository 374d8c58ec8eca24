/**
 * Property-based tests for key-phrase detection
 */
import * as fc from 'fast-check';
import { KeyPhraseMatcher } from '../services/KeyPhraseMatcher';
import { phraseArbitrary, propertyTestConfig, tokens, wordsArbitrary } from './setup';

// Brute force reference: try every start position
function naiveIndex(list: string[], sublist: string[], start: number = 0): number {
  for (let i = Math.max(start, 0); i + sublist.length <= list.length; i++) {
    if (sublist.every((word, j) => list[i + j] === word)) {
      return i;
    }
  }
  return -1;
}

describe('KeyPhraseMatcher', () => {
  describe('sanitising', () => {
    test('toLetters keeps ASCII letters only', () => {
      expect(KeyPhraseMatcher.toLetters('Hey,')).toBe('Hey');
      expect(KeyPhraseMatcher.toLetters("what's")).toBe('whats');
      expect(KeyPhraseMatcher.toLetters('café')).toBe('caf');
      expect(KeyPhraseMatcher.toLetters('42')).toBe('');
    });

    test('parseKeyPhrase lowercases and drops punctuation-only words', () => {
      expect(KeyPhraseMatcher.parseKeyPhrase('Hey, Computer!')).toEqual(['hey', 'computer']);
      expect(KeyPhraseMatcher.parseKeyPhrase('  Hey   there ')).toEqual(['hey', 'there']);
      expect(KeyPhraseMatcher.parseKeyPhrase('Okay - Dexter')).toEqual(['okay', 'dexter']);
    });

    test('parseKeyPhrase of text without letters is empty', () => {
      expect(KeyPhraseMatcher.parseKeyPhrase('123 !!')).toEqual([]);
      expect(KeyPhraseMatcher.parseKeyPhrase('')).toEqual([]);
    });

    test('wordsOf projects each token to lowercase letters', () => {
      expect(KeyPhraseMatcher.wordsOf(tokens("Hey, Computer! What's up?"))).toEqual(['hey', 'computer', 'whats', 'up']);
    });
  });

  describe('listIndex', () => {
    test('finds the first occurrence and the next one from a later start', () => {
      const words = ['a', 'b', 'a', 'b', 'c'];
      expect(KeyPhraseMatcher.listIndex(words, ['a', 'b'])).toBe(0);
      expect(KeyPhraseMatcher.listIndex(words, ['a', 'b'], 1)).toBe(2);
      expect(KeyPhraseMatcher.listIndex(words, ['a', 'b'], 3)).toBe(-1);
    });

    test('resumes after a tentative start which does not continue', () => {
      expect(KeyPhraseMatcher.listIndex(['a', 'c', 'a', 'b'], ['a', 'b'])).toBe(2);
    });

    test('single element search is plain indexOf', () => {
      expect(KeyPhraseMatcher.listIndex(['x', 'y', 'y'], ['y'])).toBe(1);
      expect(KeyPhraseMatcher.listIndex(['x', 'y', 'y'], ['y'], 2)).toBe(2);
      expect(KeyPhraseMatcher.listIndex(['x'], ['z'])).toBe(-1);
    });

    test('requires order and adjacency', () => {
      expect(KeyPhraseMatcher.listIndex(['a', 'b'], ['b', 'a'])).toBe(-1);
      expect(KeyPhraseMatcher.listIndex(['a', 'x', 'b'], ['a', 'b'])).toBe(-1);
      expect(KeyPhraseMatcher.listIndex(['x', 'a'], ['a', 'b'])).toBe(-1);
    });

    test('an empty sublist is an error', () => {
      expect(() => KeyPhraseMatcher.listIndex(['a'], [])).toThrow('Empty sublist cannot be located in a list');
    });

    test('agrees with a brute force search', () => {
      fc.assert(
        fc.property(wordsArbitrary, phraseArbitrary, fc.nat({ max: 12 }), (words, phrase, start) => {
          expect(KeyPhraseMatcher.listIndex(words, phrase, start)).toBe(naiveIndex(words, phrase, start));
        }),
        propertyTestConfig
      );
    });
  });

  describe('findOffset', () => {
    test('returns the index just after the key phrase', () => {
      const matcher = new KeyPhraseMatcher(['Hey Computer']);
      expect(matcher.findOffset(['hey', 'computer', 'what', 'time'])).toBe(2);
      expect(matcher.findOffset(['so', 'hey', 'computer'])).toBe(3);
    });

    test('returns null when no key phrase is present', () => {
      const matcher = new KeyPhraseMatcher(['Hey Computer']);
      expect(matcher.findOffset(['computer', 'hey'])).toBeNull();
      expect(matcher.findOffset([])).toBeNull();
    });

    test('the last matching phrase in configuration order wins', () => {
      const words = ['hey', 'computer', 'lights'];
      expect(new KeyPhraseMatcher(['hey', 'computer']).findOffset(words)).toBe(2);
      expect(new KeyPhraseMatcher(['computer', 'hey']).findOffset(words)).toBe(1);
      expect(new KeyPhraseMatcher(['computer', 'dexter']).findOffset(words)).toBe(2);
    });

    test('a phrase without letters never matches', () => {
      expect(new KeyPhraseMatcher(['!!!']).findOffset(['hey'])).toBeNull();
      expect(new KeyPhraseMatcher(['!!!', 'hey']).findOffset(['hey'])).toBe(1);
    });

    test('key phrases are stored sanitised and frozen', () => {
      const phrases = new KeyPhraseMatcher(['Hey, Computer']).getKeyPhrases();
      expect(phrases).toEqual([['hey', 'computer']]);
      expect(Object.isFrozen(phrases)).toBe(true);
      expect(Object.isFrozen(phrases[0])).toBe(true);
    });

    test('an embedded phrase is found at or before where it was placed', () => {
      fc.assert(
        fc.property(wordsArbitrary, phraseArbitrary, wordsArbitrary, (before, phrase, after) => {
          const words = [...before, ...phrase, ...after];
          const matcher = new KeyPhraseMatcher([phrase.join(' ')]);
          const expectedStart = naiveIndex(words, phrase);

          expect(expectedStart).toBeLessThanOrEqual(before.length);
          expect(matcher.findOffset(words)).toBe(expectedStart + phrase.length);
        }),
        propertyTestConfig
      );
    });

    test('words without the phrase give no offset', () => {
      fc.assert(
        fc.property(wordsArbitrary, phraseArbitrary, (words, phrase) => {
          fc.pre(naiveIndex(words, phrase) === -1);
          expect(new KeyPhraseMatcher([phrase.join(' ')]).findOffset(words)).toBeNull();
        }),
        propertyTestConfig
      );
    });
  });
});
