// Key Phrase Matcher - exact, ordered sublist search over token words
import { KeyPhrase, Token } from '../interfaces';

export class KeyPhraseMatcher {
  private readonly keyPhrases: readonly KeyPhrase[];

  constructor(phrases: readonly string[]) {
    this.keyPhrases = Object.freeze(
      phrases.map(phrase => Object.freeze(KeyPhraseMatcher.parseKeyPhrase(phrase)))
    );
  }

  /**
   * Strip everything which isn't an ASCII letter.
   */
  public static toLetters(word: string): string {
    return word.replace(/[^a-zA-Z]/g, '');
  }

  /**
   * Turn configured text into a lowercase, letters-only tuple of words. Words
   * which sanitize to nothing are dropped, so the result may be empty.
   */
  public static parseKeyPhrase(phrase: string): string[] {
    const result: string[] = [];
    for (const word of phrase.split(' ')) {
      const letters = KeyPhraseMatcher.toLetters(word);
      if (letters !== '') {
        result.push(letters.toLowerCase());
      }
    }
    return result;
  }

  /**
   * Find where `sublist` first occurs contiguously in `list`, at or after
   * `start`. Returns -1 when it is not there.
   */
  public static listIndex<T>(list: readonly T[], sublist: readonly T[], start: number = 0): number {
    if (sublist.length === 0) {
      throw new Error('Empty sublist cannot be located in a list');
    }

    if (sublist.length === 1) {
      return list.indexOf(sublist[0], start);
    }

    let offset = start;
    while (offset < list.length) {
      const first = list.indexOf(sublist[0], offset);
      if (first === -1 || first + sublist.length > list.length) {
        return -1;
      }

      let matched = true;
      for (let i = 1; i < sublist.length; i++) {
        if (list[first + i] !== sublist[i]) {
          matched = false;
          break;
        }
      }
      if (matched) {
        return first;
      }

      // Look again from just after this candidate
      offset = first + 1;
    }
    return -1;
  }

  public static wordsOf(tokens: readonly Token[]): string[] {
    return tokens.map(token => KeyPhraseMatcher.toLetters(token.element).toLowerCase());
  }

  /**
   * The index just past the matched key phrase, or null when none is present.
   *
   * Every phrase is tried and the last one in configuration order to match
   * decides the offset.
   */
  public findOffset(words: readonly string[]): number | null {
    let offset: number | null = null;
    for (const phrase of this.keyPhrases) {
      if (phrase.length === 0) continue;
      const index = KeyPhraseMatcher.listIndex(words, phrase);
      if (index !== -1) {
        offset = index + phrase.length;
      }
    }
    return offset;
  }

  public getKeyPhrases(): readonly KeyPhrase[] {
    return this.keyPhrases;
  }

  public toString(): string {
    return JSON.stringify(this.keyPhrases);
  }
}
