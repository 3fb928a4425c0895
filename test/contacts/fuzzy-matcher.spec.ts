import {
  FuzzyMatcher,
  NEUTRAL_SCORE,
  RESOLVE_THRESHOLD,
} from '../../src/contacts/fuzzy-matcher';
import {
  Contact,
  ContactKind,
} from '../../src/telegram-client/interfaces/contact.interface';
import { SAMPLE_CONTACTS } from '../mocks/fake-transport';

const contact = (id: number, name: string): Contact => ({
  id,
  name,
  kind: ContactKind.USER,
});

describe('FuzzyMatcher', () => {
  const matcher = new FuzzyMatcher();

  describe('search', () => {
    it('should rank prefix matches above word matches', () => {
      const results = matcher.search('jo', SAMPLE_CONTACTS);

      expect(
        results.map(({ contact: match, score }) => [match.name, score]),
      ).toEqual([
        ['John Doe', 92],
        ['Joanna Lee', 91],
        ['Mark Jones', 77],
      ]);
    });

    it('should ignore case and surrounding spaces', () => {
      expect(matcher.search('  JO ', SAMPLE_CONTACTS)).toEqual(
        matcher.search('jo', SAMPLE_CONTACTS),
      );
    });

    it('should return every contact for an empty query', () => {
      const results = matcher.search('', SAMPLE_CONTACTS);

      expect(results.map(({ contact: match }) => match.id)).toEqual([1, 2, 3, 4]);
      expect(results.every(({ score }) => score === NEUTRAL_SCORE)).toBe(true);
    });

    it('should treat a blank query as empty', () => {
      expect(matcher.search('   ', SAMPLE_CONTACTS)).toHaveLength(4);
    });

    it('should return nothing when no name matches', () => {
      expect(matcher.search('xyz', SAMPLE_CONTACTS)).toEqual([]);
    });

    it('should keep input order for equal scores', () => {
      const results = matcher.search('john', [
        contact(10, 'John X'),
        contact(11, 'John Y'),
      ]);

      expect(results).toEqual([
        { contact: contact(10, 'John X'), score: 96 },
        { contact: contact(11, 'John Y'), score: 96 },
      ]);
    });
  });

  describe('score', () => {
    it('should give an exact name the top score', () => {
      expect(matcher.score('john doe', 'John Doe')).toBe(100);
    });

    it('should keep prefixes below exact matches', () => {
      expect(matcher.score('john do', 'John Doe')).toBe(97);
    });

    it('should prefer substrings at a word start', () => {
      expect(matcher.score('son', 'Ann Sonder')).toBe(79);
      expect(matcher.score('son', 'Jackson')).toBe(66);
    });

    it('should score scattered letters lowest', () => {
      expect(matcher.score('jd', 'John Doe')).toBe(20);
      expect(matcher.score('jd', 'John Doe')).toBeLessThan(RESOLVE_THRESHOLD);
    });

    it('should rank a prefix at or above any subsequence', () => {
      expect(matcher.score('al', 'Alice')).toBe(93);
      expect(matcher.score('al', 'Bart Lee')).toBe(24);
    });

    it('should not match a query longer than the name', () => {
      expect(matcher.score('johnathan', 'John')).toBe(0);
    });
  });
});
