import { describe, it, expect } from 'vitest';
import {
  DEFAULT_QUALITY_POLICY,
  filterCandidates,
  findRejectionReason,
  resolveQualityPolicy,
} from '../src/quality/quality-filter';
import {
  calculateQualityScore,
  countProperNouns,
  hedgingScore,
  specificityScore,
} from '../src/quality/scoring';
import { RejectionReason } from '../src/quality/types';
import type { RawCandidate } from '../src/generation/types';

function candidate(question: string, answer: string, sourceChunkIndex = 0): RawCandidate {
  return { question, answer, sourceChunkIndex, charSpan: [0, 10] };
}

describe('findRejectionReason', () => {
  it.each([
    ['', 'Some answer.'],
    ['What is X?', ''],
    ['What is X?', '   '],
    ['Tell me about X', 'X is a widget'],
  ])('rejects %j / %j as EmptyOrMalformed', (question, answer) => {
    expect(findRejectionReason(candidate(question, answer))).toBe(RejectionReason.EMPTY_OR_MALFORMED);
  });

  it('rejects short questions', () => {
    expect(findRejectionReason(candidate('Why?', 'Because of Y.'))).toBe(RejectionReason.TOO_SHORT);
    expect(findRejectionReason(candidate('Pricing X?', 'Ten euros.'))).toBe(RejectionReason.TOO_SHORT);
  });

  it('accepts short but complete questions', () => {
    expect(findRejectionReason(candidate("What's X?", 'X is a widget'))).toBeUndefined();
  });

  it('rejects boilerplate questions', () => {
    expect(findRejectionReason(candidate('What is this document about?', 'It covers widgets.'))).toBe(
      RejectionReason.BOILERPLATE
    );
    expect(findRejectionReason(candidate('What are the main points of the text?', 'Widgets.'))).toBe(
      RejectionReason.BOILERPLATE
    );
  });

  it('rejects answers that repeat the question', () => {
    expect(findRejectionReason(candidate('What is the refund window?', 'What is the refund window'))).toBe(
      RejectionReason.LOW_INFORMATION_ANSWER
    );
  });

  it('applies the rules in order', () => {
    // Both too short and missing a question mark: the first rule wins
    expect(findRejectionReason(candidate('Why', 'Why'))).toBe(RejectionReason.EMPTY_OR_MALFORMED);
  });

  it('skips the question mark rule when the policy allows it', () => {
    const policy = resolveQualityPolicy({ requireQuestionMark: false });
    expect(findRejectionReason(candidate('Tell me about X', 'X is a widget'), policy)).toBeUndefined();
  });
});

describe('scoring', () => {
  it('counts capitalized words that do not open a sentence', () => {
    expect(countProperNouns('Version 2 ships in March with Berlin support.')).toBe(2);
    expect(countProperNouns('Done. Then restart it.')).toBe(0);
  });

  it('rewards numbers and proper nouns', () => {
    expect(specificityScore('X is a widget')).toBe(0);
    expect(specificityScore('It costs 5 euros')).toBe(0.5);
    expect(specificityScore('Version 2 ships in March with Berlin support.')).toBe(1);
  });

  it('penalizes each distinct hedge', () => {
    expect(hedgingScore('It works.')).toBe(1);
    expect(hedgingScore('It might work.')).toBe(0.5);
    expect(hedgingScore('It might work, perhaps.')).toBe(0);
  });

  it('blends the three signals', () => {
    expect(calculateQualityScore('X is a widget', DEFAULT_QUALITY_POLICY)).toBe(0.3533);
    expect(calculateQualityScore('X is a widget used in Y', DEFAULT_QUALITY_POLICY)).toBe(0.4683);
    expect(calculateQualityScore('It might work, perhaps.', DEFAULT_QUALITY_POLICY)).toBe(0.0533);
    expect(calculateQualityScore('Version 2 ships in March with Berlin support.', DEFAULT_QUALITY_POLICY)).toBe(0.7067);
  });

  it('uses custom weights', () => {
    const policy = resolveQualityPolicy({ weights: { length: 1, specificity: 0, hedging: 0 } });
    expect(calculateQualityScore('X is a widget used in Y', policy)).toBe(0.2333);
  });
});

describe('filterCandidates', () => {
  it('scores survivors, zeroes rejects and preserves input order', () => {
    const input = [
      candidate('What is X?', 'X is a widget', 0),
      candidate('What is this document about?', 'Widgets.', 1),
      candidate("What's X?", 'X is a widget used in Y', 2),
    ];

    expect(filterCandidates(input)).toEqual([
      { ...input[0], qualityScore: 0.3533 },
      { ...input[1], qualityScore: 0, rejectedReason: RejectionReason.BOILERPLATE },
      { ...input[2], qualityScore: 0.4683 },
    ]);
  });

  it('does not modify its input', () => {
    const input = [candidate('What is X?', 'X is a widget')];
    const copy = structuredClone(input);

    filterCandidates(input);

    expect(input).toEqual(copy);
  });

  it('returns an empty list for no candidates', () => {
    expect(filterCandidates([])).toEqual([]);
  });
});
