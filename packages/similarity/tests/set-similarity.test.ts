import { describe, expect, it } from 'vitest';
import { SimilarityError, captureDiagnostics } from '@setmetrics/core';
import {
  cosineSimilarity,
  diceSorensenCoefficient,
  hammingCoefficient,
  hammingDistance,
  jaccardSimilarity,
  overlapCoefficient,
  simpleMatchingCoefficient,
} from '../src/similarity/set-similarity.js';
import { wordSet } from '../src/utils/tokenize.js';

function range(start: number, end: number): Set<number> {
  const result = new Set<number>();
  for (let i = start; i < end; i++) result.add(i);
  return result;
}

const validatedMeasures = [
  overlapCoefficient,
  jaccardSimilarity,
  diceSorensenCoefficient,
  cosineSimilarity,
  simpleMatchingCoefficient,
  hammingCoefficient,
];

describe.each(validatedMeasures.map((measure) => ({ name: measure.name, measure })))(
  '$name shared contract',
  ({ measure }) => {
    it('rejects non-set arguments', () => {
      expect(() => Reflect.apply(measure, undefined, [1, 1])).toThrow('All arguments must be sets!');
    });

    it('returns 0 for two empty sets with a diagnostic', () => {
      const { result, diagnostics } = captureDiagnostics(() => measure(new Set(), new Set()));
      expect(result).toBe(0);
      expect(diagnostics.map((d) => d.message)).toEqual(['Both sets are empty!']);
      expect(diagnostics[0]?.measure).toBe(measure.name);
    });

    it('rejects sets of different element types', () => {
      expect(() => measure(new Set([1, 2, 3]), new Set(['f']))).toThrow(SimilarityError);
    });

    it('is symmetric', () => {
      const a = new Set([1, 2, 3, 4, 7]);
      const b = new Set([3, 4, 5, 9]);
      expect(measure(a, b)).toBe(measure(b, a));
    });
  }
);

describe('measure names', () => {
  it('exposes the exported names on functions, diagnostics and errors', () => {
    expect(validatedMeasures.map((measure) => measure.name)).toEqual([
      'overlapCoefficient',
      'jaccardSimilarity',
      'diceSorensenCoefficient',
      'cosineSimilarity',
      'simpleMatchingCoefficient',
      'hammingCoefficient',
    ]);

    const { diagnostics } = captureDiagnostics(() => cosineSimilarity(new Set(), new Set()));
    expect(diagnostics[0]?.measure).toBe('cosineSimilarity');

    let caught: unknown;
    try {
      jaccardSimilarity(new Set([1]), new Set(['a']));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SimilarityError);
    if (caught instanceof SimilarityError) {
      expect(caught.measure).toBe('jaccardSimilarity');
    }
  });
});

describe('bigint elements', () => {
  it('rejects bigints compared against numbers', () => {
    expect(() => jaccardSimilarity(new Set([1n, 2n]), new Set([1, 2]))).toThrow(
      'Elements in the sets must be of the same type.'
    );
  });

  it('scores sets of bigints', () => {
    expect(jaccardSimilarity(new Set([1n, 2n]), new Set([1n, 2n]))).toBe(1);
    expect(overlapCoefficient(new Set([1n, 2n]), new Set([2n, 3n]))).toBe(0.5);
  });
});

describe('overlapCoefficient', () => {
  it('returns undefined when one set is empty', () => {
    const { result, diagnostics } = captureDiagnostics(() => overlapCoefficient(new Set(), new Set([1])));
    expect(result).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual(['At least one of the sets must be non-empty.']);
  });

  it('scores disjoint and identical sets', () => {
    expect(overlapCoefficient(range(0, 10), range(10, 15))).toBe(0);
    expect(overlapCoefficient(range(0, 10), range(0, 10))).toBe(1);
    expect(overlapCoefficient(new Set([1, 2, 3]), new Set([0.5]))).toBe(0);
  });

  it('divides the intersection by the smaller set', () => {
    expect(overlapCoefficient(new Set([2, 3, 4, 5]), new Set([1, 3, 4, 5]))).toBe(0.75);
  });

  it('rises as the smaller set shrinks inside the larger one', () => {
    const results = [0, 10, 20, 30, 40, 50].map((step) => {
      const score = overlapCoefficient(range(0, 100 + step), range(50 + step, 150)) ?? Number.NaN;
      return Math.round(score * 1000) / 1000;
    });
    expect(results).toEqual([0.5, 0.556, 0.625, 0.714, 0.833, 1]);
  });
});

describe('jaccardSimilarity', () => {
  it('tolerates one empty set', () => {
    expect(jaccardSimilarity(new Set(), new Set([1]))).toBe(0);
  });

  it('scores identical and disjoint sets', () => {
    const a = new Set(['x', 'y', 'z']);
    expect(jaccardSimilarity(a, a)).toBe(1);
    expect(jaccardSimilarity(a, new Set(['p', 'q']))).toBe(0);
  });

  it('divides the intersection by the union', () => {
    expect(jaccardSimilarity(new Set([0, 1, 2, 5, 6, 8, 9]), new Set([0, 2, 3, 4, 5, 7, 9]))).toBe(0.4);
    expect(jaccardSimilarity(new Set([2, 3, 4, 5]), new Set([1, 3, 4, 5]))).toBe(0.6);
  });

  it('ignores the universe', () => {
    expect(jaccardSimilarity(new Set([1, 2]), new Set([2, 3]), range(0, 100))).toBe(1 / 3);
  });
});

describe('diceSorensenCoefficient', () => {
  it('tolerates one empty set', () => {
    expect(diceSorensenCoefficient(new Set(), new Set([1]))).toBe(0);
  });

  it('compares bigram sets', () => {
    expect(diceSorensenCoefficient(new Set(['ni', 'ig', 'gh', 'ht']), new Set(['na', 'ac', 'ch', 'ht']))).toBe(
      0.25
    );
  });

  it('scores identical sets as 1', () => {
    expect(diceSorensenCoefficient(range(0, 10), range(0, 10))).toBe(1);
  });
});

describe('cosineSimilarity', () => {
  it('returns undefined when one set is empty', () => {
    const { result } = captureDiagnostics(() => cosineSimilarity(new Set([1]), new Set()));
    expect(result).toBeUndefined();
  });

  it('returns 0 without shared elements', () => {
    expect(cosineSimilarity(range(0, 10), range(10, 15))).toBe(0);
  });

  it('scores identical sets as 1', () => {
    expect(cosineSimilarity(range(0, 10), range(0, 10))).toBeCloseTo(1, 10);
  });

  it('compares word sets', () => {
    const score = cosineSimilarity(wordSet('the best data science course'), wordSet('data science is popular'));
    expect(score).toBeCloseTo(0.44721, 5);
  });
});

describe('simpleMatchingCoefficient', () => {
  it('returns undefined when one set is empty', () => {
    const { result } = captureDiagnostics(() => simpleMatchingCoefficient(new Set(), new Set([1])));
    expect(result).toBeUndefined();
  });

  it('counts only matches present in both sets without a universe', () => {
    expect(simpleMatchingCoefficient(new Set(['a', 'b', 'c', 'd']), new Set(['b']))).toBe(0.25);
    expect(simpleMatchingCoefficient(range(0, 10), range(10, 15))).toBe(0);
    expect(simpleMatchingCoefficient(range(0, 10), range(0, 10))).toBe(1);
  });

  it('gives the same score with the union passed as universe', () => {
    const a = new Set([1, 2, 3, 6]);
    const b = new Set([2, 3, 4]);
    const withUniverse = captureDiagnostics(() => simpleMatchingCoefficient(a, b, new Set([1, 2, 3, 4, 6])));
    expect(withUniverse.result).toBe(simpleMatchingCoefficient(a, b));
    expect(withUniverse.diagnostics).toEqual([]);
  });

  it('counts elements absent from both when the universe is larger', () => {
    expect(simpleMatchingCoefficient(new Set([1, 2]), new Set([2, 3]), new Set([1, 2, 3, 4, 5]))).toBe(0.6);
  });

  it('falls back to the union when the universe is not a superset', () => {
    const { result, diagnostics } = captureDiagnostics(() =>
      simpleMatchingCoefficient(new Set([1, 2]), new Set([2, 3]), new Set([1, 2, 4, 5]))
    );
    expect(result).toBe(1 / 3);
    expect(diagnostics.map((d) => d.code)).toEqual(['UNIVERSE_NOT_SUPERSET']);
  });
});

describe('hammingDistance', () => {
  it('counts elements in exactly one set', () => {
    expect(hammingDistance(new Set([1, 2, 3, 4]), new Set([2, 3, 4, 5, 6]))).toBe(3);
  });

  it('is symmetric and zero for equal sets', () => {
    const a = new Set(['a', 'b']);
    const b = new Set(['b', 'c', 'd']);
    expect(hammingDistance(a, b)).toBe(hammingDistance(b, a));
    expect(hammingDistance(a, new Set(['b', 'a']))).toBe(0);
  });

  it('does not validate its input', () => {
    expect(hammingDistance(new Set<unknown>([1, 'a']), new Set())).toBe(2);
    expect(hammingDistance(new Set(), new Set())).toBe(0);
  });
});

describe('hammingCoefficient', () => {
  it('normalizes by the union', () => {
    expect(hammingCoefficient(new Set([1, 2, 3, 4]), new Set([2, 3, 4, 5, 6]))).toBe(0.5);
  });

  it('normalizes by an explicit universe', () => {
    expect(hammingCoefficient(new Set([1, 2, 3, 4]), new Set([2, 3, 4, 5, 6]), range(1, 9))).toBe(0.375);
  });

  it('tolerates one empty set', () => {
    expect(hammingCoefficient(new Set(), new Set(['a', 'b']))).toBe(1);
  });
});
