/**
 * Declared sample-size bound tests
 */

import { describe, it, expect } from 'vitest';
import type { CasesControlsMetadata, CooccurrenceMetadata } from '../../../core/types/metadata.js';
import {
  checkCasesControlsSampleSize,
  checkCooccurrenceSampleSize,
  declaredSampleSize,
} from '../../../validators/sample-size-bounds.js';

describe('declaredSampleSize', () => {
  const sizes = { totalSampleSize: 100, numberOfMales: 0, numberOfFemales: null };

  it('picks the size for the stratum', () => {
    expect(declaredSampleSize(sizes, 'both')).toBe(100);
  });

  it('treats zero and null as undeclared', () => {
    expect(declaredSampleSize(sizes, 'male')).toBeNull();
    expect(declaredSampleSize(sizes, 'female')).toBeNull();
  });
});

describe('checkCasesControlsSampleSize', () => {
  const metadata: CasesControlsMetadata = {
    distinctPhenotypes: ['L20', 'L40'],
    totalCases: 35,
    totalControls: 90,
    phenotypeCounts: {
      L20: { cases: 30, controls: 80 },
      L40: { cases: 5, controls: 10 },
    },
  };

  it('lists phenotypes over the bound', () => {
    expect(checkCasesControlsSampleSize('cases_controls_male file', metadata, 100)).toBe(
      "cases_controls_male file has phenotypes where cases + controls exceed the declared sample size (100): ['L20: 110']"
    );
  });

  it('passes at the bound or without one', () => {
    expect(checkCasesControlsSampleSize('f', metadata, 110)).toBeNull();
    expect(checkCasesControlsSampleSize('f', metadata, null)).toBeNull();
  });
});

describe('checkCooccurrenceSampleSize', () => {
  const metadata: CooccurrenceMetadata = {
    distinctPhenotypes: ['L20', 'L40', 'L70'],
    totalPairs: 2,
    totalCooccurrenceCount: 123,
    phenotypePairCounts: { 'L20|L40': 120, 'L20|L70': 3 },
  };

  it('lists pairs over the bound', () => {
    expect(checkCooccurrenceSampleSize('cooccurrence_female file', metadata, 100)).toBe(
      "cooccurrence_female file has co-occurrence counts exceeding the declared sample size (100): ['(L20, L40): 120']"
    );
  });
});
