import { describe, it, expect } from 'vitest';
import jStat from 'jstat';
import { SignificanceTester, foldEnrichment } from '../../statistics/SignificanceTester';
import { CompositionNullModel, UniformNullModel } from '../../statistics/NullModel';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/errors';

const P_SEQ_SIX_MER = 1 - Math.pow(1 - 0.000244140625, 15);

describe('SignificanceTester', () => {
  it('should refuse an empty pool', () => {
    const error = captureError(() => new SignificanceTester(new UniformNullModel(), 20, 0));
    expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG, context: { sequenceCount: 0 } });
  });

  it('should compute the binomial exceedance p-value', () => {
    const tester = new SignificanceTester(new UniformNullModel(), 20, 10);
    const result = tester.testMotif('ACGTAC', 5);

    let expected = 0;
    for (let k = 5; k <= 10; k++) {
      expected += jStat.binomial.pdf(k, 10, P_SEQ_SIX_MER);
    }

    expect(result.observedCount).toBe(5);
    expect(result.pValue).toBeGreaterThan(0);
    expect(result.pValue).toBeLessThan(1e-8);
    expect(result.pValue / expected).toBeCloseTo(1, 6);
    expect(result.foldEnrichment).toBeCloseTo(5 / (10 * P_SEQ_SIX_MER), 6);
  });

  it('should give identical results on repeated calls', () => {
    const tester = new SignificanceTester(new UniformNullModel(), 20, 10);
    expect(tester.testMotif('ACGTAC', 5)).toEqual(tester.testMotif('TTTTTT', 5));
    expect(new SignificanceTester(new UniformNullModel(), 20, 10).testMotif('ACGTAC', 5)).toEqual(
      tester.testMotif('ACGTAC', 5)
    );
  });

  it('should shrink the p-value as the observed count grows', () => {
    const tester = new SignificanceTester(new UniformNullModel(), 40, 50);
    const p2 = tester.testMotif('ACGTA', 2).pValue;
    const p4 = tester.testMotif('ACGTA', 4).pValue;
    const p8 = tester.testMotif('ACGTA', 8).pValue;

    expect(p2).toBeGreaterThan(p4);
    expect(p4).toBeGreaterThan(p8);
    expect(p2).toBeLessThanOrEqual(1);
  });

  it('should use the support set size as the observed count', () => {
    const tester = new SignificanceTester(new UniformNullModel(), 20, 10);
    const result = tester.test({ motif: 'ACGTAC', support: new Set(['a', 'b', 'c']) });

    expect(result).toEqual(tester.testMotif('ACGTAC', 3));
  });

  it('should report infinite enrichment when nothing is expected', () => {
    const model = new CompositionNullModel({ A: 0.5, C: 0, G: 0, T: 0.5 });
    const result = new SignificanceTester(model, 20, 10).testMotif('GGG', 2);

    expect(result.expectedCount).toBe(0);
    expect(result.foldEnrichment).toBe(Infinity);
    expect(result.pValue).toBe(0);
  });
});

describe('foldEnrichment', () => {
  it('should divide observed by expected', () => {
    expect(foldEnrichment(6, 2)).toBe(3);
    expect(foldEnrichment(0, 2)).toBe(0);
    expect(foldEnrichment(3, 0)).toBe(Infinity);
  });
});
