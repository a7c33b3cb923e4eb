import { describe, it, expect } from 'vitest';
import { KmerMiner, validRunLengths } from '../../discovery/KmerMiner';
import { createSequencePool } from '../../core/data';
import { ErrorCode } from '../../core/errors';
import type { RunProgress } from '../../domain/types/analysis';
import { captureError } from '../utilities/errors';

const range = (minLength: number, maxLength: number, minOccurrences = 1) => ({
  minLength,
  maxLength,
  minOccurrences,
});

describe('KmerMiner', () => {
  it('should keep motifs shared by enough sequences', () => {
    const pool = createSequencePool({
      S1: 'AAAAACCCCC',
      S2: 'AAAAACCCCC',
      S3: 'GGGGGTTTTT',
    });
    const candidates = new KmerMiner(range(5, 5, 2)).run(pool);

    expect(candidates.map((c) => c.motif).sort()).toEqual([
      'AAAAA',
      'AAAAC',
      'AAACC',
      'AACCC',
      'ACCCC',
      'CCCCC',
    ]);
    for (const candidate of candidates) {
      expect([...candidate.support].sort()).toEqual(['S1', 'S2']);
    }
    expect(candidates.find((c) => c.motif === 'GGGGG')).toBeUndefined();
  });

  it('should skip windows containing invalid characters individually', () => {
    const pool = createSequencePool({ s1: 'ACGNACG', s2: 'ACGT' });
    const support = new KmerMiner(range(3, 3)).mine(pool);

    expect([...support.keys()].sort()).toEqual(['ACG', 'CGT']);
    expect([...(support.get('ACG') ?? [])].sort()).toEqual(['s1', 's2']);
    expect([...(support.get('CGT') ?? [])]).toEqual(['s2']);
  });

  it('should count repeated occurrences within a sequence once', () => {
    const pool = createSequencePool({ s1: 'ACGACGACG' });
    const support = new KmerMiner(range(3, 3)).mine(pool);

    expect(support.get('ACG')?.size).toBe(1);
  });

  it('should treat lowercase letters as outside the alphabet', () => {
    const pool = createSequencePool({ s1: 'acgtacgt' });
    expect(new KmerMiner(range(3, 4)).mine(pool).size).toBe(0);
  });

  it('should ignore sequences shorter than the motif length', () => {
    const pool = createSequencePool({ s1: 'ACG', s2: '' });
    expect(new KmerMiner(range(4, 5)).mine(pool).size).toBe(0);
  });

  it('should only produce in-range motifs over the alphabet', () => {
    const pool = createSequencePool({
      a: 'GATTACAGATTACA',
      b: 'TTAGGCNNATTACAG',
      c: 'CCATTACAGG',
    });
    const candidates = new KmerMiner(range(4, 6, 2)).run(pool);

    expect(candidates.length).toBeGreaterThan(0);
    for (const { motif, length, support } of candidates) {
      expect(length).toBe(motif.length);
      expect(length).toBeGreaterThanOrEqual(4);
      expect(length).toBeLessThanOrEqual(6);
      expect(motif).toMatch(/^[ACGT]+$/);
      expect(support.size).toBeGreaterThanOrEqual(2);
    }
  });

  it('should enforce the candidate cap', () => {
    const pool = createSequencePool({ a: 'ACGTACGT' });
    const error = captureError(() => new KmerMiner(range(3, 3), { maxCandidates: 3 }).mine(pool));

    expect(error).toMatchObject({
      code: ErrorCode.RESOURCE_LIMIT,
      context: { maxCandidates: 3, length: 3 },
    });
  });

  it('should stop when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const pool = createSequencePool({ a: 'ACGTACGT' });

    const error = captureError(() =>
      new KmerMiner(range(3, 4), { signal: controller.signal }).mine(pool)
    );
    expect(error).toMatchObject({ code: ErrorCode.CANCELLED, context: { stage: 'mining' } });
  });

  it('should report progress once per length', () => {
    const events: RunProgress[] = [];
    const pool = createSequencePool({ a: 'ACGTACGT' });
    new KmerMiner(range(3, 4), { onProgress: (p) => events.push(p) }).mine(pool);

    expect(events).toEqual([
      { stage: 'mining', progress: 0.5 },
      { stage: 'mining', progress: 1 },
    ]);
  });
});

describe('validRunLengths', () => {
  it('should reset the run at every invalid character', () => {
    expect(Array.from(validRunLengths('ANCG'))).toEqual([1, 0, 1, 2]);
    expect(Array.from(validRunLengths(''))).toEqual([]);
  });
});
