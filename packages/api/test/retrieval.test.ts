import { describe, expect, it } from 'vitest';
import { retrieve } from '../src/services/retrieval';
import { FlatInnerProductIndex } from '../src/services/vectorIndex';
import { EmbeddingFault } from '../src/utils/errors';
import { PASSAGES, SETTINGS, fakeEmbedder, stubIndex } from './helpers';

const realIndex = () =>
  new FlatInnerProductIndex(
    3,
    PASSAGES.map((passage) => passage.embedding)
  );

describe('services/retrieval', () => {
  it('normalises the query vector before searching', async () => {
    const embedder = fakeEmbedder({ abandonment: [2, 0, 0] });

    const result = await retrieve('abandonment', realIndex(), PASSAGES, embedder, SETTINGS);

    expect(embedder.embed).toHaveBeenCalledWith('abandonment');
    expect(result.bestScore).toBe(1);
    expect(result.passages).toEqual([{ passage: PASSAGES[0], score: 1 }]);
  });

  it('ranks by descending score and drops passages under the floor', async () => {
    const embedder = fakeEmbedder({ freedom: [3, 4, 0] });

    const result = await retrieve('freedom', realIndex(), PASSAGES, embedder, SETTINGS);

    expect(result.passages.map((scored) => scored.passage)).toEqual([PASSAGES[1], PASSAGES[0]]);
    expect(result.passages[0].score).toBeCloseTo(0.8);
    expect(result.passages[1].score).toBeCloseTo(0.6);
    expect(result.bestScore).toBeCloseTo(0.8);
  });

  it('reports the unfiltered best score even when every passage is dropped', async () => {
    const index = stubIndex([
      { id: 0, score: 0.2 },
      { id: 1, score: 0.1 },
    ]);

    const result = await retrieve('freedom', index, PASSAGES, fakeEmbedder(), SETTINGS);

    expect(result.bestScore).toBe(0.2);
    expect(result.passages).toEqual([]);
  });

  it('keeps only passages at or above the floor', async () => {
    const index = stubIndex([
      { id: 2, score: 0.5 },
      { id: 0, score: 0.25 },
      { id: 1, score: 0.249 },
    ]);

    const result = await retrieve('anguish', index, PASSAGES, fakeEmbedder(), SETTINGS);

    expect(result.passages).toEqual([
      { passage: PASSAGES[2], score: 0.5 },
      { passage: PASSAGES[0], score: 0.25 },
    ]);
    expect(result.passages.every((scored) => scored.score >= SETTINGS.minScore)).toBe(true);
  });

  it('defaults bestScore to zero when the search finds nothing', async () => {
    const result = await retrieve(
      'freedom',
      new FlatInnerProductIndex(3, []),
      [],
      fakeEmbedder(),
      SETTINGS
    );

    expect(result).toEqual({ passages: [], bestScore: 0 });
  });

  it('asks the index for topK neighbours', async () => {
    const index = stubIndex([]);

    await retrieve('freedom', index, PASSAGES, fakeEmbedder({}, [0, 0, 5]), { topK: 3, minScore: 0.25 });

    expect(index.search).toHaveBeenCalledWith([0, 0, 1], 3);
  });

  it('fails when a hit has no passage record', async () => {
    const index = stubIndex([{ id: 7, score: 0.9 }]);

    await expect(retrieve('freedom', index, PASSAGES, fakeEmbedder(), SETTINGS)).rejects.toThrow(
      'Index position 7 has no passage record'
    );
  });

  it('raises EmbeddingFault when the query vector does not match the index dimension', async () => {
    const index = stubIndex([{ id: 0, score: 0.9 }]);

    const error = await retrieve('freedom', index, PASSAGES, fakeEmbedder({}, [1, 0]), SETTINGS).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(EmbeddingFault);
    expect(error).toMatchObject({ message: 'Embedding service returned dimension 2, index expects 3' });
    expect(index.search).not.toHaveBeenCalled();
  });
});
