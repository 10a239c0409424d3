import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { BitBoard } from '../src/core/board';
import { computeFeatures } from '../src/solver/features';
import {
  createModelLoader,
  DEFAULT_MODEL_PATH,
  loadScoringModel,
  ModelLoadError,
  ScoringModel,
} from '../src/solver/scoring_model';

describe('loadScoringModel', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pc-model-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled weights', () => {
    const model = loadScoringModel(DEFAULT_MODEL_PATH);
    expect(model.getWeights().perfect_clear).toBe(10);
    expect(model.getWeights().holes).toBe(-4);
  });

  it('wraps a missing file in ModelLoadError', () => {
    const missing = path.join(dir, 'missing.json');
    expect(() => loadScoringModel(missing)).toThrow(ModelLoadError);
  });

  it('rejects files that are not JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ weights: ');
    expect(() => loadScoringModel(file)).toThrow(/is not JSON/);
  });

  it('rejects files with the wrong shape', () => {
    const file = path.join(dir, 'wrong.json');
    fs.writeFileSync(file, JSON.stringify({ version: 2, weights: { holes: 'many' } }));
    expect(() => loadScoringModel(file)).toThrow(/is malformed/);
  });

  it('defers loading until the loader is called', () => {
    const loader = createModelLoader(path.join(dir, 'later.json'));
    fs.writeFileSync(
      path.join(dir, 'later.json'),
      JSON.stringify({ version: 1, weights: { bias: 2 } }),
    );
    expect(loader().getWeights()).toEqual({ bias: 2 });
  });
});

describe('ScoringModel', () => {
  it('sums weighted features plus the bias', () => {
    const model = new ScoringModel({ version: 1, bias: 0.5, weights: { holes: -2, bias: 1 } });
    expect(model.evaluate({ values: { holes: 3, bias: 1, unknown: 7 } })).toBe(-4.5);
  });

  it('refuses to evaluate after dispose', () => {
    const model = new ScoringModel({ version: 1, bias: 0, weights: {} });
    model.dispose();
    expect(model.isDisposed).toBe(true);
    expect(() => model.evaluate({ values: {} })).toThrow('Scoring model used after dispose');
  });
});

describe('computeFeatures', () => {
  it('flags an empty board as a perfect clear', () => {
    const board = new BitBoard({ width: 10, height: 4 });
    const features = computeFeatures(board, 4, 4);
    expect(features.values.perfect_clear).toBe(1);
    expect(features.values.lines_cleared).toBe(1);
    expect(features.values.holes).toBe(0);
  });

  it('counts covered empty cells as holes', () => {
    const board = new BitBoard({ width: 10, height: 2 });
    board.fill(0, 1);
    const features = computeFeatures(board, 2, 0);
    expect(features.values.holes).toBe(1 / 20);
    expect(features.values.max_height).toBe(1);
    expect(features.values.perfect_clear).toBe(0);
  });
});
