import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/core/errors';
import { defaultDrawConfig, validateDrawConfig } from '../../src/engine/draw-config';
import { createRng, seededShuffle } from '../../src/engine/rng';
import { makeConfig } from '../fixtures';

describe('validateDrawConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateDrawConfig(defaultDrawConfig())).not.toThrow();
  });

  it.each([
    ['sidesPerRoom', makeConfig({ sidesPerRoom: 0 }), 'sidesPerRoom must be a positive integer, got 0'],
    ['panelSize', makeConfig({ panelSize: 1.5 }), 'panelSize must be a positive integer, got 1.5'],
    ['maxSwapDistance', makeConfig({ maxSwapDistance: -2 }), 'maxSwapDistance must be a positive integer, got -2'],
    ['tieBreakSeed', makeConfig({ tieBreakSeed: 0.5 }), 'tieBreakSeed must be an integer, got 0.5'],
    ['pairingMethod', makeConfig({ pairingMethod: 'random' }), 'The random pairing method needs an explicit tieBreakSeed'],
  ])('rejects a bad %s', (_field, config, message) => {
    expect(() => validateDrawConfig(config)).toThrow(ConfigurationError);
    expect(() => validateDrawConfig(config)).toThrow(message);
  });
});

describe('rng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(123);
    const b = createRng(123);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every(x => x >= 0 && x < 1)).toBe(true);
  });

  it('shuffles into a new array without touching the input', () => {
    const items = [1, 2, 3, 4, 5];
    const shuffled = seededShuffle(items, createRng(9));

    expect(items).toEqual([1, 2, 3, 4, 5]);
    expect([...shuffled].sort((x, y) => x - y)).toEqual(items);
    expect(seededShuffle(items, createRng(9))).toEqual(shuffled);
  });
});
