import {
  createRng,
  randomBool,
  randomChoice,
  randomInt,
  restoreRng,
} from '../../src/utils/random';
import type { RandomFn, RandomState, SeededRandom } from '../../src/utils/random';
import { scriptedRng } from './test-helpers';

describe('random helpers', () => {
  it('createRng is deterministic per seed and accepts numbers or strings', () => {
    const a = createRng(23);
    const b = createRng('23');
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    expect(createRng(1)()).not.toBe(createRng(2)());
  });

  it('createRng yields a stateful generator usable wherever a RandomFn is expected', () => {
    // Arrange
    const seeded: SeededRandom = createRng(5);
    const asRandom: RandomFn = seeded;
    // Act
    const state: RandomState = seeded.state();
    const draw = asRandom();
    // Assert
    expect(state.S).toHaveLength(256);
    expect(restoreRng(state)()).toBe(draw);
  });

  it('restoreRng continues exactly where the snapshot was taken', () => {
    // Arrange
    const rng = createRng('snapshot');
    rng();
    const state = rng.state();
    // Act
    const expected = [rng(), rng()];
    const restored = restoreRng(state);
    // Assert
    expect([restored(), restored()]).toEqual(expected);
  });

  it('randomBool compares the draw strictly against the probability', () => {
    expect(randomBool(scriptedRng([0.5]), 0.5)).toBe(false);
    expect(randomBool(scriptedRng([0.49]), 0.5)).toBe(true);
    expect(randomBool(scriptedRng([0]), 0)).toBe(false);
  });

  it('randomInt maps the draw onto a half-open range', () => {
    expect(randomInt(scriptedRng([0]), 1, 4)).toBe(1);
    expect(randomInt(scriptedRng([0.999]), 1, 4)).toBe(3);
    expect(randomInt(scriptedRng([0.5]), 0, 1)).toBe(0);
  });

  it('randomChoice picks by scaled index', () => {
    expect(randomChoice(scriptedRng([0.6]), ['a', 'b', 'c'])).toBe('b');
  });
});
