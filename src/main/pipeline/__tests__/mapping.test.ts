import { describe, expect, it } from 'vitest';
import { buildMapping } from '../mapping';

describe('buildMapping', () => {
  it('feeds every input into every destination when downmixing', () => {
    const mapping = buildMapping([0, 1], [2, 3], true, -6.0);

    expect(mapping).toEqual([
      {
        destination: 0,
        muted: false,
        sources: [
          { sourceChannel: 2, gain: -6.0, inverted: false, muted: false },
          { sourceChannel: 3, gain: -6.0, inverted: false, muted: false },
        ],
      },
      {
        destination: 1,
        muted: false,
        sources: [
          { sourceChannel: 2, gain: -6.0, inverted: false, muted: false },
          { sourceChannel: 3, gain: -6.0, inverted: false, muted: false },
        ],
      },
    ]);
  });

  it('produces N mappings of M rules for N destinations and M inputs', () => {
    const mapping = buildMapping([0, 1, 2], [0, 1, 2, 3, 4], true);

    expect(mapping).toHaveLength(3);
    for (const destination of mapping) {
      expect(destination.sources).toHaveLength(5);
    }
  });

  it('pairs destinations and inputs 1:1 at 0 dB without downmix', () => {
    const mapping = buildMapping([2, 3], [0, 1], false, -6.0);

    expect(mapping).toEqual([
      { destination: 2, muted: false, sources: [{ sourceChannel: 0, gain: 0.0, inverted: false, muted: false }] },
      { destination: 3, muted: false, sources: [{ sourceChannel: 1, gain: 0.0, inverted: false, muted: false }] },
    ]);
  });

  it('stops at the shorter list when lengths differ', () => {
    expect(buildMapping([0, 1, 2], [5, 6], false).map(m => m.destination)).toEqual([0, 1]);
    expect(buildMapping([0], [5, 6], false)).toEqual([
      { destination: 0, muted: false, sources: [{ sourceChannel: 5, gain: 0.0, inverted: false, muted: false }] },
    ]);
  });

  it('keeps destination order', () => {
    expect(buildMapping([3, 0, 2], [0], true).map(m => m.destination)).toEqual([3, 0, 2]);
  });

  it('does not modify its inputs', () => {
    const destinations = [0, 1];
    const inputs = [0, 1];
    buildMapping(destinations, inputs, true, -3);

    expect(destinations).toEqual([0, 1]);
    expect(inputs).toEqual([0, 1]);
  });
});
