import { describe, expect, it } from 'vitest';
import { BALANCED_HARDWARE, HARDWARE } from '../../__tests__/fixtures';
import { describeProblems, synthesize } from '../synthesizer';
import { CorrectionMode, InputSource, PipelineDescription, TOPOLOGIES } from '../types';

/**********************************************************************************/
/*                                                                                */
/*                                 Test Helpers                                   */
/*                                                                                */
/**********************************************************************************/

function onlyMixer(description: PipelineDescription) {
  const names = Object.keys(description.mixers);
  expect(names).toHaveLength(1);
  return description.mixers[names[0]];
}

const SOURCES: InputSource[] = ['stream', 'direct'];
const CORRECTIONS: CorrectionMode[] = ['none', 'drc'];

/**********************************************************************************/
/*                                                                                */
/*                                   Scenarios                                    */
/*                                                                                */
/**********************************************************************************/

describe('synthesize', () => {
  it('builds 2.1 with room correction from the stream source', () => {
    const description = synthesize(
      { topology: '2.1', source: 'stream', correction: 'drc', sourceLabel: 'Stream' },
      HARDWARE
    );

    expect(description.devices.capture).toEqual({
      type: 'Alsa',
      device: 'hw:Loopback,1',
      channels: 2,
      format: 'S32LE',
      retryOnError: false,
      avoidBlockingRead: false,
      extra: {},
    });
    expect(description.devices.samplerate).toBe(44100);

    const mixer = description.mixers['Stream-2.1'];
    expect(mixer.channels).toEqual({ in: 2, out: 4 });
    expect(mixer.mapping.map(m => m.destination)).toEqual([0, 1, 2]);
    expect(mixer.mapping[2].sources).toEqual([
      { sourceChannel: 0, gain: 0.0, inverted: false, muted: false },
      { sourceChannel: 1, gain: 0.0, inverted: false, muted: false },
    ]);

    expect(Object.keys(description.filters).sort()).toEqual(
      ['delay', 'drc_0', 'drc_1', 'highpass', 'lowpass', 'volume']
    );
    expect(description.filters.drc_1).toEqual({
      kind: 'convolution',
      filename: '/etc/dsp-remote/filters/drc.wav',
      channel: 1,
    });
    expect(description.filters.lowpass).toEqual({ kind: 'crossover', pass: 'lowpass', freq: 80, order: 8 });
    expect(description.filters.highpass).toEqual({ kind: 'crossover', pass: 'highpass', freq: 80, order: 8 });
    expect(description.filters.delay).toEqual({ kind: 'delay', delay: 9.2, unit: 'ms', subsample: false });

    expect(description.pipeline).toEqual([
      { kind: 'filter', channel: 0, names: ['volume', 'drc_0'] },
      { kind: 'filter', channel: 1, names: ['volume', 'drc_1'] },
      { kind: 'mixer', name: 'Stream-2.1' },
      { kind: 'filter', channel: 0, names: ['highpass', 'delay'] },
      { kind: 'filter', channel: 1, names: ['highpass', 'delay'] },
      { kind: 'filter', channel: 2, names: ['lowpass'] },
    ]);
  });

  it('builds plain stereo from the direct source', () => {
    const description = synthesize({ topology: '2.0', source: 'direct', correction: 'none' }, HARDWARE);

    expect(description.devices.capture.device).toBe('hw:Test,0');
    expect(description.devices.capture.channels).toBe(4);
    expect(Object.keys(description.filters)).toEqual(['volume']);

    const mixer = description.mixers['direct-2.0'];
    expect(mixer.channels).toEqual({ in: 4, out: 4 });
    expect(mixer.mapping).toEqual([
      { destination: 0, muted: false, sources: [{ sourceChannel: 2, gain: 0.0, inverted: false, muted: false }] },
      { destination: 1, muted: false, sources: [{ sourceChannel: 3, gain: 0.0, inverted: false, muted: false }] },
    ]);

    expect(description.pipeline).toEqual([
      { kind: 'filter', channel: 2, names: ['volume'] },
      { kind: 'filter', channel: 3, names: ['volume'] },
      { kind: 'mixer', name: 'direct-2.0' },
    ]);
  });

  it('downmixes both inputs to each satellite at -6 dB for Mono', () => {
    const mixer = onlyMixer(synthesize({ topology: 'Mono', source: 'stream', correction: 'none' }, HARDWARE));

    expect(mixer.mapping).toHaveLength(2);
    for (const destination of mixer.mapping) {
      expect(destination.sources.map(s => [s.sourceChannel, s.gain])).toEqual([[0, -6.0], [1, -6.0]]);
    }
  });

  it('feeds two subwoofers 1:1 for 2.2', () => {
    const description = synthesize({ topology: '2.2', source: 'direct', correction: 'none' }, HARDWARE);
    const mixer = onlyMixer(description);

    expect(mixer.mapping.slice(2)).toEqual([
      { destination: 2, muted: false, sources: [{ sourceChannel: 2, gain: 0.0, inverted: false, muted: false }] },
      { destination: 3, muted: false, sources: [{ sourceChannel: 3, gain: 0.0, inverted: false, muted: false }] },
    ]);
    expect(description.pipeline.slice(-2)).toEqual([
      { kind: 'filter', channel: 2, names: ['lowpass'] },
      { kind: 'filter', channel: 3, names: ['lowpass'] },
    ]);
  });

  it('appends balance filters after correction when provisioned', () => {
    const description = synthesize({ topology: '2.1', source: 'stream', correction: 'drc' }, BALANCED_HARDWARE);

    expect(description.filters.balance0).toEqual({ kind: 'gain', gain: 0.0, inverted: false });
    expect(description.filters.balance1).toEqual({ kind: 'gain', gain: 0.0, inverted: false });
    expect(description.pipeline.slice(0, 2)).toEqual([
      { kind: 'filter', channel: 0, names: ['volume', 'drc_0', 'balance0'] },
      { kind: 'filter', channel: 1, names: ['volume', 'drc_1', 'balance1'] },
    ]);
  });

  it('is deterministic and does not touch the hardware parameters', () => {
    const hardware = { ...HARDWARE };
    const first = synthesize({ topology: '2.2', source: 'stream', correction: 'drc' }, hardware);
    const second = synthesize({ topology: '2.2', source: 'stream', correction: 'drc' }, hardware);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(hardware).toEqual(HARDWARE);
  });
});

/**********************************************************************************/
/*                                                                                */
/*                                  Consistency                                   */
/*                                                                                */
/**********************************************************************************/

describe('describeProblems', () => {
  it('finds no problems in any topology, source and correction combination', () => {
    for (const topology of TOPOLOGIES) {
      for (const source of SOURCES) {
        for (const correction of CORRECTIONS) {
          for (const hardware of [HARDWARE, BALANCED_HARDWARE]) {
            const description = synthesize({ topology, source, correction }, hardware);
            expect(describeProblems(description), `${topology}/${source}/${correction}`).toEqual([]);

            const mixer = onlyMixer(description);
            expect(mixer.channels.in).toBe(description.devices.capture.channels);
            expect(mixer.channels.out).toBe(description.devices.playback.channels);
          }
        }
      }
    }
  });

  it('reports subwoofer channels the playback device does not have', () => {
    const description = synthesize(
      { topology: '2.1', source: 'stream', correction: 'none' },
      { ...HARDWARE, playbackChannels: 2 }
    );

    expect(describeProblems(description)).toEqual([
      'mixer "stream-2.1": destination 2 out of range',
      'pipeline[5]: channel 2 out of range (2 channels)',
    ]);
  });

  it('reports filter references missing from the filter bank', () => {
    const description = synthesize({ topology: '2.0', source: 'stream', correction: 'none' }, HARDWARE);
    delete description.filters.volume;

    expect(describeProblems(description)).toEqual([
      'pipeline[0]: unknown filter "volume"',
      'pipeline[1]: unknown filter "volume"',
    ]);
  });

  it('reports an unknown mixer', () => {
    const description = synthesize({ topology: '2.0', source: 'stream', correction: 'none' }, HARDWARE);
    description.pipeline[2] = { kind: 'mixer', name: 'missing' };

    expect(describeProblems(description)).toEqual(['pipeline[2]: unknown mixer "missing"']);
  });

  it('does not range-check steps behind an unknown mixer', () => {
    const description = synthesize({ topology: '2.1', source: 'stream', correction: 'none' }, HARDWARE);
    description.pipeline[2] = { kind: 'mixer', name: 'missing' };

    expect(description.pipeline[5]).toEqual({ kind: 'filter', channel: 2, names: ['lowpass'] });
    expect(describeProblems(description)).toEqual(['pipeline[2]: unknown mixer "missing"']);
  });
});
