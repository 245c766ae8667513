import type { MenuDefinition } from '../pipeline/catalog';
import type { HardwareParams } from '../pipeline/types';

/** Hardware used across tests: 4-channel card, 80 Hz crossover, 9.2 ms mains delay */
export const HARDWARE: HardwareParams = {
  playbackDevice: 'hw:Test,0',
  playbackChannels: 4,
  loopbackDevice: 'hw:Loopback,1',
  sampleFormat: 'S32LE',
  sampleRate: 44100,
  crossoverFrequency: 80,
  mainsDelay: 9.2,
  correctionFilterPath: '/etc/dsp-remote/filters/drc.wav',
  balance: false,
};

export const BALANCED_HARDWARE: HardwareParams = { ...HARDWARE, balance: true };

export const MENU: MenuDefinition = {
  topologies: [
    { label: '2.1 DRC', topology: '2.1', correction: 'drc' },
    { label: '2.1', topology: '2.1', correction: 'none' },
    { label: '2.0', topology: '2.0', correction: 'none' },
    { label: 'Mono', topology: 'Mono', correction: 'none' },
  ],
  sources: [
    { label: 'Stream', source: 'stream' },
    { label: 'Phono', source: 'direct' },
  ],
};
