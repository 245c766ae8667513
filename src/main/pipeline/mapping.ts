import { ChannelIndex, DestinationMapping } from './types';

/**
 * Build mixer mappings for a set of destination channels.
 *
 * With `downmix`, every destination receives every input channel at `gain`.
 * Without it, destinations and inputs are paired positionally and each pair
 * passes through at 0 dB; extra channels on the longer side are dropped.
 */
export function buildMapping(
  destinations: readonly ChannelIndex[],
  inputChannels: readonly ChannelIndex[],
  downmix: boolean,
  gain = 0.0
): DestinationMapping[] {
  if (downmix) {
    return destinations.map(destination => ({
      destination,
      muted: false,
      sources: inputChannels.map(sourceChannel => ({
        sourceChannel,
        gain,
        inverted: false,
        muted: false,
      })),
    }));
  }

  const count = Math.min(destinations.length, inputChannels.length);
  const mapping: DestinationMapping[] = [];
  for (let i = 0; i < count; i++) {
    mapping.push({
      destination: destinations[i],
      muted: false,
      sources: [{ sourceChannel: inputChannels[i], gain: 0.0, inverted: false, muted: false }],
    });
  }
  return mapping;
}
