// Control actions decoded from the remote

export const CONTROL_ACTIONS = [
  'volumeUp',
  'volumeDown',
  'muteToggle',
  'topologyNext',
  'topologyPrev',
  'sourceNext',
  'sourcePrev',
  'balanceLeft',
  'balanceRight',
  'trackPlay',
  'trackNext',
  'trackPrev',
  'trackStop',
  'menu',
  'navUp',
  'navDown',
  'navSelect',
  'navExit',
] as const;

export type ControlAction = (typeof CONTROL_ACTIONS)[number];

/** Actions that change nothing here and are only handed on */
export type PassThroughAction = Extract<
  ControlAction,
  'trackPlay' | 'trackNext' | 'trackPrev' | 'trackStop' | 'menu' | 'navUp' | 'navDown' | 'navSelect' | 'navExit'
>;

/** Actions that keep firing while their key is held */
export const REPEATABLE_ACTIONS: readonly ControlAction[] = ['volumeUp', 'volumeDown', 'balanceLeft', 'balanceRight'];

export function isControlAction(value: string): value is ControlAction {
  return CONTROL_ACTIONS.some(action => action === value);
}
