import { describe, expect, it } from 'vitest';
import { CONTROL_ACTIONS } from '../../control/actions';
import { DEFAULT_KEY_BINDINGS, bindingKey, mergeKeyBindings, parseBindingKey, resolveAction } from '../keybindings';

describe('bindingKey', () => {
  it('formats the page and a two-digit hex usage', () => {
    expect(bindingKey('keyboard', 0x06)).toBe('keyboard:0x06');
    expect(bindingKey('consumer', 0xe9)).toBe('consumer:0xe9');
    expect(bindingKey('consumer', 0x0223)).toBe('consumer:0x223');
  });
});

describe('parseBindingKey', () => {
  it('normalizes case, prefix and padding', () => {
    expect(parseBindingKey('keyboard:0x4B')).toBe('keyboard:0x4b');
    expect(parseBindingKey('consumer:e9')).toBe('consumer:0xe9');
    expect(parseBindingKey('Keyboard:0x6')).toBe('keyboard:0x06');
    expect(parseBindingKey('consumer:0x0223')).toBe('consumer:0x223');
  });

  it('rejects keys that name no page and usage', () => {
    expect(parseBindingKey('mouse:0x01')).toBeNull();
    expect(parseBindingKey('keyboard:')).toBeNull();
    expect(parseBindingKey('keyboard:0xzz')).toBeNull();
    expect(parseBindingKey('volumeUp')).toBeNull();
  });
});

describe('resolveAction', () => {
  it('maps the remote buttons to control actions', () => {
    expect(resolveAction({ type: 'key-press', page: 'consumer', usage: 0xe9 })).toBe('volumeUp');
    expect(resolveAction({ type: 'key-press', page: 'consumer', usage: 0xe2 })).toBe('muteToggle');
    expect(resolveAction({ type: 'key-press', page: 'keyboard', usage: 0x4b })).toBe('topologyNext');
    expect(resolveAction({ type: 'key-press', page: 'keyboard', usage: 0x37 })).toBe('sourceNext');
    expect(resolveAction({ type: 'key-press', page: 'keyboard', usage: 0x50 })).toBe('balanceLeft');
  });

  it('returns null for unbound keys', () => {
    expect(resolveAction({ type: 'key-press', page: 'keyboard', usage: 0x1e })).toBeNull();
    // Same usage on the other page
    expect(resolveAction({ type: 'key-press', page: 'keyboard', usage: 0xe9 })).toBeNull();
  });

  it('binds every action to at least one button', () => {
    const bound = new Set(DEFAULT_KEY_BINDINGS.values());

    expect(CONTROL_ACTIONS.filter(action => !bound.has(action))).toEqual([]);
  });
});

describe('mergeKeyBindings', () => {
  it('adds, replaces and removes bindings', () => {
    const merged = mergeKeyBindings({
      'keyboard:0x1e': 'muteToggle',
      'consumer:0xe9': 'topologyNext',
      'consumer:0xe2': null,
    });

    expect(merged.get('keyboard:0x1e')).toBe('muteToggle');
    expect(merged.get('consumer:0xe9')).toBe('topologyNext');
    expect(merged.has('consumer:0xe2')).toBe(false);
    expect(merged.size).toBe(DEFAULT_KEY_BINDINGS.size);
  });

  it('leaves the base bindings untouched', () => {
    mergeKeyBindings({ 'consumer:0xe2': null });

    expect(DEFAULT_KEY_BINDINGS.get('consumer:0xe2')).toBe('muteToggle');
  });
});
