/**
 * Unit tests for trace mode resolution
 */

import { describe, it, expect } from 'vitest';
import {
  DISABLED,
  describeTraceMode,
  modeAfterStop,
  parseTraceMode,
  resolveTraceMode,
  sameTraceMode,
  shouldStop,
  traceModeValue,
  type TraceMode,
} from '../../src/session/trace-mode.js';

describe('parseTraceMode', () => {
  it('treats unset and empty as disabled', () => {
    expect(parseTraceMode(undefined)).toEqual(DISABLED);
    expect(parseTraceMode('')).toEqual(DISABLED);
  });

  it('recognizes the reserved values', () => {
    expect(parseTraceMode('all')).toEqual({ kind: 'all' });
    expect(parseTraceMode('next')).toEqual({ kind: 'next' });
  });

  it('treats anything else as a tracepoint name, matched exactly', () => {
    expect(parseTraceMode('greet')).toEqual({ kind: 'named', name: 'greet' });
    expect(parseTraceMode('ALL')).toEqual({ kind: 'named', name: 'ALL' });
    expect(parseTraceMode(' next')).toEqual({ kind: 'named', name: ' next' });
  });
});

describe('shouldStop', () => {
  const cases: Array<[TraceMode, string, boolean]> = [
    [DISABLED, 'greet', false],
    [{ kind: 'named', name: 'greet' }, 'greet', true],
    [{ kind: 'named', name: 'greet' }, 'done', false],
    [{ kind: 'next' }, 'anything', true],
    [{ kind: 'all' }, 'anything', true],
  ];

  it.each(cases)('%o at "%s" stops: %s', (mode, tracepoint, expected) => {
    expect(shouldStop(mode, tracepoint)).toBe(expected);
  });
});

describe('modeAfterStop', () => {
  it('disarms next', () => {
    expect(modeAfterStop({ kind: 'next' })).toEqual(DISABLED);
  });

  it('leaves all and named unchanged', () => {
    expect(modeAfterStop({ kind: 'all' })).toEqual({ kind: 'all' });
    expect(modeAfterStop({ kind: 'named', name: 'x' })).toEqual({ kind: 'named', name: 'x' });
  });
});

describe('resolveTraceMode', () => {
  it('does not stop or change anything when disabled', () => {
    expect(resolveTraceMode(undefined, 'greet')).toEqual({ mode: DISABLED, stop: false, after: DISABLED });
  });

  it('keeps a non-matching named mode as it is', () => {
    const named: TraceMode = { kind: 'named', name: 'done' };
    expect(resolveTraceMode('done', 'greet')).toEqual({ mode: named, stop: false, after: named });
  });

  it('stops once in next mode, then not again', () => {
    const first = resolveTraceMode('next', 'start');
    expect(first.stop).toBe(true);
    expect(first.after).toEqual(DISABLED);

    const second = resolveTraceMode(traceModeValue(first.after), 'greet');
    expect(second.stop).toBe(false);
  });

  it('stops at every tracepoint in all mode', () => {
    const first = resolveTraceMode('all', 'start');
    const second = resolveTraceMode(traceModeValue(first.after), 'greet');
    expect(first.stop).toBe(true);
    expect(second.stop).toBe(true);
  });
});

describe('sameTraceMode', () => {
  it('compares names for named modes', () => {
    expect(sameTraceMode({ kind: 'named', name: 'a' }, { kind: 'named', name: 'a' })).toBe(true);
    expect(sameTraceMode({ kind: 'named', name: 'a' }, { kind: 'named', name: 'b' })).toBe(false);
  });

  it('compares kinds otherwise', () => {
    expect(sameTraceMode({ kind: 'next' }, DISABLED)).toBe(false);
    expect(sameTraceMode({ kind: 'all' }, { kind: 'all' })).toBe(true);
  });
});

describe('traceModeValue', () => {
  it('maps modes to control values', () => {
    expect(traceModeValue(DISABLED)).toBeUndefined();
    expect(traceModeValue({ kind: 'next' })).toBe('next');
    expect(traceModeValue({ kind: 'named', name: 'greet' })).toBe('greet');
  });
});

describe('describeTraceMode', () => {
  it('describes each mode', () => {
    expect(describeTraceMode(DISABLED)).toBe('disabled');
    expect(describeTraceMode({ kind: 'all' })).toBe('all tracepoints');
    expect(describeTraceMode({ kind: 'next' })).toBe('next tracepoint only');
    expect(describeTraceMode({ kind: 'named', name: 'greet' })).toBe('tracepoint "greet"');
  });
});
