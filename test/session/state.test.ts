/**
 * Unit tests for session state
 */

import { describe, it, expect } from 'vitest';
import { collectEnvVars, cycleScreen, splitEnvValue } from '../../src/session/state.js';
import { makeSession } from '../helpers/session.js';

describe('createSession', () => {
  it('starts on the home screen with no modal', () => {
    const session = makeSession();
    expect(session.screen).toBe('home');
    expect(session.exitState).toEqual({ kind: 'none' });
    expect(session.trace.selectedFrame).toBe(0);
    expect(session.vars).toMatchObject({ selectedVar: 0, focus: 'list', detail: 'raw', selectedItem: 0 });
  });
});

describe('cycleScreen', () => {
  it('steps through the tabs in order and wraps', () => {
    expect(cycleScreen('home', 1)).toBe('trace');
    expect(cycleScreen('output', 1)).toBe('home');
    expect(cycleScreen('home', -1)).toBe('output');
  });
});

describe('collectEnvVars', () => {
  it('sorts by name and skips undefined values', () => {
    expect(collectEnvVars({ b: '2', a: '1', c: undefined })).toEqual([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
    ]);
  });
});

describe('splitEnvValue', () => {
  it('splits PATH-like values on colons', () => {
    expect(splitEnvValue('/usr/bin:/bin')).toEqual(['/usr/bin', '/bin']);
  });
});
