/**
 * End-to-end tests for one tracepoint hit, with a scripted terminal
 */

import { describe, it, expect } from 'vitest';
import { runDebugger, type DebuggerDeps } from '../src/debugger.js';
import { createLogger } from '../src/logger.js';
import { NoTerminalError, UnknownShellError } from '../src/errors.js';
import { PLAIN_THEME } from '../src/ui/theme.js';
import { INPUT, ScriptedTerminal } from './helpers/session.js';

interface Harness {
  deps: DebuggerDeps;
  output: string[];
  terminals: ScriptedTerminal[];
}

function harness(env: NodeJS.ProcessEnv, keys: string[] = []): Harness {
  const output: string[] = [];
  const terminals: ScriptedTerminal[] = [];
  return {
    output,
    terminals,
    deps: {
      env,
      stdout: { write: (chunk: string) => output.push(chunk) },
      openTerminal: () => {
        const terminal = new ScriptedTerminal(keys);
        terminals.push(terminal);
        return terminal;
      },
      logger: createLogger({ logLevel: 'silent' }),
      resolvePath: () => null,
      readSource: () => {
        throw new Error('ENOENT');
      },
      theme: PLAIN_THEME,
    },
  };
}

const BASH_STACK = ['/opt/tracepoint.bash:24:tracedbg_tracepoint', 'run.sh:9:greet', 'run.sh:20:main'].join('\n');

describe('runDebugger', () => {
  it('terminates the script after q, right, enter in next mode at top level', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'next' }, ['q', INPUT.right, INPUT.enter]);

    const decision = await runDebugger(
      { shell: 'bash', tracepoint: 'start', callStack: '/opt/tracepoint.bash:24:tracedbg_tracepoint' },
      deps
    );

    expect(decision).toBe('terminate');
    expect(output).toEqual(['exit 1\n']);
  });

  it('terminates from next mode with an empty stack', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'next' }, ['q', INPUT.left, INPUT.enter]);

    expect(await runDebugger({ shell: 'zsh', tracepoint: 'start', callStack: '' }, deps)).toBe('terminate');
    expect(output).toEqual(['exit 1\n']);
  });

  it('stops at consecutive tracepoints in all mode without touching the variable', async () => {
    const env = { TRACEDBG_TRACEPOINT: 'all' };
    const first = harness(env, ['c']);
    const second = harness(env, ['c']);

    expect(await runDebugger({ shell: 'bash', tracepoint: 'start', callStack: '' }, first.deps)).toBe('resume');
    expect(await runDebugger({ shell: 'bash', tracepoint: 'end', callStack: '' }, second.deps)).toBe('resume');
    expect([...first.output, ...second.output]).toEqual(['', '']);
  });

  it('keeps the well-formed frames of a partly truncated stack', async () => {
    const { deps, terminals } = harness({ TRACEDBG_TRACEPOINT: 'otherfunc' }, [INPUT.tab, 'c']);
    const callStack = ['helper:5:tracedbg_tracepoint', 'run.sh:4:otherfunc', 'run.sh:12:main', 'run.sh:1'].join('\n');

    expect(await runDebugger({ shell: 'bash', tracepoint: 'otherfunc', callStack }, deps)).toBe('resume');

    const frame = terminals[0].lastFrame;
    expect(frame.find((line) => line.includes('#0 '))).toContain('#0 otherfunc');
    expect(frame.find((line) => line.includes('#1 '))).toContain('#1 <script>');
    expect(frame.some((line) => line.includes('#2 '))).toBe(false);
  });

  it('disarms next mode when the script continues', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'next' }, ['c']);

    await runDebugger({ shell: 'bash', tracepoint: 'greet', callStack: BASH_STACK }, deps);

    expect(output).toEqual(['unset TRACEDBG_TRACEPOINT\n']);
  });

  it('uses the fish syntax for fish', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'next' }, ['c']);

    await runDebugger({ shell: 'fish', tracepoint: 'greet', callStack: '' }, deps);

    expect(output).toEqual(['set -e TRACEDBG_TRACEPOINT\n']);
  });

  it('leaves a named mode unchanged on continue', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'greet' }, ['c']);

    const decision = await runDebugger({ shell: 'zsh', tracepoint: 'greet', callStack: '' }, deps);

    expect(decision).toBe('resume');
    expect(output).toEqual(['']);
  });

  it('does nothing when the tracepoint does not match', async () => {
    const { deps, output, terminals } = harness({ TRACEDBG_TRACEPOINT: 'done' });

    const decision = await runDebugger({ shell: 'bash', tracepoint: 'greet', callStack: BASH_STACK }, deps);

    expect(decision).toBeNull();
    expect(output).toEqual([]);
    expect(terminals).toHaveLength(0);
  });

  it('does nothing when tracing is disabled', async () => {
    const { deps, output } = harness({});

    expect(await runDebugger({ shell: 'bash', tracepoint: 'greet', callStack: '' }, deps)).toBeNull();
    expect(output).toEqual([]);
  });

  it('rejects an unknown shell before writing anything', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'all' });

    await expect(runDebugger({ shell: 'tcsh', tracepoint: 'greet', callStack: '' }, deps)).rejects.toThrow(
      UnknownShellError
    );
    expect(output).toEqual([]);
  });

  it('writes nothing when the terminal cannot be opened', async () => {
    const { deps, output } = harness({ TRACEDBG_TRACEPOINT: 'all' });
    deps.openTerminal = () => {
      throw new NoTerminalError('/dev/tty is not a terminal');
    };

    await expect(runDebugger({ shell: 'bash', tracepoint: 'greet', callStack: '' }, deps)).rejects.toThrow(
      'No interactive terminal available: /dev/tty is not a terminal'
    );
    expect(output).toEqual([]);
  });

  it('shows the normalized stack in the session', async () => {
    const { deps, terminals } = harness({ TRACEDBG_TRACEPOINT: 'all' }, [INPUT.tab, 'c']);

    await runDebugger({ shell: 'bash', tracepoint: 'greet', callStack: BASH_STACK }, deps);

    const frame = terminals[0].lastFrame;
    expect(frame.find((line) => line.includes('#0 '))).toContain('#0 greet');
    expect(frame.find((line) => line.includes('#1 '))).toContain('#1 <script>');
  });
});
