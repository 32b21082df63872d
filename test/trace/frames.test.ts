/**
 * Unit tests for call stack normalization
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { bashShell, fishShell, zshShell } from '../../src/shells/index.js';
import { describeFrame, normalizeCallStack, resolveFramePath } from '../../src/trace/frames.js';

// Keep reported paths as-is so expectations don't depend on the filesystem
const keepPath = () => null;

describe('normalizeCallStack', () => {
  describe('bash', () => {
    it('skips the helper frame and decodes the rest', () => {
      const raw = [
        '/opt/tracepoint.bash:24:tracedbg_tracepoint',
        './run.sh:9:greet',
        './run.sh:15:main_loop',
        './run.sh:20:main',
      ].join('\n');

      const { frames, errors } = normalizeCallStack(bashShell, raw, { resolvePath: keepPath });

      expect(errors).toEqual([]);
      expect(frames).toEqual([
        { file: './run.sh', line: 9, function: 'greet' },
        { file: './run.sh', line: 15, function: 'main_loop' },
        { file: './run.sh', line: 20, function: '<script>' },
      ]);
    });

    it('drops a truncated record and keeps the others', () => {
      const raw = ['helper:1:tracedbg_tracepoint', 'a.sh:3:f', 'a.sh:7:main', 'a.sh:'].join('\n');

      const { frames, errors } = normalizeCallStack(bashShell, raw, { resolvePath: keepPath });

      expect(frames).toHaveLength(2);
      expect(errors).toHaveLength(1);
      expect(errors[0].record).toBe('a.sh:');
    });

    it('returns an empty stack for empty input', () => {
      expect(normalizeCallStack(bashShell, '', { resolvePath: keepPath })).toEqual({ frames: [], errors: [] });
    });

    it('returns an empty stack when only the helper frame is present', () => {
      const { frames } = normalizeCallStack(bashShell, 'helper:1:tracedbg_tracepoint\n', { resolvePath: keepPath });
      expect(frames).toEqual([]);
    });
  });

  describe('zsh', () => {
    it('decodes funcfiletrace records', () => {
      const raw = ['/opt/tracepoint.zsh:20:tracedbg_tracepoint', 'run.zsh:8:greet', 'run.zsh:21:<script>'].join('\n');

      const { frames } = normalizeCallStack(zshShell, raw, { resolvePath: keepPath });

      expect(frames).toEqual([
        { file: 'run.zsh', line: 8, function: 'greet' },
        { file: 'run.zsh', line: 21, function: '<script>' },
      ]);
    });
  });

  describe('fish', () => {
    it('decodes a joined status stack-trace', () => {
      const raw = [
        'in command substitution',
        'called on line 16 of file /opt/tracepoint.fish',
        "in function 'tracedbg_tracepoint' with arguments 'start'",
        'called on line 21 of file run.fish',
      ].join(';');

      const { frames } = normalizeCallStack(fishShell, raw, { resolvePath: keepPath });

      expect(frames).toEqual([{ file: 'run.fish', line: 21, function: '<script>' }]);
    });
  });

  describe('path resolution', () => {
    it('passes the working directory to the resolver', () => {
      const seen: string[] = [];
      normalizeCallStack(bashShell, 'h:1:x\nrun.sh:2:main', {
        cwd: '/work',
        resolvePath: (file, cwd) => {
          seen.push(`${cwd}|${file}`);
          return `/resolved/${file}`;
        },
      });
      expect(seen).toEqual(['/work|run.sh']);
    });

    it('uses the resolved path when there is one', () => {
      const { frames } = normalizeCallStack(bashShell, 'h:1:x\nrun.sh:2:main', {
        resolvePath: () => '/abs/run.sh',
      });
      expect(frames[0].file).toBe('/abs/run.sh');
    });
  });
});

describe('resolveFramePath', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tracedbg-')));
    fs.writeFileSync(path.join(dir, 'run.sh'), 'echo hi\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('resolves relative paths against cwd', () => {
    expect(resolveFramePath('run.sh', dir)).toBe(path.join(dir, 'run.sh'));
  });

  it('returns null for missing files', () => {
    expect(resolveFramePath('missing.sh', dir)).toBeNull();
  });
});

describe('describeFrame', () => {
  it('shows function, file name and line', () => {
    expect(describeFrame({ file: '/src/run.sh', line: 12, function: 'greet' })).toBe('greet (run.sh:12)');
  });
});
