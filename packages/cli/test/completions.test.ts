import { afterEach, describe, expect, it } from 'vitest';
import { completionScript, splitCommandLine } from '../src/completions.js';
import { CommandRegistry } from '../src/registry.js';
import { COMMIT_A, COMMIT_B, Harness } from './helpers.js';

describe('splitCommandLine', () => {
  it('splits on whitespace and honours quoting', () => {
    expect(splitCommandLine(`hatch  install 'my app' "a \\"b\\"" c\\ d`)).toEqual([
      'hatch',
      'install',
      'my app',
      'a "b"',
      'c d',
    ]);
  });

  it('runs an unterminated quote to the end of the line', () => {
    expect(splitCommandLine("hatch info 'org.exa")).toEqual(['hatch', 'info', 'org.exa']);
  });

  it('returns nothing for a blank line', () => {
    expect(splitCommandLine('   ')).toEqual([]);
  });
});

describe('complete', () => {
  let harness: Harness;

  afterEach(() => {
    harness.cleanup();
  });

  function addRemote() {
    const location = harness.writeRemote('origin', {
      refs: {
        'app/org.example.Editor/x86_64/stable': { commit: COMMIT_A },
        'runtime/org.example.Platform/x86_64/1.0': { commit: COMMIT_B },
      },
    });
    expect(harness.run('remote-add', 'origin', location).code).toBe(0);
  }

  it('offers visible command names matching the current word', () => {
    harness = new Harness();
    expect(harness.run('complete', 're', '', 'hatch re').out).toEqual([
      'remotes',
      'remote-add',
      'remote-delete',
      'remote-ls',
    ]);
  });

  it('offers top-level options when no command is given yet', () => {
    harness = new Harness();
    expect(harness.run('complete', '--s', 'hatch', 'hatch --s').out).toEqual([
      '--supported-arches',
      '--system',
    ]);
  });

  it('lists every option and the configured remotes for remote-ls', () => {
    harness = new Harness();
    addRemote();
    expect(harness.run('complete', '', 'remote-ls', 'hatch remote-ls ').out).toEqual([
      '--user',
      '--system',
      '--installation=',
      '--show-details',
      '-d',
      '--runtime',
      '--app',
      '--updates',
      '--arch=',
      '--verbose',
      '-v',
      '--ostree-verbose',
      'origin',
    ]);
  });

  it('drops the word being completed before handing arguments to the command', () => {
    harness = new Harness();
    addRemote();
    expect(harness.run('complete', 'o', 'remote-ls', 'hatch remote-ls o').out).toEqual(['origin']);
  });

  it('offers remote refs once a remote is named for install', () => {
    harness = new Harness();
    addRemote();
    expect(harness.run('complete', '', 'origin', 'hatch install origin ').out).toEqual([
      'app/org.example.Editor/x86_64/stable',
      'runtime/org.example.Platform/x86_64/1.0',
    ]);
  });

  it('completes shell names for the completion command', () => {
    harness = new Harness();
    expect(harness.run('complete', 'z', 'completion', 'hatch completion z').out).toEqual(['zsh']);
  });

  it('falls back to global options for commands without a completer', () => {
    const registry = new CommandRegistry([
      { kind: 'command', command: { name: 'frob', description: 'Frob', run: () => undefined } },
    ]);
    harness = new Harness({ registry });
    expect(harness.run('complete', '--v', 'frob', 'hatch frob --v').out).toEqual(['--verbose']);
  });

  it('stays silent when the partial input cannot be parsed', () => {
    harness = new Harness();
    const result = harness.run(
      'complete',
      '',
      '--installation=nope',
      'hatch remote-ls --installation=nope ',
    );
    expect(result).toEqual({ code: 0, out: [], err: [], logs: [] });
  });
});

describe('completion scripts', () => {
  it('hooks bash completion up to the complete command', () => {
    const script = completionScript('bash', 'hatch');
    expect(script.split('\n')).toContain('complete -F _hatch_complete hatch');
    expect(script).toContain('$(hatch complete "$cur" "$prev" "${COMP_LINE:0:$COMP_POINT}")');
  });

  it('declares the zsh completion function', () => {
    expect(completionScript('zsh', 'hatch').split('\n')[0]).toBe('#compdef hatch');
  });

  it('writes a single fish completion rule', () => {
    expect(completionScript('fish', 'hatch')).toBe(
      `complete -c hatch -f -a '(hatch complete (commandline -ct) "" (commandline -cp))'\n`,
    );
  });

  it('prints the script through the completion command', () => {
    const harness = new Harness();
    try {
      const result = harness.run('completion', 'zsh');
      expect(result.code).toBe(0);
      expect(result.out[0]).toBe('#compdef hatch');
      expect(harness.run('completion', 'tcsh')).toMatchObject({
        code: 1,
        err: [
          "error: Unsupported shell tcsh, expected one of: bash, zsh, fish\n\nSee 'hatch completion --help'",
        ],
      });
    } finally {
      harness.cleanup();
    }
  });
});
