import type { RemoteSummary } from '@hatch/shared-types';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalPackageManager } from '../src/packages.js';
import { COMMIT_A, COMMIT_B, COMMIT_C, Harness } from './helpers.js';

const NOW = new Date(Date.UTC(2024, 4, 10, 12, 0, 0));

const EDITOR = 'app/org.example.Editor/x86_64/stable';
const EDITOR_BETA = 'app/org.example.Editor/x86_64/beta';
const EDITOR_I386 = 'app/org.example.Editor/i386/stable';
const PLATFORM = 'runtime/org.example.Platform/x86_64/1.0';

function summary(editorCommit = COMMIT_A): RemoteSummary {
  return {
    title: 'Example',
    refs: {
      [EDITOR]: { commit: editorCommit, installed_size: 1_500_000, download_size: 500_000 },
      [EDITOR_I386]: { commit: COMMIT_A },
      [EDITOR_BETA]: { commit: COMMIT_A },
      [PLATFORM]: { commit: COMMIT_B },
    },
  };
}

describe('package commands', () => {
  let harness: Harness;
  let location: string;

  beforeEach(() => {
    harness = new Harness({
      now: NOW,
      services: { packages: new LocalPackageManager(undefined, () => NOW) },
    });
    location = harness.writeRemote('origin', summary());
    expect(harness.run('remote-add', '--title=Example', 'origin', location).code).toBe(0);
    expect(harness.run('install', 'org.example.Editor//stable').out).toEqual([
      `Installed ${EDITOR} from origin (aaaaaaaaaaaa)`,
    ]);
    expect(harness.run('install', '--runtime', 'org.example.Platform').out).toEqual([
      `Installed ${PLATFORM} from origin (bbbbbbbbbbbb)`,
    ]);
  });

  afterEach(() => {
    harness.cleanup();
  });

  describe('remotes', () => {
    it('lists configured remotes', () => {
      expect(harness.run('remotes').out).toEqual(['Name   Options', 'origin system']);
    });

    it('shows titles and locations with details', () => {
      expect(harness.run('remotes', '-d').out).toEqual([
        `Name   Title   ${'URL'.padEnd(location.length)} Options`,
        `origin Example ${location} system`,
      ]);
    });

    it('refuses to add a remote twice unless asked not to', () => {
      expect(harness.run('remote-add', 'origin', location)).toMatchObject({
        code: 1,
        err: ['error: Remote origin already exists'],
      });
      expect(harness.run('remote-add', '--if-not-exists', 'origin', location)).toMatchObject({
        code: 0,
        err: [],
      });
    });

    it('validates remote names', () => {
      expect(harness.run('remote-add', 'bad name!', location).err).toEqual([
        "error: 'bad name!' is not a valid remote name\n\nSee 'hatch remote-add --help'",
      ]);
    });

    it('refuses remote names that would clobber object prototypes', () => {
      expect(harness.run('remote-add', '__proto__', location)).toMatchObject({
        code: 1,
        err: ["error: '__proto__' is not a valid remote name\n\nSee 'hatch remote-add --help'"],
      });
      expect(harness.run('remotes').out).toEqual(['Name   Options', 'origin system']);
      const packages = new LocalPackageManager();
      const installation = harness.context().services.installations.getSystemDefault();
      expect(() => packages.addRemote(installation, { name: '__proto__', url: location })).toThrow(
        'Invalid remote name __proto__',
      );
    });

    it('keeps a remote that installed refs still use', () => {
      expect(harness.run('remote-delete', 'origin').err).toEqual([
        `error: Can't remove remote 'origin' with installed refs: ${EDITOR}, ${PLATFORM}`,
      ]);
    });

    it('deletes a remote once nothing uses it', () => {
      expect(harness.run('uninstall', 'org.example.Editor').out).toEqual([`Uninstalled ${EDITOR}`]);
      expect(harness.run('remove', '--runtime', 'org.example.Platform').out).toEqual([
        `Uninstalled ${PLATFORM}`,
      ]);
      expect(harness.run('remote-delete', 'origin').code).toBe(0);
      expect(harness.run('remotes').out).toEqual([]);
    });
  });

  describe('install', () => {
    it('asks for a choice when several refs match', () => {
      expect(harness.run('install', 'org.example.Editor').err).toEqual([
        `error: Multiple refs match org.example.Editor, you must specify one of: ${EDITOR_BETA}, ${EDITOR}\n\nSee 'hatch install --help'`,
      ]);
    });

    it('installs from an explicitly named remote', () => {
      expect(harness.run('install', 'origin', 'org.example.Editor/i386').out).toEqual([
        `Installed ${EDITOR_I386} from origin (aaaaaaaaaaaa)`,
      ]);
    });

    it('reports refs the remotes do not have', () => {
      expect(harness.run('install', 'org.example.Missing')).toMatchObject({
        code: 1,
        out: [],
        err: ['error: Nothing matches org.example.Missing in any remote'],
      });
    });

    it('needs a remote to install from', () => {
      const empty = new Harness();
      try {
        expect(empty.run('install', 'org.example.Editor').err).toEqual([
          'error: No remotes configured in Default system installation',
        ]);
      } finally {
        empty.cleanup();
      }
    });

    it('works on a single installation only', () => {
      expect(harness.run('install', '--user', '--system', 'org.example.Editor').err).toEqual([
        "error: Multiple installations specified for a command that works on one installation\n\nSee 'hatch install --help'",
      ]);
    });
  });

  describe('list and info', () => {
    it('lists installed refs across installations', () => {
      expect(harness.run('list').out).toEqual([
        'Application          Arch   Branch Origin Installation',
        'org.example.Editor   x86_64 stable origin system',
        'org.example.Platform x86_64 1.0    origin system',
      ]);
    });

    it('filters by kind and picks columns', () => {
      expect(harness.run('list', '--runtime', '--columns=ref,commit').out).toEqual([
        'Ref                                     Commit',
        'runtime/org.example.Platform/x86_64/1.0 bbbbbbbbbbbb',
      ]);
      expect(harness.run('list', '--user').out).toEqual([]);
    });

    it('refuses positional arguments', () => {
      expect(harness.run('list', 'org.example.Editor').err).toEqual([
        "error: Too many arguments\n\nSee 'hatch list --help'",
      ]);
    });

    it('shows details for an installed ref', () => {
      expect(harness.run('info', 'org.example.Editor').out).toEqual([
        `Ref:          ${EDITOR}`,
        'ID:           org.example.Editor',
        'Arch:         x86_64',
        'Branch:       stable',
        'Origin:       origin',
        `Commit:       ${COMMIT_A}`,
        'Installation: Default system installation',
        'Installed:    2024-05-10T12:00:00.000Z',
      ]);
    });

    it('reports a ref that is not installed', () => {
      expect(harness.run('info', 'org.example.Nope').err).toEqual([
        'error: org.example.Nope not installed',
      ]);
    });
  });

  describe('update', () => {
    it('moves outdated refs to the remote commit', () => {
      harness.writeRemote('origin', summary(COMMIT_C));

      expect(harness.run('update').out).toEqual([
        `Updated ${EDITOR} in Default system installation to cccccccccccc`,
      ]);
      expect(harness.run('update').out).toEqual(['Nothing to do.']);
    });

    it('reports a pattern that matches nothing installed', () => {
      expect(harness.run('update', 'org.example.Nope')).toMatchObject({
        code: 1,
        out: [],
        err: ['error: org.example.Nope not installed'],
      });
    });
  });

  describe('remote-ls', () => {
    it('lists application ids for the supported arches', () => {
      expect(harness.run('remote-ls', 'origin').out).toEqual([
        'org.example.Editor',
        'org.example.Platform',
      ]);
    });

    it('shows refs, commits and sizes with details', () => {
      expect(harness.run('remote-ls', 'origin', '-d', '--arch=x86_64').out).toEqual([
        `${EDITOR_BETA}      aaaaaaaaaaaa`,
        `${EDITOR}    aaaaaaaaaaaa 1.5 MB 500.0 kB`,
        `${PLATFORM} bbbbbbbbbbbb`,
      ]);
    });

    it('narrows to refs with updates available', () => {
      expect(harness.run('remote-ls', 'origin', '--updates').out).toEqual([]);
      harness.writeRemote('origin', summary(COMMIT_C));
      expect(harness.run('remote-ls', 'origin', '--updates').out).toEqual(['org.example.Editor']);
    });

    it('needs a remote name', () => {
      expect(harness.run('remote-ls').err).toEqual([
        "error: REMOTE must be specified\n\nSee 'hatch remote-ls --help'",
      ]);
    });
  });

  describe('search', () => {
    it('matches application ids case-insensitively', () => {
      expect(harness.run('search', 'EDITOR').out).toEqual([
        'Application ID     Branch Remotes',
        'org.example.Editor stable origin',
        'org.example.Editor beta   origin',
      ]);
    });

    it('says so when nothing matches', () => {
      expect(harness.run('search', 'spreadsheet').out).toEqual(['No matches found']);
    });
  });

  describe('history', () => {
    it('records every transaction, failed ones included', () => {
      expect(harness.run('install', 'org.example.Editor//stable').code).toBe(1);

      expect(harness.run('history', '--columns=change,ref,result').out).toEqual([
        'Change  Ref                                     Success',
        `install ${EDITOR}`,
        `install ${PLATFORM} ✓`,
        `install ${EDITOR}    ✓`,
      ]);
    });
  });
});
