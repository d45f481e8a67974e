import { CONFIG_FILE } from '../cli/src/config.js';
import { resolveOptions, runCheck, runCheckCommand, runTypes, runTypesCommand } from '../cli/src/run.js';
import type { CheckOptions } from '../cli/src/run.js';
import { createTestDirs, writeJson, type TestDirs } from './helpers/dirs.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

const defaults: CheckOptions = { ignoreCase: false, continueOnError: false, verbose: false };

const MALFORMED = '[malformed-header] Missing ":" separator, expected "type(scope): description": "oops"';

describe('run', () => {
  describe('resolveOptions()', () => {
    it('should let flags override the loaded config', () => {
      expect(
        resolveOptions(
          { types: 'feat=', allowCapsTypes: true, verbose: true },
          { types: 'wild=scope', ignoreCase: false, continueOnError: true }
        )
      ).toEqual({ types: 'feat=', ignoreCase: true, continueOnError: true, verbose: true });
    });

    it('should fall back to the config when no flags are given', () => {
      expect(resolveOptions({}, { types: 'wild=scope', ignoreCase: true, continueOnError: false })).toEqual({
        types: 'wild=scope',
        ignoreCase: true,
        continueOnError: false,
        verbose: false
      });
    });
  });

  describe('runCheck()', () => {
    it('should exit 0 without output for a valid message', () => {
      expect(runCheck('feat: add login', defaults)).toEqual({ exitCode: 0, errors: [], warnings: [], output: [] });
    });

    it('should exit 1 and report violations', () => {
      expect(runCheck('oops', defaults)).toEqual({ exitCode: 1, errors: [MALFORMED], warnings: [], output: [] });
    });

    it('should downgrade violations to warnings when continuing on error', () => {
      expect(runCheck('oops', { ...defaults, continueOnError: true })).toEqual({
        exitCode: 0,
        errors: [],
        warnings: [MALFORMED],
        output: []
      });
    });

    it('should fail on a bad type spec even when continuing on error', () => {
      expect(runCheck('feat: x', { ...defaults, types: 'feat', continueOnError: true })).toEqual({
        exitCode: 1,
        errors: ['[config] Missing "=" in entry "feat"'],
        warnings: [],
        output: []
      });
    });

    it('should match types case-insensitively when asked to', () => {
      expect(runCheck('FEAT: x', defaults).exitCode).toBe(1);
      expect(runCheck('FEAT: x', { ...defaults, ignoreCase: true }).exitCode).toBe(0);
    });

    it('should print the summary when verbose', () => {
      expect(runCheck('fix(parser): handle tabs', { ...defaults, verbose: true }).output).toEqual([
        'Type         fix',
        'Scope        parser',
        'Description  handle tabs',
        'Body         -',
        'Footer       -',
        'Valid        yes'
      ]);
    });
  });

  describe('runTypes()', () => {
    it('should list the effective registry', () => {
      expect(runTypes({ ...defaults, types: 'docs=;feat=scope' }).output).toEqual([
        'docs: description',
        'feat: description, scope',
        'spec: docs=description;feat=description,scope'
      ]);
    });

    it('should fail on a bad type spec', () => {
      expect(runTypes({ ...defaults, types: '=scope' })).toEqual({
        exitCode: 1,
        errors: ['[config] Empty type name in entry "=scope"'],
        warnings: [],
        output: []
      });
    });
  });

  describe('commands', () => {
    let dirs: TestDirs;

    beforeEach(() => {
      dirs = createTestDirs();
    });

    afterEach(() => {
      dirs.cleanup();
    });

    function loadOptions() {
      return { cwd: dirs.cwd, homeDir: dirs.homeDir, env: {} };
    }

    it('should apply the rc file', () => {
      writeJson(dirs.cwd, CONFIG_FILE, { types: 'wild=scope,description' });

      expect(runCheckCommand(() => 'wild(scope): Some updates', {}, loadOptions()).exitCode).toBe(0);
      expect(runCheckCommand(() => 'wild: Some updates', {}, loadOptions()).errors).toEqual([
        '[missing-field] commit type "wild" requires a non-empty scope'
      ]);
    });

    it('should let the types flag replace the rc file types', () => {
      writeJson(dirs.cwd, CONFIG_FILE, { types: 'wild=scope' });

      expect(runCheckCommand(() => 'feat: x', { types: 'feat=' }, loadOptions()).exitCode).toBe(0);
    });

    it('should fail on a broken rc file regardless of continue-on-error', () => {
      writeJson(dirs.cwd, CONFIG_FILE, { continueOnError: 'yes' });

      const outcome = runCheckCommand(() => 'feat: x', { dontExitOnErrors: true }, loadOptions());

      expect(outcome.exitCode).toBe(1);
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^\[config\] "continueOnError" in .* must be a boolean$/);
    });

    it('should report read failures', () => {
      const outcome = runCheckCommand(
        () => {
          throw new Error('boom');
        },
        {},
        loadOptions()
      );

      expect(outcome).toEqual({ exitCode: 1, errors: ['[io] boom'], warnings: [], output: [] });
    });

    it('should strip comment lines when asked to', () => {
      const read = () => '# Please enter the commit message\nfeat: x\n# On branch main\n';

      expect(runCheckCommand(read, {}, loadOptions()).exitCode).toBe(1);
      expect(runCheckCommand(read, { stripComments: true }, loadOptions()).exitCode).toBe(0);
    });

    it('should list types from the rc file', () => {
      writeJson(dirs.cwd, CONFIG_FILE, { types: { feat: ['scope'] } });

      expect(runTypesCommand({}, loadOptions()).output).toEqual(['feat: description, scope', 'spec: feat=description,scope']);
    });
  });
});
