import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { clearConfigForTesting, getConfig, loadConfigFile, validateConfig } from '@/config';
import { ConfigError } from '@/errors';
import { setupTestInputs } from '@/tests/helpers/inputs';
import { DEFAULT_CONFIG } from '@/utils/constants';
import { endGroup, info, setSecret, startGroup } from '@actions/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

describe('config', () => {
  let workspaceDir: string;

  const writeConfigFile = (content: string, fileName = '.semver.yml'): string => {
    const filePath = join(workspaceDir, fileName);
    writeFileSync(filePath, content, 'utf8');
    return filePath;
  };

  beforeEach(() => {
    // The config is cached. To ensure each test starts with a clean slate, we clear it.
    clearConfigForTesting();

    workspaceDir = mkdtempSync(join(tmpdir(), 'semver-config-'));
    vi.stubEnv('GITHUB_WORKSPACE', workspaceDir);
  });

  afterEach(() => {
    rmSync(workspaceDir, { recursive: true, force: true });
  });

  describe('getConfig', () => {
    it('should use the defaults when there is no configuration file', () => {
      const config = getConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(info).toHaveBeenCalledWith(`No configuration file found at ${join(workspaceDir, '.semver.yml')}. Using defaults.`);
      expect(startGroup).toHaveBeenCalledWith('Initializing Config');
      expect(endGroup).toHaveBeenCalledOnce();
    });

    it('should merge the configuration file over the defaults and replace arrays', () => {
      writeConfigFile(
        [
          'tagPrefix: release-',
          'commitTypes:',
          '  - type: feat',
          '    releaseType: minor',
          '    section: New Features',
          '  - type: fix',
          '    releaseType: patch',
          'issue:',
          "  pattern: ''",
        ].join('\n'),
      );

      const config = getConfig();

      expect(config.tagPrefix).toBe('release-');
      expect(config.commitTypes).toEqual([
        { type: 'feat', releaseType: 'minor', section: 'New Features' },
        { type: 'fix', releaseType: 'patch', section: null },
      ]);
      expect(config.issue).toEqual({ ...DEFAULT_CONFIG.issue, pattern: '' });
      expect(config.releaseNotes).toEqual(DEFAULT_CONFIG.releaseNotes);
    });

    it('should read the file named by the config-path input', () => {
      mkdirSync(join(workspaceDir, 'configs'));
      writeConfigFile('tagPrefix: ver', join('configs', 'semver.yaml'));
      setupTestInputs({ 'config-path': 'configs/semver.yaml' });

      expect(getConfig().tagPrefix).toBe('ver');
      expect(info).toHaveBeenCalledWith(`Loaded configuration file ${join(workspaceDir, 'configs', 'semver.yaml')}`);
    });

    it('should let action inputs override the configuration file', () => {
      writeConfigFile('tagPrefix: release-');
      setupTestInputs({ 'tag-prefix': 'ver', github_token: 'test-secret' });

      const config = getConfig();

      expect(config.tagPrefix).toBe('ver');
      expect(config.githubToken).toBe('test-secret');
      expect(setSecret).toHaveBeenCalledWith('test-secret');
    });

    it('should use the defaults for an empty configuration file', () => {
      writeConfigFile('');
      expect(getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should cache and freeze the configuration', () => {
      const config = getConfig();

      expect(getConfig()).toBe(config);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.commitTypes[0])).toBe(true);
      expect(startGroup).toHaveBeenCalledOnce();
    });

    it('should close the log group when the configuration is invalid', () => {
      writeConfigFile('tagPrefix: 3');

      expect(() => getConfig()).toThrow(new ConfigError('Invalid configuration: "tagPrefix" must be a string'));
      expect(endGroup).toHaveBeenCalledOnce();
    });
  });

  describe('loadConfigFile', () => {
    it('should return an empty mapping for a missing file', () => {
      expect(loadConfigFile(join(workspaceDir, 'missing.yml'))).toEqual({});
    });

    it('should reject a file that is not valid YAML', () => {
      const filePath = writeConfigFile('tagPrefix: [v');
      expect(() => loadConfigFile(filePath)).toThrow(`Failed to read configuration file ${filePath}:`);
    });

    it('should reject a file that does not hold a mapping', () => {
      const filePath = writeConfigFile('- feat\n- fix\n');
      expect(() => loadConfigFile(filePath)).toThrow(
        new ConfigError(`Configuration file ${filePath} must contain a YAML mapping`),
      );
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('should reject a value that is not a mapping', () => {
      expect(() => validateConfig(['feat'])).toThrow('Invalid configuration: expected a mapping at the top level');
    });

    it('should reject a missing section', () => {
      const { scope: _scope, ...rest } = DEFAULT_CONFIG;
      expect(() => validateConfig(rest)).toThrow('Invalid configuration: "scope" must be a mapping');
    });

    it('should reject an empty list of commit types', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, commitTypes: [] })).toThrow(
        'Invalid configuration: "commitTypes" must be a non-empty list',
      );
    });

    it('should reject an unknown release type', () => {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, commitTypes: [{ type: 'feat', releaseType: 'huge', section: null }] }),
      ).toThrow(
        `Invalid configuration: "commitTypes[0].releaseType" must be one of: major, minor, patch or null. Got: 'huge'`,
      );
    });

    it('should reject a commit type with non-word characters', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, commitTypes: [{ type: 'new-feat' }] })).toThrow(
        `Invalid configuration: "commitTypes[0].type" must only contain word characters. Got: 'new-feat'`,
      );
    });

    it('should reject duplicate commit types', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, commitTypes: [{ type: 'feat' }, { type: 'feat' }] })).toThrow(
        'Invalid configuration: commit type "feat" is defined more than once',
      );
    });

    it('should reject an invalid regular expression', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, scope: { values: [], pattern: '(' } })).toThrow(
        'Invalid configuration: "scope.pattern" is not a valid regular expression: (',
      );
    });

    it('should reject a scope allow-list that is not a list of strings', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, scope: { values: 'api', pattern: '' } })).toThrow(
        'Invalid configuration: "scope.values" must be a list of strings',
      );
    });

    it('should reject an issue footer key with spaces', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, issue: { ...DEFAULT_CONFIG.issue, footerKey: 'Refs to' } })).toThrow(
        `Invalid configuration: issue footer key 'Refs to' must only contain letters, digits, "_" and "-"`,
      );
    });

    it('should reject a non-boolean pre-1.0 policy', () => {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, versioning: { zeroMajorBreakingBumpsMinor: 'yes' } }),
      ).toThrow('Invalid configuration: "versioning.zeroMajorBreakingBumpsMinor" must be true or false');
    });
  });
});
