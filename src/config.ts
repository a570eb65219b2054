import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError } from '@/errors';
import type { CommitTypeConfig, Config, ReleaseType } from '@/types';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH, RELEASE_TYPE } from '@/utils/constants';
import { getWorkspaceDir } from '@/utils/environment';
import { getConfigOverridesFromInputs } from '@/utils/metadata';
import { compilePattern } from '@/utils/string';
import { endGroup, getInput, info, startGroup } from '@actions/core';
import * as yaml from 'js-yaml';
import { merge } from 'ts-deepmerge';

// Keep configInstance private to this module
let configInstance: Config | null = null;

type UnknownRecord = Record<string, unknown>;

/**
 * Footer tokens follow the git trailer form, so configured keys must too.
 */
const FOOTER_TOKEN_REGEX = /^[\w-]+$/;

/**
 * Clears the cached config instance during testing.
 *
 * This utility function is specifically designed for testing scenarios where
 * multiple different configurations need to be tested. It resets the singleton
 * instance to null, allowing the next config initialization to start fresh with
 * new mocked values.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Validation
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBumpReleaseType(value: unknown): value is Exclude<ReleaseType, 'none'> {
  return value === RELEASE_TYPE.MAJOR || value === RELEASE_TYPE.MINOR || value === RELEASE_TYPE.PATCH;
}

function readRecord(source: UnknownRecord, key: string): UnknownRecord {
  const value = source[key];
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration: "${key}" must be a mapping`);
  }
  return value;
}

function readString(source: UnknownRecord, key: string, path: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid configuration: "${path}" must be a string`);
  }
  return value;
}

function readBoolean(source: UnknownRecord, key: string, path: string): boolean {
  const value = source[key];
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid configuration: "${path}" must be true or false`);
  }
  return value;
}

function readStringArray(source: UnknownRecord, key: string, path: string): string[] {
  const value = source[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Invalid configuration: "${path}" must be a list of strings`);
  }
  return [...value];
}

function readPattern(source: UnknownRecord, key: string, path: string): string {
  const pattern = readString(source, key, path);
  if (compilePattern(pattern) === null) {
    throw new ConfigError(`Invalid configuration: "${path}" is not a valid regular expression: ${pattern}`);
  }
  return pattern;
}

function readCommitTypes(source: UnknownRecord): CommitTypeConfig[] {
  const value = source.commitTypes;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('Invalid configuration: "commitTypes" must be a non-empty list');
  }

  const commitTypes = value.map((item: unknown, index): CommitTypeConfig => {
    const path = `commitTypes[${index}]`;
    if (!isRecord(item)) {
      throw new ConfigError(`Invalid configuration: "${path}" must be a mapping`);
    }

    const type = readString(item, 'type', `${path}.type`);
    if (!/^\w+$/.test(type)) {
      throw new ConfigError(`Invalid configuration: "${path}.type" must only contain word characters. Got: '${type}'`);
    }

    let releaseType: CommitTypeConfig['releaseType'] = null;
    const rawReleaseType = item.releaseType ?? null;
    if (rawReleaseType !== null) {
      if (!isBumpReleaseType(rawReleaseType)) {
        throw new ConfigError(
          `Invalid configuration: "${path}.releaseType" must be one of: major, minor, patch or null. Got: '${String(rawReleaseType)}'`,
        );
      }
      releaseType = rawReleaseType;
    }

    let section: string | null = null;
    const rawSection = item.section ?? null;
    if (rawSection !== null) {
      if (typeof rawSection !== 'string') {
        throw new ConfigError(`Invalid configuration: "${path}.section" must be a string or null`);
      }
      section = rawSection;
    }

    return { type, releaseType, section };
  });

  const seen = new Set<string>();
  for (const { type } of commitTypes) {
    if (seen.has(type)) {
      throw new ConfigError(`Invalid configuration: commit type "${type}" is defined more than once`);
    }
    seen.add(type);
  }

  return commitTypes;
}

/**
 * Validates a merged configuration object and rebuilds it as a typed {@link Config}.
 *
 * @param {unknown} value - Defaults merged with the configuration file and input overrides.
 * @returns {Config}
 * @throws {ConfigError} On any missing, mistyped or invalid value.
 */
export function validateConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new ConfigError('Invalid configuration: expected a mapping at the top level');
  }

  const scope = readRecord(value, 'scope');
  const issue = readRecord(value, 'issue');
  const branches = readRecord(value, 'branches');
  const versioning = readRecord(value, 'versioning');
  const releaseNotes = readRecord(value, 'releaseNotes');

  const config: Config = {
    tagPrefix: readString(value, 'tagPrefix', 'tagPrefix'),
    commitTypes: readCommitTypes(value),
    scope: {
      values: readStringArray(scope, 'values', 'scope.values'),
      pattern: readPattern(scope, 'pattern', 'scope.pattern'),
    },
    issue: {
      footerKey: readString(issue, 'footerKey', 'issue.footerKey'),
      footerKeySynonyms: readStringArray(issue, 'footerKeySynonyms', 'issue.footerKeySynonyms'),
      useHash: readBoolean(issue, 'useHash', 'issue.useHash'),
      pattern: readPattern(issue, 'pattern', 'issue.pattern'),
    },
    branches: {
      prefixPattern: readPattern(branches, 'prefixPattern', 'branches.prefixPattern'),
      suffixPattern: readPattern(branches, 'suffixPattern', 'branches.suffixPattern'),
      skip: readStringArray(branches, 'skip', 'branches.skip'),
    },
    versioning: {
      zeroMajorBreakingBumpsMinor: readBoolean(
        versioning,
        'zeroMajorBreakingBumpsMinor',
        'versioning.zeroMajorBreakingBumpsMinor',
      ),
    },
    releaseNotes: {
      headerTemplate: readString(releaseNotes, 'headerTemplate', 'releaseNotes.headerTemplate'),
      sectionTemplate: readString(releaseNotes, 'sectionTemplate', 'releaseNotes.sectionTemplate'),
      entryTemplate: readString(releaseNotes, 'entryTemplate', 'releaseNotes.entryTemplate'),
      breakingChangeTemplate: readString(releaseNotes, 'breakingChangeTemplate', 'releaseNotes.breakingChangeTemplate'),
      breakingChangesTitle: readString(releaseNotes, 'breakingChangesTitle', 'releaseNotes.breakingChangesTitle'),
      unreleasedTitle: readString(releaseNotes, 'unreleasedTitle', 'releaseNotes.unreleasedTitle'),
      changelogTitle: readString(releaseNotes, 'changelogTitle', 'releaseNotes.changelogTitle'),
    },
    githubToken: readString(value, 'githubToken', 'githubToken'),
  };

  for (const key of [config.issue.footerKey, ...config.issue.footerKeySynonyms]) {
    if (!FOOTER_TOKEN_REGEX.test(key)) {
      throw new ConfigError(
        `Invalid configuration: issue footer key '${key}' must only contain letters, digits, "_" and "-"`,
      );
    }
  }

  // The branch expression is only valid as a whole once the issue pattern sits between both parts.
  const branchSource = `^${config.branches.prefixPattern}(?<issue>${config.issue.pattern})${config.branches.suffixPattern}$`;
  if (config.issue.pattern !== '' && compilePattern(branchSource) === null) {
    throw new ConfigError(`Invalid configuration: branch issue expression does not compile: ${branchSource}`);
  }

  return config;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Loading
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Reads the YAML configuration file. A missing file is not an error: the defaults apply.
 *
 * @param {string} filePath - Absolute path to the configuration file.
 * @returns {UnknownRecord} The parsed mapping, empty when the file is missing or empty.
 * @throws {ConfigError} When the file cannot be read or does not contain a YAML mapping.
 */
export function loadConfigFile(filePath: string): UnknownRecord {
  if (!existsSync(filePath)) {
    info(`No configuration file found at ${filePath}. Using defaults.`);
    return {};
  }

  let content: unknown;
  try {
    content = yaml.load(readFileSync(filePath, 'utf8'), { filename: filePath });
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (content === undefined || content === null) {
    return {};
  }
  if (!isRecord(content)) {
    throw new ConfigError(`Configuration file ${filePath} must contain a YAML mapping`);
  }

  info(`Loaded configuration file ${filePath}`);
  return content;
}

/**
 * Freezes an object graph so that no component can change the shared configuration.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }

  return value;
}

/**
 * Lazy-initialized configuration object. Defaults are merged with the YAML file named by the
 * `config-path` input (arrays are replaced, not concatenated), then with the action inputs
 * listed in ACTION_INPUTS.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const configPath = resolve(getWorkspaceDir(), getInput('config-path') || DEFAULT_CONFIG_PATH);
    const fileConfig = loadConfigFile(configPath);
    const overrides = getConfigOverridesFromInputs();

    const config = validateConfig(merge.withOptions({ mergeArrays: false }, DEFAULT_CONFIG, fileConfig, overrides));

    info(`Tag Prefix: ${config.tagPrefix}`);
    info(`Commit Types: ${config.commitTypes.map(({ type }) => type).join(', ')}`);
    info(`Scope Values: ${config.scope.values.join(', ')}`);
    info(`Scope Pattern: ${config.scope.pattern}`);
    info(`Issue Footer Key: ${config.issue.footerKey}`);
    info(`Issue Pattern: ${config.issue.pattern}`);
    info(`Skipped Branches: ${config.branches.skip.join(', ')}`);
    info(`Pre-1.0 Breaking Bumps Minor: ${config.versioning.zeroMajorBreakingBumpsMinor}`);

    configInstance = deepFreeze(config);
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}
