import type { ActionInputMetadata, Config } from '@/types';
import { getInput, setSecret } from '@actions/core';

/**
 * Complete mapping of the GitHub Action inputs that override configuration values.
 * Inputs are optional: an empty input keeps the value from the defaults or the config file.
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  'tag-prefix': { configKey: 'tagPrefix', secret: false },
  github_token: { configKey: 'githubToken', secret: true },
} as const;

/**
 * Reads every input listed in ACTION_INPUTS and returns the non-empty ones keyed by their
 * config property. Secret values are masked in the log before anything else can print them.
 *
 * @returns {Partial<Config>} Overrides to merge on top of the file based configuration.
 */
export function getConfigOverridesFromInputs(): Partial<Config> {
  const overrides: Partial<Config> = {};

  for (const [inputName, { configKey, secret }] of Object.entries(ACTION_INPUTS)) {
    const value = getInput(inputName);
    if (value === '') {
      continue;
    }

    if (secret) {
      setSecret(value);
    }
    overrides[configKey] = value;
  }

  return overrides;
}
