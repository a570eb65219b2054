import { setupTestInputs } from '@/tests/helpers/inputs';
import { ACTION_INPUTS, getConfigOverridesFromInputs } from '@/utils/metadata';
import { setSecret } from '@actions/core';
import { describe, expect, it } from 'vitest';

describe('utils/metadata', () => {
  it('should map inputs to configuration keys', () => {
    expect(ACTION_INPUTS['tag-prefix']).toEqual({ configKey: 'tagPrefix', secret: false });
    expect(ACTION_INPUTS.github_token).toEqual({ configKey: 'githubToken', secret: true });
  });

  it('should return no overrides when the inputs are empty', () => {
    expect(getConfigOverridesFromInputs()).toEqual({});
    expect(setSecret).not.toHaveBeenCalled();
  });

  it('should return the non-empty inputs and mask secrets', () => {
    setupTestInputs({ 'tag-prefix': 'release-', github_token: 'test-secret' });

    expect(getConfigOverridesFromInputs()).toEqual({ tagPrefix: 'release-', githubToken: 'test-secret' });
    expect(setSecret).toHaveBeenCalledOnce();
    expect(setSecret).toHaveBeenCalledWith('test-secret');
  });
});
