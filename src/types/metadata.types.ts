import type { InputConfigKey } from '@/types/config.types';

/**
 * Metadata definition for GitHub Action inputs that override configuration values.
 *
 * This interface is the translation layer between inputs defined in action.yml and the
 * internal Config type. The ACTION_INPUTS table in metadata.ts lists every such input; an
 * input left empty keeps the value coming from the defaults or the configuration file.
 *
 * @see {@link https://docs.github.com/en/actions/reference/metadata-syntax-for-github-actions#inputs} GitHub Actions input reference
 */
export interface ActionInputMetadata {
  /**
   * The config property name this input maps to.
   */
  configKey: InputConfigKey;

  /**
   * Whether the value must be masked in the log with `setSecret`.
   */
  secret: boolean;
}
