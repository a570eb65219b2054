import type { SemVer } from 'semver';
import type { RELEASE_TYPE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents the bump severity implied by a commit or a set of commits.
 *
 * This type is derived from the `RELEASE_TYPE` constant object, ensuring that only valid
 * predefined values can be used. `none` means the version does not change.
 *
 * @see {@link RELEASE_TYPE} for the available release type values
 */
export type ReleaseType = (typeof RELEASE_TYPE)[keyof typeof RELEASE_TYPE];

/**
 * Values that can be written through `setOutput`.
 */
export type ActionOutputs = Record<string, string | number | boolean>;

/**
 * Result of applying a set of commits to a version.
 */
export interface NextVersionResult {
  /**
   * The next version, or the current one when `changed` is false.
   */
  version: SemVer;

  /**
   * Whether the commits required a release at all.
   */
  changed: boolean;

  /**
   * The aggregate severity actually applied, after the pre-1.0 policy.
   */
  releaseType: ReleaseType;
}
