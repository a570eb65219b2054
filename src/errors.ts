/**
 * Base class for every failure raised by this action. Subclasses only exist so that callers
 * (and tests) can tell the kinds apart with `instanceof`; the message is always meant to be
 * shown to the user as-is.
 */
export class SemverActionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed configuration: bad YAML, unknown release type, duplicated commit type or a
 * regular expression that does not compile.
 */
export class ConfigError extends SemverActionError {}

/**
 * A tag (or input) that does not parse as a semantic version.
 */
export class VersionParseError extends SemverActionError {}

/**
 * A commit message that does not follow the configured `type(scope)!: subject` grammar.
 */
export class GrammarError extends SemverActionError {}

/**
 * Unsupported or contradictory log range selection.
 */
export class LogRangeError extends SemverActionError {}

/**
 * A referenced tag is absent, or no issue id could be derived from a branch name.
 */
export class NotFoundError extends SemverActionError {}

/**
 * The underlying git process or GitHub API call failed.
 */
export class CollaboratorError extends SemverActionError {}
