import { isCommandName, runCommand } from '@/commands';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { ConfigError } from '@/errors';
import { GitCli } from '@/git';
import type { CommandDependencies, CommandInputs, CommandName, CommandResult } from '@/types';
import { COMMAND, DEFAULT_CHANGELOG_SIZE } from '@/utils/constants';
import { endGroup, getBooleanInput, getInput, info, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Reads a boolean input, treating an absent input as `false`. `getBooleanInput` rejects empty
 * values, which happens when the action runs outside a workflow (e.g. from a git hook).
 */
function getOptionalBooleanInput(name: string): boolean {
  return getInput(name) === '' ? false : getBooleanInput(name);
}

/**
 * Reads the `command` input.
 *
 * @throws {ConfigError} When the command is not one of the supported commands.
 */
function getCommandName(): CommandName {
  const command = getInput('command', { required: true });
  if (!isCommandName(command)) {
    throw new ConfigError(`Invalid command '${command}'. Must be one of: ${Object.values(COMMAND).join(', ')}`);
  }

  return command;
}

/**
 * Reads every input the commands consume.
 *
 * @returns {CommandInputs}
 */
export function getCommandInputs(): CommandInputs {
  const size = getInput('size');

  return {
    range: getInput('range'),
    start: getInput('start'),
    end: getInput('end'),
    tag: getInput('tag'),
    size: size === '' ? DEFAULT_CHANGELOG_SIZE : Number(size),
    all: getOptionalBooleanInput('all'),
    addNextVersion: getOptionalBooleanInput('add-next-version'),
    addUnreleased: getOptionalBooleanInput('add-unreleased'),
    pushTag: getOptionalBooleanInput('push-tag'),
    createRelease: getOptionalBooleanInput('create-release'),
    commitType: getInput('commit-type'),
    commitScope: getInput('commit-scope'),
    commitSubject: getInput('commit-subject'),
    commitBody: getInput('commit-body', { trimWhitespace: false }).trim(),
    commitIssue: getInput('commit-issue'),
    commitBreakingChange: getInput('commit-breaking-change'),
    path: getInput('path') || '.git',
    file: getInput('file'),
    source: getInput('source'),
    enhance: getInput('enhance') === '' ? true : getBooleanInput('enhance'),
  };
}

/**
 * Prints the command text and sets every output of the step.
 *
 * @param {CommandResult} result - What the command produced.
 */
function setActionOutputs({ text, outputs }: CommandResult): void {
  if (text !== '') {
    info(text);
  }

  const entries = Object.entries(outputs);
  if (entries.length === 0) {
    return;
  }

  startGroup('GitHub Action Outputs');
  for (const [name, value] of entries) {
    info(`${name}: ${value}`);
    setOutput(name, value);
  }
  endGroup();
}

/**
 * Executes the command selected by the `command` input.
 *
 * Configuration is loaded first (defaults, optional YAML file, input overrides), then the runtime
 * context and the git client, and finally the command itself. Any failure is reported through
 * setFailed with the error message.
 *
 * @returns {Promise<void>} A promise that resolves when the command completes
 */
export async function run(): Promise<void> {
  try {
    const command = getCommandName();
    const config = getConfig();
    const context = getContext(config);

    const deps: CommandDependencies = {
      config,
      context,
      git: new GitCli(config, context.workspaceDir),
      now: () => new Date(),
    };

    info(`Running command: ${command}`);
    const result = await runCommand(command, deps, getCommandInputs());

    setActionOutputs(result);
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}
