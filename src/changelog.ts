import { formatTag } from '@/semver';
import type { Config, ReleaseNote, ReleaseNoteEntry, ReleaseVersion } from '@/types';
import { renderTemplate } from '@/utils/string';

/**
 * Text shown for the version in a release note header: the tag name, or the unreleased title.
 */
function getVersionLabel(config: Config, version: ReleaseVersion): string {
  switch (version.kind) {
    case 'released':
      return formatTag(config, version.version);
    case 'unreleased':
      return config.releaseNotes.unreleasedTitle;
  }
}

function renderEntry(config: Config, entry: ReleaseNoteEntry): string {
  return renderTemplate(config.releaseNotes.entryTemplate, {
    scope: entry.scope ? `**${entry.scope}:** ` : '',
    subject: entry.subject,
    hash: entry.hash,
    shortHash: entry.shortHash,
    issue: entry.issue ? ` [${entry.issue}]` : '',
  });
}

/**
 * Renders a single release note as markdown.
 *
 * The header comes first, followed by the breaking changes block (when there are any) and one
 * block per section in configured order. Blocks are separated by a blank line and the result has
 * no trailing newline.
 *
 * @param {Config} config - Supplies the templates and the tag prefix.
 * @param {ReleaseNote} note - The assembled release note.
 * @returns {string} The rendered markdown.
 *
 * @example
 * ```markdown
 * ## v1.1.0 (2024-02-01)
 *
 * ### Features
 *
 * - add X (1a2b3c4)
 * ```
 */
export function formatReleaseNote(config: Config, note: ReleaseNote): string {
  const { releaseNotes } = config;
  const blocks: string[][] = [];

  if (note.breakingChanges.length > 0) {
    blocks.push([
      renderTemplate(releaseNotes.sectionTemplate, { title: releaseNotes.breakingChangesTitle }),
      ...note.breakingChanges.map((description) =>
        renderTemplate(releaseNotes.breakingChangeTemplate, { description: description.replace(/\n/g, ' ') }),
      ),
    ]);
  }

  for (const section of note.sections) {
    blocks.push([
      renderTemplate(releaseNotes.sectionTemplate, { title: section.title }),
      ...section.entries.map((entry) => renderEntry(config, entry)),
    ]);
  }

  const lines = [
    renderTemplate(releaseNotes.headerTemplate, { version: getVersionLabel(config, note.version), date: note.date }),
  ];
  for (const [heading, ...bullets] of blocks) {
    lines.push('', heading, '', ...bullets);
  }

  return lines.join('\n');
}

/**
 * Renders several release notes as one changelog, keeping exactly the order given by the caller
 * (newest first, optionally starting with an unreleased note).
 *
 * @param {Config} config - Supplies the templates and the changelog title.
 * @param {ReleaseNote[]} notes - Notes in display order.
 * @returns {string} The rendered markdown.
 */
export function formatChangelog(config: Config, notes: ReadonlyArray<ReleaseNote>): string {
  const parts = notes.map((note) => formatReleaseNote(config, note));
  if (config.releaseNotes.changelogTitle !== '') {
    parts.unshift(config.releaseNotes.changelogTitle);
  }

  return parts.join('\n\n');
}
