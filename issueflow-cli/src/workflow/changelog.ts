/**
 * Shared pull request changelog
 *
 * Every tracked issue gets a section in the shared PR body, wrapped in HTML
 * comment markers so it can be found and replaced without depending on the
 * surrounding markdown:
 *
 *   <!-- issueflow:changelog -->
 *   <!-- issueflow:issue:42 -->
 *   ### Issue #42: Title
 *   ...
 *   <!-- /issueflow:issue:42 -->
 *   <!-- /issueflow:changelog -->
 *
 * Sections written by hand or by older tools (a bare `### Issue #42:`
 * heading) are still recognised.
 */

export const CHANGELOG_OPEN = '<!-- issueflow:changelog -->';
export const CHANGELOG_CLOSE = '<!-- /issueflow:changelog -->';

export const issueOpenMarker = (issueNumber: number): string => `<!-- issueflow:issue:${issueNumber} -->`;
export const issueCloseMarker = (issueNumber: number): string => `<!-- /issueflow:issue:${issueNumber} -->`;

export interface IssueSection {
  issueNumber: number;
  title: string;
  started: string;
  developer: string;
  /** Omitted or empty while no files are tracked yet */
  files?: string[];
}

export interface ChangelogEdit {
  body: string;
  changed: boolean;
}

export function renderIssueSection(section: IssueSection): string {
  const lines = [
    issueOpenMarker(section.issueNumber),
    `### Issue #${section.issueNumber}: ${section.title}`,
    `- Started: ${section.started}`,
    `- Developer: ${section.developer}`,
  ];

  if (section.files && section.files.length > 0) {
    lines.push('- Files modified:');
    for (const file of section.files) {
      lines.push(`  - ${file}`);
    }
  } else {
    lines.push('- Files: _to be updated_');
  }

  lines.push(issueCloseMarker(section.issueNumber));
  return lines.join('\n');
}

export function buildSharedPRBody(branch: string, section: IssueSection): string {
  return [
    '## Sprint Development PR',
    '',
    `This is the shared development PR for all active work on the ${branch} branch.`,
    '',
    '## Active Development',
    '',
    'This PR tracks all changes being made during this sprint. Each commit is prefixed with [#issue] for tracking.',
    '',
    '## Changes by Issue',
    '',
    '_This section is automatically updated as work progresses_',
    '',
    CHANGELOG_OPEN,
    renderIssueSection(section),
    CHANGELOG_CLOSE,
    '',
    '## How This Works',
    '',
    `1. All developers work on the shared ${branch} branch`,
    '2. Commits are prefixed with [#issue] for attribution',
    '3. This PR serves as a changelog of all active development',
    '4. Testing and feedback happens in each issue, not here',
    '5. At sprint end, this PR is reviewed and merged',
  ].join('\n');
}

function legacyHeading(issueNumber: number): RegExp {
  return new RegExp(`^### Issue #${issueNumber}(?![0-9])`, 'm');
}

export function hasIssueSection(body: string, issueNumber: number): boolean {
  return body.includes(issueOpenMarker(issueNumber)) || legacyHeading(issueNumber).test(body);
}

/**
 * Add the issue's section unless it is already present. A body without the
 * changelog block gets one appended.
 */
export function addIssueSection(body: string, section: IssueSection): ChangelogEdit {
  if (hasIssueSection(body, section.issueNumber)) {
    return { body, changed: false };
  }

  const rendered = renderIssueSection(section);
  const closeIndex = body.indexOf(CHANGELOG_CLOSE);

  if (body.includes(CHANGELOG_OPEN) && closeIndex !== -1) {
    return {
      body: `${body.slice(0, closeIndex)}\n${rendered}\n${body.slice(closeIndex)}`,
      changed: true,
    };
  }

  const heading = body.includes('## Changes by Issue') ? [] : ['## Changes by Issue', ''];
  const block = [...heading, CHANGELOG_OPEN, rendered, CHANGELOG_CLOSE].join('\n');
  const trimmed = body.trimEnd();
  return { body: trimmed ? `${trimmed}\n\n${block}` : block, changed: true };
}

/**
 * Replace the issue's section (typically to refresh the files list). Adds it
 * when missing.
 */
export function replaceIssueSection(body: string, section: IssueSection): ChangelogEdit {
  const rendered = renderIssueSection(section);
  const open = issueOpenMarker(section.issueNumber);
  const close = issueCloseMarker(section.issueNumber);
  const start = body.indexOf(open);
  const end = start === -1 ? -1 : body.indexOf(close, start);

  if (start !== -1 && end !== -1) {
    const next = `${body.slice(0, start)}${rendered}${body.slice(end + close.length)}`;
    return { body: next, changed: next !== body };
  }

  const match = legacyHeading(section.issueNumber).exec(body);
  if (match) {
    // The legacy section runs until the next heading of level 2 or 3, or the
    // next changelog marker.
    const afterHeading = match.index + match[0].length;
    const rest = body.slice(afterHeading);
    const nextHeading = /^(?:#{2,3} |<!-- \/?issueflow:)/m.exec(rest);
    const sectionEnd = nextHeading ? afterHeading + nextHeading.index : body.length;
    const tail = body.slice(sectionEnd);
    const next = `${body.slice(0, match.index)}${rendered}${tail ? `\n\n${tail}` : ''}`;
    return { body: next, changed: next !== body };
  }

  return addIssueSection(body, section);
}
