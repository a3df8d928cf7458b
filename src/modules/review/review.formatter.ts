import { ReviewErrorKind } from '../core/errors';

export const COMMENT_TITLE = '## 🤖 AI Code Review';

const SECTION_EMOJI: Array<[prefix: string, emoji: string]> = [
  ['summary', '📋'],
  ['critical', '🔴'],
  ['warning', '🟡'],
  ['suggestion', '🟢'],
  ['positive', '✅'],
];

function decorateHeading(title: string): string {
  const match = SECTION_EMOJI.find(([prefix]) => title.toLowerCase().startsWith(prefix));
  return match ? `${match[1]} ${title}` : title;
}

/**
 * Nests the model's level-2 headings under the comment title and prefixes the
 * known review sections with their marker emoji. Lines inside fenced code
 * blocks are left as written.
 */
export function normalizeSections(text: string): string {
  let inFence = false;
  return text
    .trim()
    .split('\n')
    .map((line) => {
      if (line.trimStart().startsWith('```')) {
        inFence = !inFence;
        return line;
      }
      const heading = inFence ? null : /^#{1,2}\s+(.+)$/.exec(line);
      return heading ? `### ${decorateHeading(heading[1].trim())}` : line;
    })
    .join('\n');
}

function footer(requestedBy: string, model?: string): string {
  const parts = [`Requested by @${requestedBy}`];
  if (model) {
    parts.push(`model \`${model}\``);
  }
  return `<sub>${parts.join(' · ')}</sub>`;
}

export function formatReviewComment(payload: {
  text: string;
  model: string;
  requestedBy: string;
  truncationNote?: string;
}): string {
  const sections = [COMMENT_TITLE, normalizeSections(payload.text)];
  if (payload.truncationNote) {
    sections.push(`> ⚠️ ${payload.truncationNote}`);
  }
  sections.push('---', footer(payload.requestedBy, payload.model));
  return sections.join('\n\n');
}

export function formatNeutralComment(payload: {
  requestedBy: string;
  excludedFiles?: string[];
}): string {
  const sections = [
    COMMENT_TITLE,
    'No reviewable changes were found in this pull request, so no review was generated.',
  ];
  if (payload.excludedFiles && payload.excludedFiles.length > 0) {
    sections.push(
      `Skipped generated or lock files: ${payload.excludedFiles.map((file) => `\`${file}\``).join(', ')}.`,
    );
  }
  sections.push('---', footer(payload.requestedBy));
  return sections.join('\n\n');
}

const FAILURE_HINTS: Partial<Record<ReviewErrorKind, string>> = {
  FetchError: 'The pull request diff could not be loaded.',
  UpstreamError: 'The language model did not return a review.',
};

export function formatFailureComment(payload: {
  requestedBy: string;
  kind: ReviewErrorKind;
  message: string;
}): string {
  const hint = FAILURE_HINTS[payload.kind] ?? 'The review could not be completed.';
  return [
    COMMENT_TITLE,
    `❌ ${hint} Please try again later by adding a new comment.`,
    `<details><summary>Details</summary>\n\n\`${payload.kind}\`: ${payload.message}\n\n</details>`,
    '---',
    footer(payload.requestedBy),
  ].join('\n\n');
}

const ANSI = {
  header: '\u001b[95m',
  blue: '\u001b[94m',
  green: '\u001b[92m',
  warning: '\u001b[93m',
  fail: '\u001b[91m',
  bold: '\u001b[1m',
  end: '\u001b[0m',
};

const RULE = '='.repeat(80);

/** Renders a review for the terminal, colouring the section headings. */
export function formatForTerminal(text: string, color = true): string {
  const paint = (codes: string, line: string) => (color ? `${codes}${line}${ANSI.end}` : line);
  const body = text.split('\n').map((line) => {
    if (line.startsWith('## Critical')) {
      return paint(ANSI.fail + ANSI.bold, line);
    }
    if (line.startsWith('## Warning')) {
      return paint(ANSI.warning + ANSI.bold, line);
    }
    if (line.startsWith('## Suggestion')) {
      return paint(ANSI.blue + ANSI.bold, line);
    }
    if (line.startsWith('## Positive')) {
      return paint(ANSI.green + ANSI.bold, line);
    }
    if (line.startsWith('##')) {
      return paint(ANSI.bold, line);
    }
    return line;
  });
  return [
    '',
    RULE,
    paint(ANSI.bold + ANSI.header, '🤖 AI CODE REVIEW'),
    RULE,
    '',
    ...body,
    '',
    RULE,
    '',
  ].join('\n');
}
