import { REVIEW_SECTIONS } from './system';

export function outroPrompt(language: string): string {
  return `
Output requirements:
1. Write the review in ${language}.
2. Use exactly these Markdown level-2 headings, in this order, and nothing above the first one:
${REVIEW_SECTIONS.map((section) => `   ## ${section}`).join('\n')}
3. Under "Critical Issues" list only problems that must be fixed before merge; write "None." when a section has nothing to report.
4. Do not repeat the diff back.
`.trim();
}
