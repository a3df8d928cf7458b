export interface ReviewPromptContent {
  /** Pull request details, project notes and truncation notice, pre-rendered. */
  context: string;
  diff: string;
}

export function lightPrompt(content: ReviewPromptContent): string {
  return `
Give this code change a light review:
1. Only report important problems: security holes, obvious bugs, performance problems, serious quality issues
2. Ignore minor style issues
3. Concentrate on core logic and key changes
4. Keep comments short

${content.context}

\`\`\`diff
${content.diff}
\`\`\`
`.trim();
}
