import { ReviewPromptContent } from './light';

export function strictPrompt(content: ReviewPromptContent): string {
  return `
Review this code change strictly:
1. Code quality and conventions
2. Potential security issues
3. Potential performance problems (infinite loops, leaks, hot paths)
4. Maintainability and readability
5. Best-practice recommendations

${content.context}

\`\`\`diff
${content.diff}
\`\`\`

Provide concrete improvement suggestions and code examples.
`.trim();
}
