import { ReviewMode } from '../../core/config';
import { outroPrompt } from './base/outro';
import { systemPrompt } from './base/system';
import { lightPrompt } from './modes/light';
import { strictPrompt } from './modes/strict';

export interface ReviewPromptPayload {
  diff: string;
  mode: ReviewMode;
  language: string;
  title?: string;
  description?: string;
  projectContext?: string;
  extraContext?: string;
  truncationNote?: string;
}

export interface ReviewPrompt {
  system: string;
  prompt: string;
}

const MAX_DESCRIPTION_CHARS = 2000;

export class PromptBuilder {
  static buildContext(payload: Omit<ReviewPromptPayload, 'diff' | 'mode' | 'language'>): string {
    const lines: string[] = [];
    if (payload.title) {
      lines.push(`Pull request: ${payload.title}`);
    }
    if (payload.description?.trim()) {
      const description = payload.description.trim();
      lines.push(
        `Description:\n${description.length > MAX_DESCRIPTION_CHARS ? `${description.slice(0, MAX_DESCRIPTION_CHARS)}...` : description}`,
      );
    }
    if (payload.projectContext) {
      lines.push(`Project notes:\n${payload.projectContext}`);
    }
    if (payload.extraContext) {
      lines.push(`Additional context:\n${payload.extraContext}`);
    }
    if (payload.truncationNote) {
      lines.push(`Note: ${payload.truncationNote}`);
    }
    return lines.join('\n\n');
  }

  static buildReviewPrompt(payload: ReviewPromptPayload): ReviewPrompt {
    const content = { context: PromptBuilder.buildContext(payload), diff: payload.diff };
    const body = payload.mode === 'light' ? lightPrompt(content) : strictPrompt(content);
    return {
      system: systemPrompt(),
      prompt: `${body}\n\n${outroPrompt(payload.language)}`,
    };
  }
}
