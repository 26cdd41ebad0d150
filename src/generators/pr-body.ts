import type { ConsolidatedView } from '../provenance/types.js';
import {
  DEFAULT_HISTORY_COMMAND,
  describeSession,
  formatFileList,
  selectMode,
  textLines,
  viewBounds,
  type RenderOptions,
} from '../provenance/render.js';
import { pluralize } from '../utils/time.js';

function code(value: string): string {
  return `\`${value}\``;
}

function bullet(text: string): string[] {
  return textLines(text).map((line, i) => (i === 0 ? `- ${line}` : `  ${line}`));
}

function quote(text: string): string[] {
  return textLines(text).map((line) => (line ? `> ${line}` : '>'));
}

function fileLine(files: string[], max?: number): string[] {
  if (files.length === 0) return [];
  return [`**Files:** ${formatFileList(files.map(code), max)}`, ''];
}

/**
 * Markdown section for a pull request description, using the same
 * verbose/condensed rule as the commit trailer.
 */
export function renderPrBody(view: ConsolidatedView, opts: RenderOptions): string {
  if (view.promptCount === 0) return '';

  const lines = ['## AI Provenance', ''];

  if (selectMode(view.promptCount, opts.verboseThreshold) === 'verbose') {
    view.sessions.forEach((entry, i) => {
      lines.push(`**Session ${i + 1}** (${describeSession(entry)})`, '');
      for (const prompt of entry.prompts) {
        lines.push(...bullet(prompt.text));
      }
      lines.push('');
    });
    lines.push(...fileLine(view.files));
  } else {
    const bounds = viewBounds(view);
    if (!bounds) return '';

    lines.push(
      `**${pluralize(view.promptCount, 'prompt')}** · ${pluralize(view.sessions.length, 'session')} over ${bounds.span}`,
      '',
    );
    view.sessions.forEach((entry, i) => {
      lines.push(`- **Session ${i + 1}** (${describeSession(entry)})`);
    });
    lines.push(
      '',
      '**First:**',
      ...quote(bounds.first.text),
      '',
      '**Last:**',
      ...quote(bounds.last.text),
      '',
      `Full history: ${code(opts.historyCommand ?? DEFAULT_HISTORY_COMMAND)}`,
      '',
      ...fileLine(view.files, opts.fileDisplayLimit),
    );
  }

  while (lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n') + '\n';
}
