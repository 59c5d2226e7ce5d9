import type { ActionEvent, ActionKind, TerminalEvent } from '../runner/events.js';

export const ACTION_ICONS: Record<Exclude<ActionKind, 'text'>, string> = {
  command: '▸',
  tool: '🔧',
  file_change: '📝',
  web_search: '🔎',
  note: '💭',
  warning: '⚠️'
};

export const FAILED_MARK = '✗';

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/** One progress line per action; `text` actions pass through as written. */
export function renderAction(event: ActionEvent): string {
  if (event.kind === 'text') {
    return withNewline(event.detail);
  }
  const icon = ACTION_ICONS[event.kind];
  const mark = event.ok === false ? `${FAILED_MARK} ` : '';
  return withNewline(`${mark}${icon} ${event.detail}`);
}

function terminalBody(event: TerminalEvent, resumeLine?: string): string {
  switch (event.type) {
    case 'completed': {
      const result = event.result.trim() || '✓ done';
      return resumeLine ? `${result}\n\n${resumeLine}` : result;
    }
    case 'errored':
      return `⚠️ error: ${event.reason}`;
    case 'cancelled':
      return '⏹ cancelled';
  }
}

/**
 * Closing section for a run. `previous` is the text already shown, used to
 * put a blank line between progress and the final section.
 */
export function renderTerminal(event: TerminalEvent, previous: string, resumeLine?: string): string {
  const separator = previous.length === 0 ? '' : previous.endsWith('\n') ? '\n' : '\n\n';
  return `${separator}${terminalBody(event, resumeLine)}`;
}
