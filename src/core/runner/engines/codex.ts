import { z } from 'zod';
import type { ResumeToken } from '../events.js';
import { SubprocessRunner } from '../runner.js';
import type { BuiltInvocation, EngineSignal, RunInvocation } from '../runner.js';

const itemSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('agent_message'), text: z.string() }),
  z.object({ type: z.literal('reasoning'), text: z.string() }),
  z.object({
    type: z.literal('command_execution'),
    command: z.string(),
    exit_code: z.number().nullable().optional(),
    status: z.string().optional()
  }),
  z.object({
    type: z.literal('file_change'),
    changes: z.array(z.object({ path: z.string(), kind: z.string().optional() })),
    status: z.string().optional()
  }),
  z.object({
    type: z.literal('mcp_tool_call'),
    server: z.string(),
    tool: z.string(),
    status: z.string().optional()
  }),
  z.object({ type: z.literal('web_search'), query: z.string() }),
  z.object({ type: z.literal('error'), message: z.string() })
]);

const lineSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('thread.started'), thread_id: z.string() }),
  z.object({ type: z.literal('item.completed'), item: z.object({ type: z.string() }).passthrough() }),
  z.object({ type: z.literal('turn.completed') }),
  z.object({ type: z.literal('turn.failed'), error: z.object({ message: z.string() }) }),
  z.object({ type: z.literal('error'), message: z.string() })
]);

const KNOWN_LINE_TYPES = new Set(['thread.started', 'item.completed', 'turn.completed', 'turn.failed', 'error']);

interface CodexRunState {
  lastMessage: string;
}

/**
 * `codex exec --json`. Only completed items are reported; the final
 * agent message becomes the run result.
 */
export class CodexRunner extends SubprocessRunner<CodexRunState> {
  readonly engine = 'codex';
  protected readonly resumePattern = /`?codex\s+resume\s+(?<token>[^`\s]+)`?/g;

  protected createState(): CodexRunState {
    return { lastMessage: '' };
  }

  protected buildInvocation(invocation: RunInvocation): BuiltInvocation {
    const { engineConfig } = invocation;
    const args = ['exec', '--json', ...engineConfig.args];
    if (engineConfig.model) {
      args.push('--model', engineConfig.model);
    }
    if (invocation.resumeToken) {
      args.push('resume', invocation.resumeToken.value);
    }
    args.push('-');
    return { command: engineConfig.command, args, stdin: invocation.prompt };
  }

  protected parseLine(data: Record<string, unknown>, state: CodexRunState): EngineSignal[] | undefined {
    if (typeof data.type !== 'string' || !KNOWN_LINE_TYPES.has(data.type)) {
      return [];
    }
    const parsed = lineSchema.safeParse(data);
    if (!parsed.success) return undefined;
    const line = parsed.data;

    switch (line.type) {
      case 'thread.started':
        return [{ type: 'session', value: line.thread_id }];
      case 'item.completed': {
        const item = itemSchema.safeParse(line.item);
        // Item types added by newer codex releases are not errors.
        return item.success ? this.itemSignals(item.data, state) : [];
      }
      case 'turn.completed':
        return [{ type: 'result', ok: true, text: state.lastMessage }];
      case 'turn.failed':
        return [{ type: 'result', ok: false, text: state.lastMessage, error: line.error.message }];
      case 'error':
        return [{ type: 'action', kind: 'warning', detail: line.message }];
    }
  }

  private itemSignals(item: z.infer<typeof itemSchema>, state: CodexRunState): EngineSignal[] {
    switch (item.type) {
      case 'agent_message':
        state.lastMessage = item.text;
        return [];
      case 'reasoning':
        return item.text.trim() ? [{ type: 'action', kind: 'note', detail: item.text.trim() }] : [];
      case 'command_execution':
        return [
          {
            type: 'action',
            kind: 'command',
            detail: item.command,
            ok: item.status === 'failed' || (item.exit_code != null && item.exit_code !== 0) ? false : undefined
          }
        ];
      case 'file_change':
        return item.changes.map((change) => ({
          type: 'action' as const,
          kind: 'file_change' as const,
          detail: change.kind ? `${change.kind} ${change.path}` : change.path,
          ok: item.status === 'failed' ? false : undefined
        }));
      case 'mcp_tool_call':
        return [
          {
            type: 'action',
            kind: 'tool',
            detail: `${item.server}.${item.tool}`,
            ok: item.status === 'failed' ? false : undefined
          }
        ];
      case 'web_search':
        return [{ type: 'action', kind: 'web_search', detail: item.query }];
      case 'error':
        return [{ type: 'action', kind: 'warning', detail: item.message }];
    }
  }

  formatResume(token: ResumeToken): string {
    this.assertOwnToken(token);
    return `\`codex resume ${token.value}\``;
  }
}
