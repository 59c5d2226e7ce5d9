import { z } from 'zod';
import type { ActionKind, ResumeToken } from '../events.js';
import { SubprocessRunner } from '../runner.js';
import type { BuiltInvocation, EngineSignal, RunInvocation } from '../runner.js';

const initLineSchema = z.object({
  type: z.literal('system'),
  subtype: z.string(),
  session_id: z.string().optional()
});

const contentBlockSchema = z.union([
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string() }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: z.record(z.unknown()).default({})
  }),
  z.object({
    type: z.literal('tool_result'),
    tool_use_id: z.string(),
    is_error: z.boolean().optional()
  }),
  z.object({ type: z.string() })
]);

const messageLineSchema = z.object({
  type: z.enum(['assistant', 'user']),
  message: z.object({
    content: z.union([z.string(), z.array(contentBlockSchema)])
  })
});

const resultLineSchema = z.object({
  type: z.literal('result'),
  subtype: z.string(),
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  session_id: z.string().optional()
});

interface ToolCall {
  kind: ActionKind;
  detail: string;
}

interface ClaudeRunState {
  tools: Map<string, ToolCall>;
}

const FILE_TOOLS = new Set(['Edit', 'MultiEdit', 'Write', 'NotebookEdit']);
const WEB_TOOLS = new Set(['WebSearch', 'WebFetch']);

function stringField(input: Record<string, unknown>, key: string): string | undefined {
  const value = input[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function describeToolCall(name: string, input: Record<string, unknown>): ToolCall {
  if (name === 'Bash') {
    return { kind: 'command', detail: stringField(input, 'command') ?? name };
  }
  if (FILE_TOOLS.has(name)) {
    return { kind: 'file_change', detail: stringField(input, 'file_path') ?? stringField(input, 'notebook_path') ?? name };
  }
  if (WEB_TOOLS.has(name)) {
    return { kind: 'web_search', detail: stringField(input, 'query') ?? stringField(input, 'url') ?? name };
  }
  const target = stringField(input, 'file_path') ?? stringField(input, 'pattern') ?? stringField(input, 'path');
  return { kind: 'tool', detail: target ? `${name} ${target}` : name };
}

/**
 * Claude Code in headless mode: `claude -p --output-format stream-json`.
 * The prompt goes in on stdin.
 */
export class ClaudeRunner extends SubprocessRunner<ClaudeRunState> {
  readonly engine = 'claude';
  protected readonly resumePattern = /`?claude\s+(?:--resume|-r)\s+(?<token>[^`\s]+)`?/g;

  protected createState(): ClaudeRunState {
    return { tools: new Map() };
  }

  protected buildInvocation(invocation: RunInvocation): BuiltInvocation {
    const { engineConfig } = invocation;
    const args = ['-p', '--output-format', 'stream-json', '--verbose'];
    if (invocation.resumeToken) {
      args.push('--resume', invocation.resumeToken.value);
    }
    if (engineConfig.model) {
      args.push('--model', engineConfig.model);
    }
    args.push(...engineConfig.args);
    return { command: engineConfig.command, args, stdin: invocation.prompt };
  }

  protected parseLine(data: Record<string, unknown>, state: ClaudeRunState): EngineSignal[] | undefined {
    switch (data.type) {
      case 'system': {
        const parsed = initLineSchema.safeParse(data);
        if (!parsed.success) return undefined;
        const sessionId = parsed.data.session_id;
        return parsed.data.subtype === 'init' && sessionId ? [{ type: 'session', value: sessionId }] : [];
      }
      case 'assistant':
      case 'user': {
        const parsed = messageLineSchema.safeParse(data);
        if (!parsed.success) return undefined;
        const { content } = parsed.data.message;
        if (typeof content === 'string') return [];
        return content.flatMap((block) => this.blockSignals(block, state));
      }
      case 'result': {
        const parsed = resultLineSchema.safeParse(data);
        if (!parsed.success) return undefined;
        const line = parsed.data;
        const signals: EngineSignal[] = [];
        if (line.session_id) {
          signals.push({ type: 'session', value: line.session_id });
        }
        const ok = line.subtype === 'success' && line.is_error !== true;
        signals.push({
          type: 'result',
          ok,
          text: line.result ?? '',
          error: ok ? undefined : line.result || `claude run ended with ${line.subtype}`
        });
        return signals;
      }
      default:
        return [];
    }
  }

  private blockSignals(block: z.infer<typeof contentBlockSchema>, state: ClaudeRunState): EngineSignal[] {
    if ('text' in block && block.type === 'text') {
      const text = block.text.trim();
      return text ? [{ type: 'action', kind: 'note', detail: text }] : [];
    }
    if ('name' in block && block.type === 'tool_use') {
      const call = describeToolCall(block.name, block.input);
      state.tools.set(block.id, call);
      return [{ type: 'action', kind: call.kind, detail: call.detail }];
    }
    if ('tool_use_id' in block && block.type === 'tool_result' && block.is_error) {
      const call = state.tools.get(block.tool_use_id);
      return call ? [{ type: 'action', kind: call.kind, detail: call.detail, ok: false }] : [];
    }
    return [];
  }

  formatResume(token: ResumeToken): string {
    this.assertOwnToken(token);
    return `\`claude --resume ${token.value}\``;
  }
}
