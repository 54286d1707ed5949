import Ajv from 'ajv';
import { HookEventName, HookInput } from './types';

const hookInputSchema = {
  type: 'object',
  required: ['tool_name'],
  properties: {
    hook_event_name: { type: 'string' },
    tool_name: { type: 'string' },
    tool_input: {
      type: 'object',
      properties: {
        prompt: { type: 'string' },
        subagent_type: { type: 'string' },
        url: { type: 'string' },
      },
    },
    cwd: { type: 'string' },
  },
};

const ajv = new Ajv();

export const isHookInput = ajv.compile<HookInput>(hookInputSchema);

export function hookEventOf(input: HookInput): HookEventName | undefined {
  if (input.hook_event_name === 'PreToolUse' || input.hook_event_name === 'PostToolUse') {
    return input.hook_event_name;
  }
  if (input.hook_event_name) return undefined;
  // No event name: only post-tool payloads carry a result
  return input.tool_response !== undefined || input.tool_result !== undefined ? 'PostToolUse' : 'PreToolUse';
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    return value
      .map((block: unknown) => (typeof block === 'object' && block !== null && 'text' in block ? textOf(block.text) : ''))
      .filter((text) => text.length > 0)
      .join('\n');
  }
  if (typeof value === 'object' && value !== null) {
    for (const field of ['content', 'output', 'text', 'result']) {
      if (field in value) {
        const text = textOf(Reflect.get(value, field));
        if (text) return text;
      }
    }
  }
  return '';
}

/** Plain text of whatever result shape the runtime sent. */
export function resultTextOf(input: HookInput): string {
  return textOf(input.tool_response ?? input.tool_result);
}
