/**
 * Hook payloads exchanged with the agent runtime over stdin/stdout.
 */

export type HookEventName = 'PreToolUse' | 'PostToolUse';

export interface HookToolInput {
  prompt?: string;
  subagent_type?: string;
  url?: string;
}

export interface HookInput {
  hook_event_name?: string;
  tool_name: string;
  tool_input?: HookToolInput;
  /** Current runtimes send `tool_response`; older ones `tool_result` */
  tool_response?: unknown;
  tool_result?: unknown;
  cwd?: string;
}

export interface PreToolUseResponse {
  hookSpecificOutput: {
    hookEventName: 'PreToolUse';
    permissionDecision: 'allow';
    permissionDecisionReason: string;
  };
}

export type HookResponse = PreToolUseResponse;
