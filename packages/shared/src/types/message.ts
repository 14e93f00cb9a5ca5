import type { JsonValue } from './run.js';

export interface ToolCall {
  id: string;
  name: string;
  args: JsonValue;
}

export interface HumanMessage {
  role: 'human';
  content: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface AIMessage {
  role: 'ai';
  content: string;
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: 'tool';
  tool_call_id: string;
  name: string;
  content: string;
}

export type Message = HumanMessage | SystemMessage | AIMessage | ToolMessage;
