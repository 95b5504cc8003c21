/**
 * Tool contract shared by every capability the planner may invoke
 */

import type { ContextMap } from './context.js';

export type FieldType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  readonly type: FieldType;
  readonly description?: string;
  readonly default?: string | number | boolean;
  readonly enum?: readonly string[];
}

export interface ToolSchema {
  readonly type: 'object';
  readonly required?: readonly string[];
  readonly properties: Readonly<Record<string, FieldSchema>>;
}

export interface ToolResult {
  readonly success: boolean;
  readonly outputs: ContextMap;
  readonly error?: string | undefined;
  readonly metadata?: ContextMap | undefined;
}

export type InputValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly error: string };

export interface ToolDescription {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolSchema;
  readonly outputSchema: ToolSchema;
}

export interface ToolContract {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolSchema;
  readonly outputSchema: ToolSchema;
  validateInputs(inputs: ContextMap): InputValidation;
  execute(inputs: ContextMap): Promise<ToolResult>;
  describe(): ToolDescription;
}
