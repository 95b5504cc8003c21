/**
 * Base tool shared by every built-in capability
 *
 * Subclasses declare name, description and schemas, and implement execute().
 * execute() reports expected failures through a ToolResult with
 * success=false rather than throwing.
 */

import { z } from 'zod';
import type { ContextMap } from '../types/context.js';
import type {
  FieldSchema,
  InputValidation,
  ToolContract,
  ToolDescription,
  ToolResult,
  ToolSchema,
} from '../types/tools.js';

function fieldValidator(field: FieldSchema): z.ZodTypeAny {
  switch (field.type) {
    case 'string': {
      const [first, ...rest] = field.enum ?? [];
      if (first === undefined) {
        return z.string();
      }
      const values: [string, ...string[]] = [first, ...rest];
      return z.enum(values);
    }
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

/**
 * Build a zod validator from a tool's input schema. Required fields are checked
 * for presence separately, so every property is optional here and unknown
 * keys pass through.
 */
export function buildInputValidator(schema: ToolSchema): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(schema.properties)) {
    shape[name] = fieldValidator(field).optional();
  }
  return z.object(shape).passthrough();
}

export abstract class BaseTool implements ToolContract {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly inputSchema: ToolSchema;
  abstract readonly outputSchema: ToolSchema;

  private validator: z.ZodTypeAny | null = null;

  abstract execute(inputs: ContextMap): Promise<ToolResult>;

  /**
   * Check required fields and primitive types against the input schema
   */
  validateInputs(inputs: ContextMap): InputValidation {
    for (const field of this.inputSchema.required ?? []) {
      if (!Object.prototype.hasOwnProperty.call(inputs, field)) {
        return { valid: false, error: `Missing required field: ${field}` };
      }
    }

    if (this.validator === null) {
      this.validator = buildInputValidator(this.inputSchema);
    }

    const result = this.validator.safeParse(inputs);
    if (result.success) {
      return { valid: true };
    }

    const issue = result.error.issues[0];
    const fieldName = issue !== undefined ? String(issue.path[0] ?? '') : '';
    const field = this.inputSchema.properties[fieldName];

    if (issue?.code === 'invalid_enum_value' && field?.enum !== undefined) {
      return {
        valid: false,
        error: `Invalid value for ${fieldName}: expected one of ${field.enum.join(', ')}`,
      };
    }

    return {
      valid: false,
      error: `Invalid type for ${fieldName}: expected ${field?.type ?? 'unknown'}`,
    };
  }

  describe(): ToolDescription {
    return {
      name: this.name,
      description: this.description,
      inputSchema: this.inputSchema,
      outputSchema: this.outputSchema,
    };
  }

  toString(): string {
    return `<Tool: ${this.name}>`;
  }

  protected success(outputs: ContextMap, metadata?: ContextMap): ToolResult {
    return metadata !== undefined ? { success: true, outputs, metadata } : { success: true, outputs };
  }

  protected failure(error: string, metadata?: ContextMap): ToolResult {
    return metadata !== undefined
      ? { success: false, outputs: {}, error, metadata }
      : { success: false, outputs: {}, error };
  }
}
