import { z, type ZodTypeAny } from 'zod';
import type { JsonSchema, ModelToolSchema, ToolDefinition } from '@steward/shared';

/**
 * Converts a Zod schema to the JSON Schema subset that function-calling
 * APIs accept. Unknown Zod types become an unconstrained schema.
 */
export function zodToJsonSchema(schema: ZodTypeAny): JsonSchema {
  const converted = convert(schema);
  return schema.description ? { ...converted, description: schema.description } : converted;
}

function convert(schema: ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToJsonSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return { ...zodToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() };
  }
  if (schema instanceof z.ZodEffects) {
    return zodToJsonSchema(schema.innerType());
  }
  if (schema instanceof z.ZodString) {
    const out: JsonSchema = { type: 'string' };
    if (schema.minLength !== null) out.minLength = schema.minLength;
    if (schema.maxLength !== null) out.maxLength = schema.maxLength;
    return out;
  }
  if (schema instanceof z.ZodNumber) {
    const out: JsonSchema = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) out.minimum = schema.minValue;
    if (schema.maxValue !== null) out.maximum = schema.maxValue;
    return out;
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }
  if (schema instanceof z.ZodEnum) {
    const options: unknown[] = schema.options;
    return { type: 'string', enum: options.filter((o): o is string => typeof o === 'string') };
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return { type: typeof value, enum: [value] };
    }
    return {};
  }
  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element) };
  }
  if (schema instanceof z.ZodRecord) {
    return { type: 'object', additionalProperties: zodToJsonSchema(schema.valueSchema) };
  }
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, ZodTypeAny> = schema.shape;
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];
    for (const [key, field] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(field);
      if (!field.isOptional()) required.push(key);
    }
    return {
      type: 'object',
      properties,
      ...(required.length ? { required } : {}),
      additionalProperties: false,
    };
  }
  return {};
}

export function toModelTool(tool: ToolDefinition): ModelToolSchema {
  return {
    name: tool.name,
    description: tool.description,
    parameters: zodToJsonSchema(tool.inputSchema),
  };
}
