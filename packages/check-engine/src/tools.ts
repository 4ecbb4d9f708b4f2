// packages/check-engine/src/tools.ts
//
// Tools whose result bundle is described by a JSON Schema. Result keys are
// dotted paths into the bundle ("times.host-a", "samples.0").

import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import type { Tool, ToolResult } from "shared-types";
import { ResultKeyError, ToolResultError } from "./errors";

const ajv = new Ajv({ allErrors: true, strict: false });

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function splitKey(key: string): string[] {
  return key.split(".").filter((part) => part.length > 0);
}

type SchemaNode = Record<string, unknown>;

/** Sub-schema for one path segment, or undefined when the schema cannot contain it. */
function childSchema(schema: SchemaNode, segment: string): SchemaNode | undefined {
  const props = schema.properties;
  if (isRecord(props) && Object.prototype.hasOwnProperty.call(props, segment)) {
    const sub = props[segment];
    return isRecord(sub) ? sub : {};
  }

  const additional = schema.additionalProperties;
  if (isRecord(additional)) return additional;
  if (additional === true) return {};

  const items = schema.items;
  if (schema.type === "array" && /^\d+$/.test(segment)) {
    return isRecord(items) ? items : {};
  }
  return undefined;
}

export function schemaHasKey(schema: SchemaObject, key: string): boolean {
  const parts = splitKey(key);
  if (parts.length === 0) return false;

  let current: SchemaNode | undefined = schema;
  for (const part of parts) {
    if (!current) return false;
    current = childSchema(current, part);
  }
  return current !== undefined;
}

export function getResultValueByKey(result: unknown, key: string): unknown {
  let current: unknown = result;
  for (const part of splitKey(key)) {
    if (Array.isArray(current) && /^\d+$/.test(part) && Number(part) < current.length) {
      current = current[Number(part)];
      continue;
    }
    if (isRecord(current) && !Array.isArray(current) && Object.prototype.hasOwnProperty.call(current, part)) {
      current = current[part];
      continue;
    }
    throw new ResultKeyError(key, `Key "${part}" of "${key}" not found in tool result`);
  }
  return current;
}

export class ToolResultBundle implements ToolResult {
  constructor(public readonly data: unknown) {}

  lookup(key: string): unknown {
    return getResultValueByKey(this.data, key);
  }
}

/**
 * Base for tools: subclasses implement `execute`; the raw result is checked
 * against `resultSchema` before any comparison sees it.
 */
export abstract class SchemaTool implements Tool {
  private validator: ValidateFunction | undefined;

  constructor(
    public readonly type: string,
    protected readonly resultSchema: SchemaObject
  ) {}

  protected abstract execute(): Promise<unknown>;

  validateResultKey(key: string): void {
    if (!schemaHasKey(this.resultSchema, key)) {
      throw new ResultKeyError(key, `Result key "${key}" is not valid for tool ${this.type}`);
    }
  }

  async run(): Promise<ToolResult> {
    const raw = await this.execute();
    if (!this.validator) this.validator = ajv.compile(this.resultSchema);
    if (!this.validator(raw)) {
      throw new ToolResultError(`Tool ${this.type} returned an invalid result: ${ajv.errorsText(this.validator.errors)}`);
    }
    return new ToolResultBundle(raw);
  }
}
