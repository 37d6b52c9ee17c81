/**
 * Typed capability registry used when the assistant run asks for an action.
 *
 * Every dispatched call produces exactly one ToolOutput: bad arguments, unknown
 * names and handler failures come back as structured error text, because the
 * run only continues once every requested call has an output.
 */

import type { Static, TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ToolCall, ToolContext, ToolOutput } from '../types/core';
import { AssistantError, NotFoundError, ValidationError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('tool-registry');

export type ToolHandler<S extends TObject> = Capability<S>['handler'];

export interface Capability<S extends TObject = TObject> {
  name: string;
  description: string;
  parameters: S;
  handler(args: Static<S>, context: ToolContext): string | Promise<string>;
}

/** Function definition in the shape the assistant API expects */
export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolRegistryOptions {
  maxOutputLength?: number;
}

const DEFAULT_CONTEXT: ToolContext = { userId: 'unknown' };

export class ToolRegistry {
  private readonly capabilities = new Map<string, Capability>();
  private readonly maxOutputLength: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.maxOutputLength = options.maxOutputLength ?? 1500;
  }

  register<S extends TObject>(name: string, handler: ToolHandler<S>, argSpec: S, description = ''): void {
    this.registerCapability({ name, description, parameters: argSpec, handler });
  }

  registerCapability<S extends TObject>(capability: Capability<S>): void {
    if (this.capabilities.has(capability.name)) {
      throw new AssistantError(`Capability "${capability.name}" already registered`, 'DUPLICATE_CAPABILITY');
    }
    this.capabilities.set(capability.name, capability);
    log.debug({ capability: capability.name }, 'Capability registered');
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  names(): string[] {
    return [...this.capabilities.keys()];
  }

  definitions(): FunctionDefinition[] {
    return [...this.capabilities.values()].map(capability => ({
      name: capability.name,
      description: capability.description,
      parameters: {
        type: 'object',
        properties: capability.parameters.properties,
        // defaulted arguments are filled in on dispatch, the model may leave them out
        required: (capability.parameters.required ?? [])
          .filter(name => capability.parameters.properties[name]?.default === undefined)
      }
    }));
  }

  async dispatch(call: ToolCall, context: ToolContext = DEFAULT_CONTEXT): Promise<ToolOutput> {
    const capability = this.capabilities.get(call.functionName);
    if (!capability) {
      log.warn({ function: call.functionName, callId: call.callId }, 'Unknown capability requested');
      return this.output(call, errorText('unknown_function', call.functionName, [
        `no capability named "${call.functionName}"`
      ]));
    }

    const args = coerceArguments(capability.parameters, call.arguments);
    if (!Value.Check(capability.parameters, args)) {
      const details = [...Value.Errors(capability.parameters, args)]
        .slice(0, 5)
        .map(error => `${error.path || '/'}: ${error.message}`);
      log.info({ function: call.functionName, details }, 'Tool call arguments rejected');
      return this.output(call, errorText('invalid_arguments', call.functionName, details));
    }

    log.info({ function: call.functionName, callId: call.callId, userId: context.userId }, 'Dispatching tool call');
    try {
      const text = await capability.handler(args, context);
      return this.output(call, text || '(no output)');
    } catch (error) {
      log.error({ err: error, function: call.functionName }, 'Tool handler failed');
      return this.output(call, errorText('handler_failed', call.functionName, [describeFailure(error)]));
    }
  }

  /**
   * Dispatch a whole requires-action batch concurrently; outputs keep call order
   */
  async dispatchBatch(calls: ToolCall[], context: ToolContext = DEFAULT_CONTEXT): Promise<ToolOutput[]> {
    return Promise.all(calls.map(call => this.dispatch(call, context)));
  }

  private output(call: ToolCall, text: string): ToolOutput {
    return {
      callId: call.callId,
      outputText: truncate(text, this.maxOutputLength)
    };
  }
}

/** Cut to `max` UTF-16 units without leaving half of a surrogate pair */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return text.slice(0, end);
}

function coerceArguments(schema: TObject, raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  return Value.Convert(schema, Value.Default(schema, Value.Clone(raw)));
}

function errorText(error: string, functionName: string, details: string[]): string {
  return JSON.stringify({ error, function: functionName, details });
}

/** Only our own validation and lookup messages are safe to hand back verbatim */
function describeFailure(error: unknown): string {
  if (error instanceof ValidationError || error instanceof NotFoundError) {
    return error.message;
  }
  if (error instanceof AssistantError) {
    return `${error.code.toLowerCase()}: the service could not complete this request`;
  }
  return 'unexpected error while running this capability';
}
