import { Type } from '@sinclair/typebox';
import { describe, expect, it, vi } from 'vitest';
import { ToolRegistry, truncate } from '../src/tools/registry';
import { AssistantError, ProviderFatalError, ValidationError } from '../src/utils/errors';

const context = { userId: 'alice' };

function failureText(functionName: string, details: string[], error = 'handler_failed'): string {
  return JSON.stringify({ error, function: functionName, details });
}

describe('ToolRegistry', () => {
  it('dispatches validated arguments to the handler', async () => {
    const registry = new ToolRegistry();
    const handler = vi.fn((args: { text: string }) => `echo:${args.text}`);
    registry.register('echo', handler, Type.Object({ text: Type.String() }), 'Echo');

    const output = await registry.dispatch({ callId: 'call_1', functionName: 'echo', arguments: { text: 'hi' } }, context);

    expect(output).toEqual({ callId: 'call_1', outputText: 'echo:hi' });
    expect(handler).toHaveBeenCalledWith({ text: 'hi' }, context);
  });

  it('coerces numeric strings and fills defaults', async () => {
    const registry = new ToolRegistry();
    registry.register('days', args => `days=${args.days} limit=${args.limit}`, Type.Object({
      days: Type.Integer(),
      limit: Type.Integer({ default: 7 })
    }));

    const output = await registry.dispatch({ callId: 'c', functionName: 'days', arguments: { days: '5' } });

    expect(output.outputText).toBe('days=5 limit=7');
  });

  it('reports an unknown function as an output', async () => {
    const registry = new ToolRegistry();

    const output = await registry.dispatch({ callId: 'c', functionName: 'teleport', arguments: {} });

    expect(output).toEqual({
      callId: 'c',
      outputText: failureText('teleport', ['no capability named "teleport"'], 'unknown_function')
    });
  });

  it('reports invalid arguments without calling the handler', async () => {
    const registry = new ToolRegistry();
    const handler = vi.fn(() => 'never');
    registry.register('count', handler, Type.Object({ n: Type.Integer() }));

    const output = await registry.dispatch({ callId: 'c', functionName: 'count', arguments: { n: 'many' } });
    const parsed: unknown = JSON.parse(output.outputText);

    expect(parsed).toMatchObject({ error: 'invalid_arguments', function: 'count' });
    expect(handler).not.toHaveBeenCalled();
  });

  it('rejects arguments that were not valid JSON', async () => {
    const registry = new ToolRegistry();
    registry.register('count', () => 'never', Type.Object({ n: Type.Integer() }));

    const output = await registry.dispatch({ callId: 'c', functionName: 'count', arguments: '{"n": 1' });

    expect(JSON.parse(output.outputText)).toMatchObject({ error: 'invalid_arguments' });
  });

  it('passes validation messages through', async () => {
    const registry = new ToolRegistry();
    registry.register('boom', () => {
      throw new ValidationError('bad date');
    }, Type.Object({}));

    const output = await registry.dispatch({ callId: 'c', functionName: 'boom', arguments: {} });

    expect(output.outputText).toBe(failureText('boom', ['bad date']));
  });

  it('hides provider and unexpected error details', async () => {
    const registry = new ToolRegistry();
    registry.register('fatal', async () => {
      throw new ProviderFatalError('401 token=test-secret');
    }, Type.Object({}));
    registry.register('crash', () => {
      throw new Error('stack with internals');
    }, Type.Object({}));

    const fatal = await registry.dispatch({ callId: 'a', functionName: 'fatal', arguments: {} });
    const crash = await registry.dispatch({ callId: 'b', functionName: 'crash', arguments: {} });

    expect(fatal.outputText).toBe(failureText('fatal', ['provider_fatal: the service could not complete this request']));
    expect(crash.outputText).toBe(failureText('crash', ['unexpected error while running this capability']));
  });

  it('truncates long outputs and fills empty ones', async () => {
    const registry = new ToolRegistry({ maxOutputLength: 10 });
    registry.register('long', () => 'x'.repeat(50), Type.Object({}));
    registry.register('empty', () => '', Type.Object({}));

    expect((await registry.dispatch({ callId: 'a', functionName: 'long', arguments: {} })).outputText).toBe('x'.repeat(10));
    expect((await registry.dispatch({ callId: 'b', functionName: 'empty', arguments: {} })).outputText).toBe('(no output)');
  });

  it('never splits a surrogate pair when truncating', async () => {
    const registry = new ToolRegistry({ maxOutputLength: 5 });
    registry.register('emoji', () => 'abcd😀efg', Type.Object({}));

    const output = await registry.dispatch({ callId: 'a', functionName: 'emoji', arguments: {} });

    expect(output.outputText).toBe('abcd');
    expect(truncate('abc😀', 5)).toBe('abc😀');
  });

  it('produces one output per call in call order', async () => {
    const registry = new ToolRegistry();
    registry.register('slow', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      return 'slow';
    }, Type.Object({}));
    registry.register('fast', () => 'fast', Type.Object({}));

    const outputs = await registry.dispatchBatch([
      { callId: 'a', functionName: 'slow', arguments: {} },
      { callId: 'b', functionName: 'fast', arguments: {} },
      { callId: 'c', functionName: 'missing', arguments: {} }
    ], context);

    expect(outputs.map(output => output.callId)).toEqual(['a', 'b', 'c']);
    expect(outputs[0].outputText).toBe('slow');
    expect(outputs[1].outputText).toBe('fast');
  });

  it('renders function definitions from the schemas', () => {
    const registry = new ToolRegistry();
    registry.register('echo', args => args.text, Type.Object({
      text: Type.String({ description: 'What to say' }),
      loud: Type.Optional(Type.Boolean())
    }), 'Echo text back');

    const [definition] = registry.definitions();

    expect(definition.name).toBe('echo');
    expect(definition.description).toBe('Echo text back');
    expect(JSON.parse(JSON.stringify(definition.parameters))).toEqual({
      type: 'object',
      properties: {
        text: { type: 'string', description: 'What to say' },
        loud: { type: 'boolean' }
      },
      required: ['text']
    });
  });

  it('leaves defaulted arguments out of the required list', () => {
    const registry = new ToolRegistry();
    registry.register('list', args => String(args.count), Type.Object({
      query: Type.String(),
      count: Type.Integer({ default: 10 })
    }));

    const [definition] = registry.definitions();

    expect(definition.parameters.required).toEqual(['query']);
  });

  it('refuses duplicate names', () => {
    const registry = new ToolRegistry();
    registry.register('echo', () => 'a', Type.Object({}));

    expect(() => registry.register('echo', () => 'b', Type.Object({}))).toThrow(AssistantError);
    expect(registry.names()).toEqual(['echo']);
  });
});
