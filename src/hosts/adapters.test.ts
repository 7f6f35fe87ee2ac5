import { describe, it, expect, beforeEach } from 'vitest';
import { createFunctionToolList, registerFunctionTools } from './function-host.js';
import { createArgListToolList, registerArgListTools } from './arg-list-host.js';
import { ToolArgumentError, positionalToNamed } from './invoke.js';
import { createCoreTools } from '../tools/core-tools.js';
import { createToolContext, type ToolContext } from '../tools/tool-context.js';
import type { ToolDescriptor } from '../tools/tool-system.js';

const REVERSED_NAMES = [
  'ReplaceBuffer',
  'EditBuffer',
  'ViewBuffer',
  'Replace',
  'Edit',
  'View',
  'LS',
  'GrepTool',
  'GlobTool',
  'Bash',
];

describe('host adapters', () => {
  let context: ToolContext;
  let descriptors: ToolDescriptor[];

  beforeEach(() => {
    context = createToolContext();
    descriptors = createCoreTools(context);
  });

  describe('function-calling host', () => {
    it('should install every tool, most recent first', () => {
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      expect(host.names()).toEqual(REVERSED_NAMES);
    });

    it('should be idempotent', () => {
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);
      registerFunctionTools(host, descriptors);

      expect(host.names()).toEqual(REVERSED_NAMES);
    });

    it('should expose JSON schema parameters', () => {
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      const edit = host.find('EditBuffer');
      expect(edit?.type).toBe('function');
      expect(edit?.function.parameters.required).toEqual(['buffer_name', 'old_string', 'new_string']);
    });

    it('should execute with named arguments', async () => {
      context.buffers.open('notes', 'hello world');
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      const output = await host.find('EditBuffer')?.execute({
        buffer_name: 'notes',
        old_string: 'world',
        new_string: 'there',
      });

      expect(output).toBe('Successfully edited notes');
      expect(context.buffers.get('notes')).toBe('hello there');
    });

    it('should reject invalid arguments', async () => {
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      await expect(host.find('ViewBuffer')?.execute({ limit: 3 })).rejects.toThrow(
        "Invalid arguments for ViewBuffer: Missing required parameter: 'buffer_name'",
      );
    });

    it('should treat null optional arguments as omitted', async () => {
      context.buffers.open('n', 'first\nsecond');
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      const output = await host.find('ViewBuffer')?.execute({ buffer_name: 'n', limit: null, offset: null });

      expect(output).toBe('first\nsecond');
    });

    it('should still reject a null required argument', async () => {
      const host = createFunctionToolList();
      registerFunctionTools(host, descriptors);

      await expect(host.find('ViewBuffer')?.execute({ buffer_name: null })).rejects.toThrow(
        "Invalid arguments for ViewBuffer: Missing required parameter: 'buffer_name'",
      );
    });
  });

  describe('argument-list host', () => {
    it('should install every tool with ordered args', () => {
      const host = createArgListToolList();
      registerArgListTools(host, descriptors);

      expect(host.names()).toEqual(REVERSED_NAMES);
      expect(host.find('LS')?.args).toEqual([
        { name: 'path', type: 'string', description: 'Directory to list' },
        {
          name: 'ignore',
          type: 'array',
          description: 'Regular expressions; entries whose absolute path matches any of them are skipped',
          optional: true,
        },
      ]);
      expect(host.find('LS')?.category).toBe('filesystem');
    });

    it('should call with positional values, skipping absent optionals', async () => {
      context.buffers.open('notes', 'a\nb\nc');
      const host = createArgListToolList();
      registerArgListTools(host, descriptors);
      const view = host.find('ViewBuffer');

      expect(await view?.function('notes', null, 1)).toBe('b\nc');
      expect(await view?.function('notes', 1)).toBe('a');
    });

    it('should reject wrongly typed positional values', async () => {
      const host = createArgListToolList();
      registerArgListTools(host, descriptors);

      await expect(host.find('ViewBuffer')?.function('notes', 'ten')).rejects.toBeInstanceOf(ToolArgumentError);
    });
  });

  describe('positionalToNamed', () => {
    it('should reject too many values', () => {
      const view = descriptors.find((d) => d.name === 'View');
      expect(view).toBeDefined();
      if (!view) return;

      expect(() => positionalToNamed(view, ['a', 1, 2, 3])).toThrow(
        'Invalid arguments for View: Expected at most 3 arguments, got 4',
      );
    });
  });
});
