import { editTarget, replaceTarget, viewTarget } from '../editing/text-edit.js';
import { FileTarget } from '../targets/file-target.js';
import type { TextTarget } from '../targets/text-target.js';
import type { ToolArg, ToolDescriptor } from './tool-system.js';
import { optionalNumberArg, stringArg } from './tool-args.js';
import type { ToolContext } from './tool-context.js';

/**
 * How a family of view/edit/replace tools addresses its targets
 */
export interface TargetBinding {
  /** Suffix appended to the tool names, e.g. 'Buffer' gives ViewBuffer */
  suffix: string;
  category: string;
  /** Noun used in descriptions */
  noun: string;
  argName: string;
  argDescription: string;
  resolve(name: string): TextTarget;
}

export function fileBinding(context: ToolContext): TargetBinding {
  return {
    suffix: '',
    category: 'filesystem',
    noun: 'file',
    argName: 'file_path',
    argDescription: 'Path of the file (relative paths resolve against the working directory)',
    resolve: (path) => new FileTarget(path, context.workingDirectory),
  };
}

export function bufferBinding(context: ToolContext): TargetBinding {
  return {
    suffix: 'Buffer',
    category: 'buffers',
    noun: 'buffer',
    argName: 'buffer_name',
    argDescription: 'Name of the buffer',
    resolve: (name) => context.buffers.target(name),
  };
}

function targetArg(binding: TargetBinding): ToolArg {
  return { name: binding.argName, type: 'string', description: binding.argDescription, required: true };
}

export function createViewTool(binding: TargetBinding): ToolDescriptor {
  return {
    name: `View${binding.suffix}`,
    description:
      `Read the contents of a ${binding.noun}. ` +
      'Use offset (zero-based line) and limit (line count) to read part of it.',
    category: binding.category,
    args: [
      targetArg(binding),
      { name: 'limit', type: 'number', description: 'Maximum number of lines to return' },
      { name: 'offset', type: 'number', description: 'Zero-based line to start from (default: 0)' },
    ],
    handler: async (args) =>
      viewTarget(binding.resolve(stringArg(args, binding.argName)), {
        limit: optionalNumberArg(args, 'limit'),
        offset: optionalNumberArg(args, 'offset'),
      }),
  };
}

export function createEditTool(binding: TargetBinding): ToolDescriptor {
  return {
    name: `Edit${binding.suffix}`,
    description:
      `Edit a ${binding.noun} by replacing old_string with new_string. ` +
      `old_string must match exactly once, including whitespace; the ${binding.noun} is left untouched otherwise. ` +
      `An empty old_string writes new_string as the whole ${binding.noun}, creating it if needed.`,
    category: binding.category,
    args: [
      targetArg(binding),
      { name: 'old_string', type: 'string', description: 'Exact text to replace', required: true },
      { name: 'new_string', type: 'string', description: 'Text to replace it with', required: true },
    ],
    handler: async (args) =>
      editTarget(
        binding.resolve(stringArg(args, binding.argName)),
        stringArg(args, 'old_string'),
        stringArg(args, 'new_string'),
      ),
  };
}

export function createReplaceTool(binding: TargetBinding): ToolDescriptor {
  return {
    name: `Replace${binding.suffix}`,
    description: `Overwrite the entire content of a ${binding.noun}, creating it if needed.`,
    category: binding.category,
    args: [
      targetArg(binding),
      { name: 'content', type: 'string', description: `New content of the ${binding.noun}`, required: true },
    ],
    handler: async (args) =>
      replaceTarget(binding.resolve(stringArg(args, binding.argName)), stringArg(args, 'content')),
  };
}
