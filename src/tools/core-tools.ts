import { ToolSystem, type ToolDescriptor } from './tool-system.js';
import { createBashTool } from './shell-tools.js';
import { createGlobTool, createGrepTool, createListTool } from './search-tools.js';
import {
  bufferBinding,
  createEditTool,
  createReplaceTool,
  createViewTool,
  fileBinding,
} from './target-tools.js';
import type { ToolContext } from './tool-context.js';

/**
 * Names of the core tools, in registration order
 */
export const CORE_TOOL_NAMES = [
  'Bash',
  'GlobTool',
  'GrepTool',
  'LS',
  'View',
  'Edit',
  'Replace',
  'ViewBuffer',
  'EditBuffer',
  'ReplaceBuffer',
] as const;

export type CoreToolName = (typeof CORE_TOOL_NAMES)[number];

/**
 * Builds the ordered list of core tool descriptors for a context
 */
export function createCoreTools(context: ToolContext): ToolDescriptor[] {
  const files = fileBinding(context);
  const buffers = bufferBinding(context);

  return [
    createBashTool(context),
    createGlobTool(context),
    createGrepTool(context),
    createListTool(context),
    createViewTool(files),
    createEditTool(files),
    createReplaceTool(files),
    createViewTool(buffers),
    createEditTool(buffers),
    createReplaceTool(buffers),
  ];
}

/**
 * Creates a ToolSystem with every core tool registered
 */
export function createCoreToolSystem(context: ToolContext, toolSystem: ToolSystem = new ToolSystem()): ToolSystem {
  toolSystem.registerAll(createCoreTools(context));
  return toolSystem;
}
