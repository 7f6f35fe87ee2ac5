/**
 * Host adapters - Install tool descriptors into host tool collections
 */

export { ActiveToolList, installTools, type ActiveTools } from './active-tools.js';
export { ToolArgumentError, invokeDescriptor, positionalToNamed } from './invoke.js';
export {
  toFunctionTool,
  createFunctionToolList,
  registerFunctionTools,
  type FunctionTool,
} from './function-host.js';
export {
  toArgListTool,
  createArgListToolList,
  registerArgListTools,
  type ArgListTool,
  type ArgListToolArg,
} from './arg-list-host.js';
