import { describe, it, expect } from 'vitest';
import { ActiveToolList, installTools } from './active-tools.js';
import type { ToolDescriptor } from '../tools/tool-system.js';

interface HostTool {
  name: string;
  version: number;
}

function descriptor(name: string): ToolDescriptor {
  return { name, description: `${name} tool`, category: 'test', args: [], handler: async () => name };
}

describe('ActiveToolList', () => {
  it('should register new tools at the front', () => {
    const list = new ActiveToolList<HostTool>((tool) => tool.name);
    list.registerTool({ name: 'a', version: 1 });
    list.registerTool({ name: 'b', version: 1 });

    expect(list.names()).toEqual(['b', 'a']);
  });

  it('should remove tools by name', () => {
    const list = new ActiveToolList<HostTool>((tool) => tool.name);
    list.registerTool({ name: 'a', version: 1 });
    list.registerTool({ name: 'b', version: 1 });

    list.removeByName('a');
    list.removeByName('missing');

    expect(list.names()).toEqual(['b']);
    expect(list.find('a')).toBeUndefined();
  });
});

describe('installTools', () => {
  it('should upsert by name with the last descriptor first', () => {
    const list = new ActiveToolList<HostTool>((tool) => tool.name);
    list.registerTool({ name: 'b', version: 0 });
    list.registerTool({ name: 'foreign', version: 0 });

    let version = 1;
    installTools(list, [descriptor('a'), descriptor('b'), descriptor('c')], (d) => ({ name: d.name, version }));

    expect(list.names()).toEqual(['c', 'b', 'a', 'foreign']);
    expect(list.find('b')).toEqual({ name: 'b', version: 1 });

    version = 2;
    installTools(list, [descriptor('a'), descriptor('b'), descriptor('c')], (d) => ({ name: d.name, version }));

    expect(list.names()).toEqual(['c', 'b', 'a', 'foreign']);
    expect(list.list().filter((tool) => tool.version === 2)).toHaveLength(3);
  });

  it('should return the tools it installed in descriptor order', () => {
    const list = new ActiveToolList<HostTool>((tool) => tool.name);
    const installed = installTools(list, [descriptor('x'), descriptor('y')], (d) => ({ name: d.name, version: 1 }));

    expect(installed.map((tool) => tool.name)).toEqual(['x', 'y']);
  });
});
